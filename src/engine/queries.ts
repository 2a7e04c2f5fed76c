import { NotFoundError } from './errors.js';
import { engagementLabel } from './labels.js';
import { durationDays, roundCurrency, taskValue } from './value.js';
import type { CapacityTracker } from './capacity.js';
import type { CacheRegion, CacheTag, ReadCache } from './read_cache.js';
import type { EngagementLabel } from './labels.js';
import type {
  AvailableTaskFilter,
  AvailableTaskRow,
  EngagementWithTask,
  EngagementWithVolunteer,
  OrganizationEngagement,
  TaskWithCounts,
  VolunteerHubDb,
} from '../adapters/db.js';
import type { DisplayStatus, Engagement, Notification, RecipientType } from '../models/types.js';

export interface TaskView extends TaskWithCounts {
  display_status: DisplayStatus;
  duration_days: number;
  remaining_slots: number | null;
  estimated_value_per_volunteer: number;
}

export interface AvailableTaskView extends TaskView {
  organization_name: string;
  already_applied: boolean;
}

export type Labelled<E extends Engagement> = E & { display_label: EngagementLabel };

export interface CategoryTotals {
  category: string;
  completed: number;
  value: number;
}

export interface OrganizationAnalytics {
  total_tasks: number;
  open_tasks: number;
  closed_tasks: number;
  deleted_tasks: number;
  total_engagements: number;
  pending_engagements: number;
  approved_engagements: number;
  completed_engagements: number;
  total_hours_committed: number;
  total_value: number;
  by_category: CategoryTotals[];
}

export interface VolunteerStats {
  total_engagements: number;
  pending: number;
  awaiting_review: number;
  completed: number;
  not_completed: number;
  completed_hours: number;
  total_value: number;
}

function label<E extends Engagement>(e: E): Labelled<E> {
  return { ...e, display_label: engagementLabel(e) };
}

const orgTag = (id: number): CacheTag => `org:${id}`;
const taskTag = (id: number): CacheTag => `task:${id}`;
const volunteerTag = (id: number): CacheTag => `volunteer:${id}`;

/**
 * Read side of the hub. List views go through the read cache; single-entity
 * views read the store directly.
 */
export class HubQueries {
  private readonly orgTasks: CacheRegion<TaskView[]>;
  private readonly taskVols: CacheRegion<Labelled<EngagementWithVolunteer>[]>;
  private readonly orgVols: CacheRegion<Labelled<OrganizationEngagement>[]>;
  private readonly analytics: CacheRegion<OrganizationAnalytics>;
  private readonly available: CacheRegion<AvailableTaskView[]>;
  private readonly volEngagements: CacheRegion<Labelled<EngagementWithTask>[]>;
  private readonly unread: CacheRegion<Notification[]>;

  constructor(
    private readonly db: VolunteerHubDb,
    private readonly capacity: CapacityTracker,
    cache: ReadCache,
  ) {
    this.orgTasks = cache.region('organization_tasks');
    this.taskVols = cache.region('task_volunteers');
    this.orgVols = cache.region('organization_volunteers');
    this.analytics = cache.region('organization_analytics');
    this.available = cache.region('available_tasks');
    this.volEngagements = cache.region('volunteer_engagements');
    this.unread = cache.region('notifications');
  }

  taskView(task: TaskWithCounts): TaskView {
    return {
      ...task,
      display_status: this.capacity.displayStatus(task, task.approved_count),
      duration_days: durationDays(task.start_date, task.end_date),
      remaining_slots: this.capacity.remaining(task, task.approved_count),
      estimated_value_per_volunteer: taskValue(task),
    };
  }

  task(taskId: number): TaskView {
    const task = this.db.read(() => this.db.getTask(taskId));
    if (!task || task.is_deleted) throw new NotFoundError('task', taskId);
    return this.taskView({
      ...task,
      approved_count: this.capacity.approvedCount(taskId),
      pending_count: this.db.listTaskEngagements(taskId, 'pending').length,
    });
  }

  engagement(engagementId: number): Labelled<Engagement> {
    const engagement = this.db.read(() => this.db.getEngagement(engagementId));
    const task = engagement && this.db.getTask(engagement.task_id);
    if (!engagement || !task || task.is_deleted) throw new NotFoundError('engagement', engagementId);
    return label(engagement);
  }

  organizationTasks(organizationId: number): TaskView[] {
    return this.orgTasks.getOrLoad(String(organizationId), [orgTag(organizationId)], () =>
      this.db.read(() => this.db.listOrganizationTasks(organizationId)).map(t => this.taskView(t)));
  }

  /** Pending and approved engagements on a task, newest first. */
  taskVolunteers(taskId: number): Labelled<EngagementWithVolunteer>[] {
    return this.taskVols.getOrLoad(String(taskId), [taskTag(taskId)], () =>
      this.db.read(() => this.db.listTaskVolunteers(taskId))
        .filter(e => e.approval_status !== 'rejected')
        .map(label));
  }

  organizationVolunteers(organizationId: number): Labelled<OrganizationEngagement>[] {
    return this.orgVols.getOrLoad(String(organizationId), [orgTag(organizationId)], () =>
      this.db.read(() => this.db.listOrganizationEngagements(organizationId)).map(label));
  }

  organizationAnalytics(organizationId: number): OrganizationAnalytics {
    return this.analytics.getOrLoad(String(organizationId), [orgTag(organizationId)], () => {
      const tasks = this.db.read(() => this.db.listOrganizationTasks(organizationId, { includeDeleted: true }));
      const engagements = this.db.read(() => this.db.listOrganizationEngagements(organizationId));
      const live = tasks.filter(t => !t.is_deleted);
      const byCategory = new Map<string, CategoryTotals>();
      let hours = 0;
      let value = 0;
      for (const e of engagements) {
        if (e.approval_status !== 'approved') continue;
        hours += e.hours_committed;
        if (e.completion_status !== 'completed') continue;
        value += e.monetization_value;
        const category = e.task_category ?? 'Uncategorized';
        const totals = byCategory.get(category) ?? { category, completed: 0, value: 0 };
        totals.completed++;
        totals.value = roundCurrency(totals.value + e.monetization_value);
        byCategory.set(category, totals);
      }
      return {
        total_tasks: live.length,
        open_tasks: live.filter(t => t.status === 'open').length,
        closed_tasks: live.filter(t => t.status === 'closed').length,
        deleted_tasks: tasks.length - live.length,
        total_engagements: engagements.length,
        pending_engagements: engagements.filter(e => e.approval_status === 'pending').length,
        approved_engagements: engagements.filter(e => e.approval_status === 'approved').length,
        completed_engagements: engagements.filter(e => e.approval_status === 'approved' && e.completion_status === 'completed').length,
        total_hours_committed: hours,
        total_value: roundCurrency(value),
        by_category: [...byCategory.values()].sort((a, b) => b.value - a.value || a.category.localeCompare(b.category)),
      };
    });
  }

  availableTasks(volunteerId: number, filter: AvailableTaskFilter = {}): AvailableTaskView[] {
    const key = `${volunteerId}|${filter.city ?? ''}|${filter.status ?? ''}|${filter.category ?? ''}|${filter.maxHours ?? ''}`;
    return this.available.getOrLoad(key, ['tasks:any', volunteerTag(volunteerId)], () =>
      this.db.read(() => this.db.listAvailableTasks(volunteerId, filter)).map((t: AvailableTaskRow) => ({
        ...this.taskView(t),
        organization_name: t.organization_name,
        already_applied: t.already_applied,
      })));
  }

  volunteerEngagements(volunteerId: number): Labelled<EngagementWithTask>[] {
    // rows carry task titles and statuses, so any task write drops them too
    return this.volEngagements.getOrLoad(String(volunteerId), ['tasks:any', volunteerTag(volunteerId)], () =>
      this.db.read(() => this.db.listVolunteerEngagements(volunteerId)).map(label));
  }

  volunteerStats(volunteerId: number): VolunteerStats {
    const volunteer = this.db.read(() => this.db.getVolunteer(volunteerId));
    if (!volunteer) throw new NotFoundError('volunteer', volunteerId);
    const rows = this.volunteerEngagements(volunteerId);
    const completed = rows.filter(e => e.approval_status === 'approved' && e.completion_status === 'completed');
    return {
      total_engagements: rows.length,
      pending: rows.filter(e => e.approval_status === 'pending').length,
      awaiting_review: rows.filter(e => e.approval_status === 'approved' && e.completion_status === 'accepted').length,
      completed: completed.length,
      not_completed: rows.filter(e => e.completion_status === 'not_completed').length,
      completed_hours: completed.reduce((n, e) => n + e.hours_committed, 0),
      total_value: volunteer.total_value_generated,
    };
  }

  unreadNotifications(recipientType: RecipientType, recipientId: number): Notification[] {
    const tag = recipientType === 'volunteer' ? volunteerTag(recipientId) : orgTag(recipientId);
    return this.unread.getOrLoad(`${recipientType}:${recipientId}`, [tag], () =>
      this.db.read(() => this.db.listUnreadNotifications(recipientType, recipientId)));
  }
}
