import { CapacityExceededError, InvalidTransitionError, NotFoundError, ValidationError } from './errors.js';
import { logEvent } from './events.js';
import { guardedWrite, requireOwnedTask, requireRole } from './access.js';
import { deletionReasonSchema, parseInput, parseTaskDraft } from './schemas.js';
import { roundCurrency } from './value.js';
import { withRetry } from './retry.js';
import type { CapacityTracker } from './capacity.js';
import type { NotificationDispatcher } from './notifications.js';
import type { RateLimiter } from './rate_limiter.js';
import type { CacheInvalidator } from './read_cache.js';
import type { TaskDraft } from './schemas.js';
import type { VolunteerHubDb } from '../adapters/db.js';
import type { WageEstimateRequest, WageEstimator } from '../agent/wage_estimator.js';
import type { Actor, DisplayStatus, Task, TaskInput } from '../models/types.js';

export type CapacityChange = 'auto_closed' | 'auto_reopened' | 'unchanged';

/** Fields whose change is announced to approved volunteers, with their display names. */
export const CRITICAL_FIELDS = [
  ['start_date', 'Start date'],
  ['end_date', 'End date'],
  ['hours_per_day', 'Hours'],
  ['location', 'Location'],
  ['address', 'Address'],
  ['contact_email', 'Contact email'],
  ['contact_phone', 'Contact phone'],
  ['urgency', 'Urgency'],
  ['physical_requirements', 'Physical requirements'],
  ['age_requirement', 'Age requirement'],
  ['equipment_needed', 'Equipment needed'],
] as const satisfies readonly (readonly [keyof TaskInput, string])[];

export function changedCriticalFields(before: TaskInput, after: TaskInput): string[] {
  return CRITICAL_FIELDS
    .filter(([field]) => (before[field] ?? '') !== (after[field] ?? ''))
    .map(([, label]) => label);
}

function inputOf(task: Task): TaskInput {
  return {
    title: task.title,
    description: task.description,
    location: task.location,
    address: task.address,
    contact_email: task.contact_email,
    contact_phone: task.contact_phone,
    start_date: task.start_date,
    end_date: task.end_date,
    hours_per_day: task.hours_per_day,
    category: task.category,
    required_skills: task.required_skills,
    urgency: task.urgency,
    age_requirement: task.age_requirement,
    physical_requirements: task.physical_requirements,
    equipment_needed: task.equipment_needed,
    deadline: task.deadline,
    max_volunteers: task.max_volunteers,
    wage_rate: task.wage_rate,
  };
}

function definedOnly(patch: Partial<TaskDraft>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(patch).filter(([, v]) => v !== undefined));
}

export interface TaskLifecycleDeps {
  db: VolunteerHubDb;
  capacity: CapacityTracker;
  notifications: NotificationDispatcher;
  invalidator?: CacheInvalidator;
  rateLimiter?: RateLimiter;
  estimator?: WageEstimator;
  now?: () => Date;
}

export interface TaskEditResult {
  task: Task;
  changedFields: string[];
  notified: number;
  capacity: CapacityChange;
}

export interface TaskDeleteResult {
  task: Task;
  notified: number;
}

/** Owns task status: the only writer of `status` and `closed_reason`. */
export class TaskLifecycleManager {
  private readonly db: VolunteerHubDb;
  private readonly capacity: CapacityTracker;
  private readonly notifications: NotificationDispatcher;
  private readonly invalidator?: CacheInvalidator;
  private readonly rateLimiter?: RateLimiter;
  private readonly estimator?: WageEstimator;
  private readonly now: () => Date;

  constructor(deps: TaskLifecycleDeps) {
    this.db = deps.db;
    this.capacity = deps.capacity;
    this.notifications = deps.notifications;
    this.invalidator = deps.invalidator;
    this.rateLimiter = deps.rateLimiter;
    this.estimator = deps.estimator;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Re-evaluates fullness after an engagement change. Joins the caller's
   * transaction when there is one. Manual closures are left alone.
   */
  onEngagementChange(taskId: number): CapacityChange {
    return this.db.transaction((): CapacityChange => {
      const task = this.db.getTask(taskId);
      if (!task || task.is_deleted) return 'unchanged';
      const full = this.capacity.isFull(task);
      if (full && task.status === 'open') {
        this.db.setTaskStatus(taskId, 'closed', 'capacity');
        logEvent('task.auto_closed', { task_id: taskId, max_volunteers: task.max_volunteers });
        return 'auto_closed';
      }
      if (!full && task.status === 'closed' && task.closed_reason === 'capacity') {
        this.db.setTaskStatus(taskId, 'open', null);
        logEvent('task.auto_reopened', { task_id: taskId });
        return 'auto_reopened';
      }
      return 'unchanged';
    });
  }

  displayStatus(task: Task): DisplayStatus {
    return this.capacity.displayStatus(task);
  }

  /** Asks the estimator for an hourly rate; any failure yields null. */
  async suggestWageRate(req: WageEstimateRequest): Promise<number | null> {
    if (!this.estimator) return null;
    try {
      const rate = await this.estimator.estimate(req);
      return rate !== null && rate > 0 ? roundCurrency(rate) : null;
    } catch (err) {
      console.warn('[wage] estimator threw:', err instanceof Error ? err.message : String(err));
      return null;
    }
  }

  async createTask(actor: Actor, draft: TaskDraft): Promise<Task> {
    requireRole(actor, 'ngo', 'create tasks');
    const input = parseTaskDraft(draft);
    if (!this.db.getOrganization(actor.id)) throw new NotFoundError('organization', actor.id);
    this.rateLimiter?.consume(actor.id, 'create_task');
    if (input.wage_rate === null) {
      input.wage_rate = await this.suggestWageRate({ title: input.title, description: input.description, location: input.location });
    }
    const createdAt = this.now().toISOString();
    const task = await withRetry('task.create', () => this.db.transaction(() => this.db.insertTask(actor.id, input, createdAt)));
    this.invalidator?.invalidate({ taskIds: [task.id], organizationIds: [actor.id] });
    logEvent('task.created', { task_id: task.id, organization_id: actor.id, wage_rate: task.wage_rate, max_volunteers: task.max_volunteers });
    return task;
  }

  /**
   * Applies a partial edit. Approved volunteers hear about changes to critical
   * fields. max_volunteers may drop to the approved count (closing the task)
   * but not below it.
   */
  async editTask(actor: Actor, taskId: number, patch: Partial<TaskDraft>): Promise<TaskEditResult> {
    requireRole(actor, 'ngo', 'edit tasks');
    this.rateLimiter?.consume(actor.id, 'edit_task');
    const { result, recipients } = await guardedWrite(this.db, taskId, 'task.edit', () => {
      const current = requireOwnedTask(this.db, actor, taskId);
      const before = inputOf(current);
      const input = parseTaskDraft({ ...before, ...definedOnly(patch) });
      const approved = this.capacity.approvedCount(taskId);
      if (input.max_volunteers !== null && approved > input.max_volunteers) {
        throw new ValidationError(`Max volunteers cannot be lower than the ${approved} volunteers already approved.`);
      }
      const changedFields = changedCriticalFields(before, input);
      this.db.updateTask(taskId, input);
      const recipients = changedFields.length
        ? this.db.listTaskEngagements(taskId, 'approved').map(e => e.volunteer_id)
        : [];
      const sent = this.notifications.taskUpdated({ id: taskId, title: input.title }, changedFields, recipients);
      const capacity = this.onEngagementChange(taskId);
      const task = this.db.getTask(taskId);
      if (!task) throw new NotFoundError('task', taskId);
      return { result: { task, changedFields, notified: sent.length, capacity }, recipients };
    });
    this.invalidator?.invalidate({ taskIds: [taskId], organizationIds: [actor.id], volunteerIds: recipients });
    logEvent('task.updated', { task_id: taskId, changed: result.changedFields, notified: result.notified, capacity: result.capacity });
    return result;
  }

  /** NGO-initiated close. Never undone by capacity changes. */
  async closeTask(actor: Actor, taskId: number): Promise<Task> {
    requireRole(actor, 'ngo', 'close tasks');
    const task = await guardedWrite(this.db, taskId, 'task.close', () => {
      const current = requireOwnedTask(this.db, actor, taskId);
      if (current.status === 'closed' && current.closed_reason === 'manual') {
        throw new InvalidTransitionError('close', 'This task is already closed.');
      }
      this.db.setTaskStatus(taskId, 'closed', 'manual');
      return { ...current, status: 'closed' as const, closed_reason: 'manual' as const };
    });
    this.invalidator?.invalidate({ taskIds: [taskId], organizationIds: [actor.id] });
    logEvent('task.closed', { task_id: taskId, reason: 'manual' });
    return task;
  }

  /** Reopens a manually closed task, provided it still has room. */
  async reopenTask(actor: Actor, taskId: number): Promise<Task> {
    requireRole(actor, 'ngo', 'reopen tasks');
    const task = await guardedWrite(this.db, taskId, 'task.reopen', () => {
      const current = requireOwnedTask(this.db, actor, taskId);
      if (current.status !== 'closed' || current.closed_reason !== 'manual') {
        throw new InvalidTransitionError('reopen', 'Only a task you closed can be reopened.');
      }
      if (!this.capacity.hasRoom(current)) throw new CapacityExceededError(taskId);
      this.db.setTaskStatus(taskId, 'open', null);
      return { ...current, status: 'open' as const, closed_reason: null };
    });
    this.invalidator?.invalidate({ taskIds: [taskId], organizationIds: [actor.id] });
    logEvent('task.reopened', { task_id: taskId });
    return task;
  }

  /** Hides the task; engagements stay for reporting and every holder is told why. */
  async softDelete(actor: Actor, taskId: number, reason: string): Promise<TaskDeleteResult> {
    requireRole(actor, 'ngo', 'delete tasks');
    const why = parseInput(deletionReasonSchema, reason);
    this.rateLimiter?.consume(actor.id, 'delete_task');
    const { result, holders } = await guardedWrite(this.db, taskId, 'task.delete', () => {
      const current = requireOwnedTask(this.db, actor, taskId);
      this.db.markTaskDeleted(taskId);
      const holders = this.db.listTaskEngagements(taskId).map(e => e.volunteer_id);
      const sent = this.notifications.taskDeleted(current, why, holders);
      return { result: { task: { ...current, is_deleted: true }, notified: sent.length }, holders };
    });
    this.invalidator?.invalidate({ taskIds: [taskId], organizationIds: [actor.id], volunteerIds: holders });
    logEvent('task.deleted', { task_id: taskId, reason: why, notified: result.notified });
    return result;
  }
}
