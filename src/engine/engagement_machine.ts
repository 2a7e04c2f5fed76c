import {
  CapacityExceededError,
  DuplicateEngagementError,
  InvalidTransitionError,
  NotFoundError,
  TaskClosedError,
} from './errors.js';
import { logEvent } from './events.js';
import { guardedWrite, requireEngagement, requireRole } from './access.js';
import { applicationSchema, completionNoteSchema, parseInput } from './schemas.js';
import { roundCurrency, taskValue } from './value.js';
import type { CapacityTracker } from './capacity.js';
import type { NotificationDispatcher } from './notifications.js';
import type { RateLimiter } from './rate_limiter.js';
import type { CacheInvalidator } from './read_cache.js';
import type { ApplicationInput } from './schemas.js';
import type { CapacityChange, TaskLifecycleManager } from './task_lifecycle.js';
import type { VolunteerHubDb } from '../adapters/db.js';
import type { Actor, Engagement, Task } from '../models/types.js';

export type EngagementTransition =
  | 'apply'
  | 'approve'
  | 'reject'
  | 'withdraw'
  | 'complete'
  | 'mark_not_completed'
  | 'remove'
  | 'send_certificate';

export interface TransitionOutcome {
  /** The engagement after the transition; null once withdrawn or removed. */
  engagement: Engagement | null;
  task: Task;
  capacity: CapacityChange;
}

export interface EngagementMachineDeps {
  db: VolunteerHubDb;
  capacity: CapacityTracker;
  lifecycle: TaskLifecycleManager;
  notifications: NotificationDispatcher;
  invalidator?: CacheInvalidator;
  rateLimiter?: RateLimiter;
  now?: () => Date;
}

/**
 * Moves one volunteer's engagement with one task through its states. Every
 * transition checks its guard and writes inside one store transaction.
 */
export class EngagementStateMachine {
  private readonly db: VolunteerHubDb;
  private readonly capacity: CapacityTracker;
  private readonly lifecycle: TaskLifecycleManager;
  private readonly notifications: NotificationDispatcher;
  private readonly invalidator?: CacheInvalidator;
  private readonly rateLimiter?: RateLimiter;
  private readonly now: () => Date;

  constructor(deps: EngagementMachineDeps) {
    this.db = deps.db;
    this.capacity = deps.capacity;
    this.lifecycle = deps.lifecycle;
    this.notifications = deps.notifications;
    this.invalidator = deps.invalidator;
    this.rateLimiter = deps.rateLimiter;
    this.now = deps.now ?? (() => new Date());
  }

  async apply(actor: Actor, taskId: number, application: ApplicationInput): Promise<TransitionOutcome> {
    requireRole(actor, 'volunteer', 'apply for tasks');
    const form = parseInput(applicationSchema, application);
    if (!this.db.getVolunteer(actor.id)) throw new NotFoundError('volunteer', actor.id);
    this.rateLimiter?.consume(actor.id, 'apply_task');
    const outcome = await guardedWrite(this.db, taskId, 'engagement.apply', () => {
      const task = this.db.getTask(taskId);
      if (!task || task.is_deleted) throw new NotFoundError('task', taskId);
      if (this.db.findEngagement(taskId, actor.id)) throw new DuplicateEngagementError(taskId, actor.id);
      if (task.status === 'closed') throw new TaskClosedError(taskId);
      if (!this.capacity.hasRoom(task)) throw new CapacityExceededError(taskId);
      const engagement = this.db.insertEngagement({
        task_id: taskId,
        volunteer_id: actor.id,
        availability_date: form.availability_date ?? task.start_date,
        hours_committed: form.hours_committed ?? task.hours_per_day,
        contact_email: form.contact_email,
        contact_phone: form.contact_phone,
        motivation: form.motivation,
        created_at: this.now().toISOString(),
      });
      return this.settle(task.id, engagement);
    });
    return this.committed('apply', outcome, actor.id);
  }

  async approve(actor: Actor, engagementId: number): Promise<TransitionOutcome> {
    requireRole(actor, 'ngo', 'approve volunteers');
    this.rateLimiter?.consume(actor.id, 'approve_volunteer');
    return this.ngoTransition('approve', actor, engagementId, (engagement, task) => {
      this.expect(engagement.approval_status === 'pending', 'approve',
        `Only pending applications can be approved (this one is ${engagement.approval_status}).`);
      if (!this.capacity.hasRoom(task)) throw new CapacityExceededError(task.id);
      this.db.updateEngagement(engagement.id, { approval_status: 'approved' });
      return this.settle(task.id, { ...engagement, approval_status: 'approved' });
    });
  }

  async reject(actor: Actor, engagementId: number): Promise<TransitionOutcome> {
    requireRole(actor, 'ngo', 'reject volunteers');
    this.rateLimiter?.consume(actor.id, 'approve_volunteer');
    return this.ngoTransition('reject', actor, engagementId, (engagement, task) => {
      this.expect(engagement.approval_status === 'pending', 'reject',
        `Only pending applications can be rejected (this one is ${engagement.approval_status}).`);
      this.db.updateEngagement(engagement.id, { approval_status: 'rejected' });
      return { engagement: { ...engagement, approval_status: 'rejected' }, task, capacity: 'unchanged' };
    });
  }

  /** The volunteer backs out. A rejected engagement is cleared the same way, which frees them to reapply. */
  async withdraw(actor: Actor, engagementId: number): Promise<TransitionOutcome> {
    requireRole(actor, 'volunteer', 'withdraw from tasks');
    const taskId = this.taskOf(actor, engagementId);
    const outcome = await guardedWrite(this.db, taskId, 'engagement.withdraw', () => {
      const { engagement } = requireEngagement(this.db, actor, engagementId);
      this.expect(engagement.completion_status === 'accepted', 'withdraw',
        'You cannot withdraw from a task that has already been reviewed.');
      this.db.deleteEngagement(engagement.id);
      return this.settle(engagement.task_id, null);
    });
    return this.committed('withdraw', outcome, actor.id, engagementId);
  }

  async complete(actor: Actor, engagementId: number): Promise<TransitionOutcome> {
    requireRole(actor, 'ngo', 'complete engagements');
    return this.ngoTransition('complete', actor, engagementId, (engagement, task) => {
      this.expectReviewable(engagement, 'complete');
      const value = taskValue(task);
      this.db.updateEngagement(engagement.id, { completion_status: 'completed', monetization_value: value, completion_note: null });
      this.recomputeTotal(engagement.volunteer_id);
      return {
        engagement: { ...engagement, completion_status: 'completed', monetization_value: value, completion_note: null },
        task,
        capacity: 'unchanged',
      };
    });
  }

  async markNotCompleted(actor: Actor, engagementId: number, note: string): Promise<TransitionOutcome> {
    requireRole(actor, 'ngo', 'review engagements');
    const why = parseInput(completionNoteSchema, note);
    return this.ngoTransition('mark_not_completed', actor, engagementId, (engagement, task) => {
      this.expectReviewable(engagement, 'mark_not_completed');
      this.db.updateEngagement(engagement.id, { completion_status: 'not_completed', monetization_value: 0, completion_note: why });
      this.recomputeTotal(engagement.volunteer_id);
      // a not_completed engagement no longer holds a slot
      return this.settle(task.id, { ...engagement, completion_status: 'not_completed', monetization_value: 0, completion_note: why });
    });
  }

  async remove(actor: Actor, engagementId: number): Promise<TransitionOutcome> {
    requireRole(actor, 'ngo', 'remove volunteers');
    return this.ngoTransition('remove', actor, engagementId, (engagement, task) => {
      this.expect(engagement.approval_status === 'approved', 'remove', 'Only approved volunteers can be removed.');
      this.db.deleteEngagement(engagement.id);
      this.recomputeTotal(engagement.volunteer_id);
      return this.settle(task.id, null);
    });
  }

  async sendCertificate(actor: Actor, engagementId: number): Promise<TransitionOutcome> {
    requireRole(actor, 'ngo', 'send certificates');
    this.rateLimiter?.consume(actor.id, 'send_notification');
    return this.ngoTransition('send_certificate', actor, engagementId, (engagement, task) => {
      this.expect(engagement.approval_status === 'approved' && engagement.completion_status === 'completed', 'send_certificate',
        'Certificates can only be sent for completed tasks.');
      this.expect(!engagement.certificate_sent, 'send_certificate', 'A certificate has already been sent.');
      this.db.updateEngagement(engagement.id, { certificate_sent: true });
      this.notifications.certificateSent(task, engagement);
      return { engagement: { ...engagement, certificate_sent: true }, task, capacity: 'unchanged' };
    });
  }

  private async ngoTransition(
    kind: EngagementTransition,
    actor: Actor,
    engagementId: number,
    fn: (engagement: Engagement, task: Task) => TransitionOutcome,
  ): Promise<TransitionOutcome> {
    const taskId = this.taskOf(actor, engagementId);
    const { outcome, volunteerId } = await guardedWrite(this.db, taskId, `engagement.${kind}`, () => {
      const { engagement, task } = requireEngagement(this.db, actor, engagementId);
      return { outcome: fn(engagement, task), volunteerId: engagement.volunteer_id };
    });
    return this.committed(kind, outcome, volunteerId, engagementId);
  }

  /** Resolves the task to lock on; ownership is checked again inside the transaction. */
  private taskOf(actor: Actor, engagementId: number): number {
    return requireEngagement(this.db, actor, engagementId).task.id;
  }

  private expect(ok: boolean, transition: EngagementTransition, message: string) {
    if (!ok) throw new InvalidTransitionError(transition, message);
  }

  private expectReviewable(engagement: Engagement, transition: EngagementTransition) {
    this.expect(engagement.approval_status === 'approved', transition, 'Only approved volunteers can be reviewed.');
    this.expect(engagement.completion_status === 'accepted', transition, 'This engagement has already been reviewed.');
  }

  /** Re-evaluates capacity and reloads the task inside the current transaction. */
  private settle(taskId: number, engagement: Engagement | null): TransitionOutcome {
    const capacity = this.lifecycle.onEngagementChange(taskId);
    const task = this.db.getTask(taskId);
    if (!task) throw new NotFoundError('task', taskId);
    return { engagement, task, capacity };
  }

  private recomputeTotal(volunteerId: number): number {
    const total = roundCurrency(this.db.sumCompletedValue(volunteerId));
    this.db.setVolunteerTotal(volunteerId, total);
    return total;
  }

  private committed(kind: EngagementTransition, outcome: TransitionOutcome, volunteerId?: number, engagementId?: number) {
    this.invalidator?.invalidate({
      taskIds: [outcome.task.id],
      organizationIds: [outcome.task.organization_id],
      volunteerIds: volunteerId === undefined ? [] : [volunteerId],
    });
    logEvent(`engagement.${kind}`, {
      engagement_id: outcome.engagement?.id ?? engagementId ?? null,
      task_id: outcome.task.id,
      volunteer_id: volunteerId ?? null,
      capacity: outcome.capacity,
    });
    return outcome;
  }
}
