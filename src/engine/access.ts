import { ForbiddenError, NotFoundError } from './errors.js';
import { taskLockKey, withLock } from './locks.js';
import { withRetry } from './retry.js';
import type { VolunteerHubDb } from '../adapters/db.js';
import type { Actor, Engagement, Role, Task } from '../models/types.js';

export function requireRole(actor: Actor, role: Role, action: string) {
  if (actor.role !== role) throw new ForbiddenError(`${actor.role} ${actor.id} cannot ${action}`);
}

/** A live task owned by the acting NGO; anything else reads as missing. */
export function requireOwnedTask(db: Pick<VolunteerHubDb, 'getTask'>, actor: Actor, taskId: number): Task {
  requireRole(actor, 'ngo', 'manage tasks');
  const task = db.getTask(taskId);
  if (!task || task.is_deleted || task.organization_id !== actor.id) throw new NotFoundError('task', taskId);
  return task;
}

/**
 * An engagement on a live task, visible to its volunteer or to the NGO that owns
 * the task.
 */
export function requireEngagement(
  db: Pick<VolunteerHubDb, 'getTask' | 'getEngagement'>,
  actor: Actor,
  engagementId: number,
): { engagement: Engagement; task: Task } {
  const engagement = db.getEngagement(engagementId);
  if (!engagement) throw new NotFoundError('engagement', engagementId);
  const task = db.getTask(engagement.task_id);
  if (!task || task.is_deleted) throw new NotFoundError('engagement', engagementId);
  const owner = actor.role === 'ngo' ? task.organization_id : engagement.volunteer_id;
  if (owner !== actor.id) throw new NotFoundError('engagement', engagementId);
  return { engagement, task };
}

/**
 * Runs one guarded read-modify-write on a task: serialized in-process per task,
 * atomic in the store, retried once if the store is busy.
 */
export function guardedWrite<T>(db: Pick<VolunteerHubDb, 'transaction'>, taskId: number, label: string, fn: () => T): Promise<T> {
  return withLock(taskLockKey(taskId), () => withRetry(label, () => db.transaction(fn)));
}
