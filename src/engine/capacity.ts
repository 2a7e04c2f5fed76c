import type { VolunteerHubDb } from '../adapters/db.js';
import type { DisplayStatus, Task } from '../models/types.js';

type CapacityFields = Pick<Task, 'id' | 'max_volunteers'>;

/** Single source of truth for whether a task has open volunteer slots. */
export class CapacityTracker {
  constructor(private readonly db: Pick<VolunteerHubDb, 'countApproved'>) {}

  /** Approved engagements still accepted or completed; rejected and not_completed never hold a slot. */
  approvedCount(taskId: number): number {
    return this.db.countApproved(taskId);
  }

  isFull(task: CapacityFields, approved = this.approvedCount(task.id)): boolean {
    return task.max_volunteers != null && approved >= task.max_volunteers;
  }

  hasRoom(task: CapacityFields, approved?: number): boolean {
    return !this.isFull(task, approved);
  }

  remaining(task: CapacityFields, approved = this.approvedCount(task.id)): number | null {
    if (task.max_volunteers == null) return null;
    return Math.max(0, task.max_volunteers - approved);
  }

  displayStatus(task: CapacityFields & Pick<Task, 'status' | 'closed_reason'>, approved?: number): DisplayStatus {
    if (task.status === 'closed') return task.closed_reason === 'capacity' ? 'full' : 'closed';
    return this.isFull(task, approved) ? 'full' : 'open';
  }
}
