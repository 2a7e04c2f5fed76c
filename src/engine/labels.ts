import type { Engagement } from '../models/types.js';

export type EngagementLabel = 'Pending Approval' | 'Rejected' | 'Accepted' | 'Completed' | 'Not Completed';

export function engagementLabel(e: Pick<Engagement, 'approval_status' | 'completion_status'>): EngagementLabel {
  if (e.approval_status === 'pending') return 'Pending Approval';
  if (e.approval_status === 'rejected') return 'Rejected';
  switch (e.completion_status) {
    case 'completed': return 'Completed';
    case 'not_completed': return 'Not Completed';
    default: return 'Accepted';
  }
}
