export type TaskStatus = "open" | "closed";

/** Why a task is closed. Only `capacity` closures are reopened automatically. */
export type ClosedReason = "capacity" | "manual";

export type DisplayStatus = "open" | "full" | "closed";

export type ApprovalStatus = "pending" | "approved" | "rejected";

export type CompletionStatus = "accepted" | "completed" | "not_completed";

export type RecipientType = "volunteer" | "ngo";

export type NotificationType = "task_deleted" | "task_updated" | "certificate_sent";

export type Role = "ngo" | "volunteer";

/** Authenticated caller, supplied by the identity provider and trusted as-is. */
export interface Actor {
  role: Role;
  id: number;
  name: string;
}

export interface Organization {
  id: number;
  name: string;
  email: string;
}

export interface Volunteer {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  location: string | null;
  total_value_generated: number;
}

export interface Task {
  id: number;
  organization_id: number;
  title: string;
  description: string;
  location: string;
  address: string;
  contact_email: string;
  contact_phone: string;
  start_date: string; // YYYY-MM-DD
  end_date: string; // YYYY-MM-DD
  hours_per_day: number;
  status: TaskStatus;
  closed_reason: ClosedReason | null;
  category: string | null;
  required_skills: string | null;
  urgency: string | null;
  age_requirement: string | null;
  physical_requirements: string | null;
  equipment_needed: string | null;
  deadline: string | null;
  max_volunteers: number | null;
  wage_rate: number | null;
  is_deleted: boolean;
  created_at: string;
}

/** Fields an NGO supplies when posting or editing a task. */
export type TaskInput = Omit<Task, "id" | "organization_id" | "status" | "closed_reason" | "is_deleted" | "created_at">;

export interface Engagement {
  id: number;
  task_id: number;
  volunteer_id: number;
  approval_status: ApprovalStatus;
  completion_status: CompletionStatus;
  availability_date: string;
  hours_committed: number;
  contact_email: string;
  contact_phone: string;
  motivation: string;
  monetization_value: number;
  completion_note: string | null;
  certificate_sent: boolean;
  created_at: string;
}

export interface Notification {
  id: number;
  recipient_type: RecipientType;
  recipient_id: number;
  message: string;
  type: NotificationType;
  related_id: number | null;
  is_read: boolean;
  created_at: string;
}

export interface EventLogEntry {
  id: string;
  ts: string;
  type: string;
  correlation_id?: string;
  payload: Record<string, unknown>;
}

/** Entity ids whose cached read-views must be dropped after a write. */
export interface InvalidationScope {
  taskIds?: number[];
  organizationIds?: number[];
  volunteerIds?: number[];
}
