// SQLite-backed store. All calls are synchronous; guarded writes go through
// `transaction`, which takes the write lock up front (BEGIN IMMEDIATE).
import Database from 'better-sqlite3';
import { DuplicateEngagementError, TransientStorageError } from '../engine/errors.js';
import type {
  ApprovalStatus,
  ClosedReason,
  Engagement,
  Notification,
  NotificationType,
  Organization,
  RecipientType,
  Task,
  TaskInput,
  TaskStatus,
  Volunteer,
} from '../models/types.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS organizations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT UNIQUE NOT NULL
  );

  CREATE TABLE IF NOT EXISTS volunteers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT UNIQUE NOT NULL,
    phone TEXT,
    location TEXT,
    total_value_generated REAL NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    organization_id INTEGER NOT NULL REFERENCES organizations(id),
    title TEXT NOT NULL,
    description TEXT NOT NULL,
    location TEXT NOT NULL,
    address TEXT NOT NULL,
    contact_email TEXT NOT NULL,
    contact_phone TEXT NOT NULL,
    start_date TEXT NOT NULL,
    end_date TEXT NOT NULL,
    hours_per_day INTEGER NOT NULL,
    status TEXT NOT NULL DEFAULT 'open' CHECK (status IN ('open', 'closed')),
    closed_reason TEXT CHECK (closed_reason IN ('capacity', 'manual')),
    category TEXT,
    required_skills TEXT,
    urgency TEXT,
    age_requirement TEXT,
    physical_requirements TEXT,
    equipment_needed TEXT,
    deadline TEXT,
    max_volunteers INTEGER,
    wage_rate REAL,
    is_deleted INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    CHECK (end_date >= start_date)
  );

  CREATE TABLE IF NOT EXISTS engagements (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER NOT NULL REFERENCES tasks(id),
    volunteer_id INTEGER NOT NULL REFERENCES volunteers(id),
    approval_status TEXT NOT NULL DEFAULT 'pending' CHECK (approval_status IN ('pending', 'approved', 'rejected')),
    completion_status TEXT NOT NULL DEFAULT 'accepted' CHECK (completion_status IN ('accepted', 'completed', 'not_completed')),
    availability_date TEXT NOT NULL,
    hours_committed INTEGER NOT NULL,
    contact_email TEXT NOT NULL,
    contact_phone TEXT NOT NULL,
    motivation TEXT NOT NULL,
    monetization_value REAL NOT NULL DEFAULT 0,
    completion_note TEXT,
    certificate_sent INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_engagements_task_volunteer ON engagements(task_id, volunteer_id);

  CREATE TABLE IF NOT EXISTS notifications (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    recipient_type TEXT NOT NULL CHECK (recipient_type IN ('volunteer', 'ngo')),
    recipient_id INTEGER NOT NULL,
    message TEXT NOT NULL,
    type TEXT NOT NULL,
    related_id INTEGER,
    is_read INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_tasks_org_deleted ON tasks(organization_id, is_deleted);
  CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
  CREATE INDEX IF NOT EXISTS idx_engagements_volunteer ON engagements(volunteer_id);
  CREATE INDEX IF NOT EXISTS idx_engagements_task_approval ON engagements(task_id, approval_status);
  CREATE INDEX IF NOT EXISTS idx_notifications_recipient ON notifications(recipient_type, recipient_id, is_read);
`;

type Flag = 0 | 1;

interface TaskRow extends Omit<Task, 'is_deleted'> { is_deleted: Flag }
interface EngagementRow extends Omit<Engagement, 'certificate_sent'> { certificate_sent: Flag }
interface NotificationRow extends Omit<Notification, 'is_read'> { is_read: Flag }

export interface TaskWithCounts extends Task {
  approved_count: number;
  pending_count: number;
}

export interface EngagementWithVolunteer extends Engagement {
  volunteer_name: string;
  volunteer_email: string;
  volunteer_location: string | null;
}

export interface EngagementWithTask extends Engagement {
  task_title: string;
  task_category: string | null;
  task_status: TaskStatus;
  task_is_deleted: boolean;
  organization_id: number;
  organization_name: string;
}

export interface OrganizationEngagement extends EngagementWithVolunteer {
  task_title: string;
  task_category: string | null;
}

export interface AvailableTaskFilter {
  city?: string;
  status?: TaskStatus | 'all';
  category?: string;
  maxHours?: number;
}

export interface AvailableTaskRow extends TaskWithCounts {
  organization_name: string;
  already_applied: boolean;
}

export type EngagementPatch = Partial<Pick<Engagement,
  'approval_status' | 'completion_status' | 'monetization_value' | 'completion_note' | 'certificate_sent'>>;

export interface NewEngagement {
  task_id: number;
  volunteer_id: number;
  availability_date: string;
  hours_committed: number;
  contact_email: string;
  contact_phone: string;
  motivation: string;
  created_at: string;
}

export interface NewNotification {
  recipient_type: RecipientType;
  recipient_id: number;
  message: string;
  type: NotificationType;
  related_id: number | null;
  created_at: string;
}

export interface OpenDbOptions {
  busyTimeoutMs?: number;
}

const toTask = (r: TaskRow): Task => ({ ...r, is_deleted: r.is_deleted === 1 });
const toEngagement = (r: EngagementRow): Engagement => ({ ...r, certificate_sent: r.certificate_sent === 1 });
const toNotification = (r: NotificationRow): Notification => ({ ...r, is_read: r.is_read === 1 });

export function sqliteErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function isTransient(err: unknown): boolean {
  const code = sqliteErrorCode(err);
  return code !== undefined && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
}

/** Runs a storage call, surfacing lock contention as a retryable error. */
function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (isTransient(err)) {
      throw new TransientStorageError(`storage busy: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
    throw err;
  }
}

const TASK_COLUMNS = [
  'title', 'description', 'location', 'address', 'contact_email', 'contact_phone', 'start_date', 'end_date',
  'hours_per_day', 'category', 'required_skills', 'urgency', 'age_requirement', 'physical_requirements',
  'equipment_needed', 'deadline', 'max_volunteers', 'wage_rate',
] as const satisfies readonly (keyof TaskInput)[];

function taskParams(input: TaskInput): Record<(typeof TASK_COLUMNS)[number], string | number | null> {
  return {
    title: input.title,
    description: input.description,
    location: input.location,
    address: input.address,
    contact_email: input.contact_email,
    contact_phone: input.contact_phone,
    start_date: input.start_date,
    end_date: input.end_date,
    hours_per_day: input.hours_per_day,
    category: input.category,
    required_skills: input.required_skills,
    urgency: input.urgency,
    age_requirement: input.age_requirement,
    physical_requirements: input.physical_requirements,
    equipment_needed: input.equipment_needed,
    deadline: input.deadline,
    max_volunteers: input.max_volunteers,
    wage_rate: input.wage_rate,
  };
}

// An engagement occupies a slot while approved and not marked not_completed.
function approvedSlot(alias = ''): string {
  return `${alias}approval_status = 'approved' AND ${alias}completion_status IN ('accepted', 'completed')`;
}

export function openDb(file: string, options: OpenDbOptions = {}) {
  const sqlite = new Database(file, { timeout: options.busyTimeoutMs ?? 5000 });
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(SCHEMA);

  const getTask = (id: number): Task | undefined => {
    const row = sqlite.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
    return row && toTask(row);
  };
  const getEngagement = (id: number): Engagement | undefined => {
    const row = sqlite.prepare<[number], EngagementRow>('SELECT * FROM engagements WHERE id = ?').get(id);
    return row && toEngagement(row);
  };

  return {
    /** Runs fn atomically; nested calls join the outer transaction. */
    transaction<T>(fn: () => T): T {
      if (sqlite.inTransaction) return fn();
      return guard(() => sqlite.transaction(fn).immediate());
    },
    read<T>(fn: () => T): T {
      return guard(fn);
    },
    close() { sqlite.close(); },

    // organizations & volunteers
    createOrganization(o: Omit<Organization, 'id'>): Organization {
      const res = sqlite.prepare<[string, string]>('INSERT INTO organizations(name, email) VALUES(?, ?)').run(o.name, o.email.toLowerCase().trim());
      return { id: Number(res.lastInsertRowid), name: o.name, email: o.email.toLowerCase().trim() };
    },
    getOrganization(id: number): Organization | undefined {
      return sqlite.prepare<[number], Organization>('SELECT * FROM organizations WHERE id = ?').get(id);
    },
    createVolunteer(v: Pick<Volunteer, 'name' | 'email'> & Partial<Pick<Volunteer, 'phone' | 'location'>>): Volunteer {
      const email = v.email.toLowerCase().trim();
      const res = sqlite
        .prepare<[string, string, string | null, string | null]>('INSERT INTO volunteers(name, email, phone, location) VALUES(?, ?, ?, ?)')
        .run(v.name, email, v.phone ?? null, v.location ?? null);
      return { id: Number(res.lastInsertRowid), name: v.name, email, phone: v.phone ?? null, location: v.location ?? null, total_value_generated: 0 };
    },
    getVolunteer(id: number): Volunteer | undefined {
      return sqlite.prepare<[number], Volunteer>('SELECT * FROM volunteers WHERE id = ?').get(id);
    },
    sumCompletedValue(volunteerId: number): number {
      const row = sqlite.prepare<[number], { total: number | null }>(
        `SELECT SUM(monetization_value) AS total FROM engagements
         WHERE volunteer_id = ? AND completion_status = 'completed' AND approval_status = 'approved'`,
      ).get(volunteerId);
      return row?.total ?? 0;
    },
    setVolunteerTotal(volunteerId: number, total: number) {
      sqlite.prepare<[number, number]>('UPDATE volunteers SET total_value_generated = ? WHERE id = ?').run(total, volunteerId);
    },

    // tasks
    insertTask(organizationId: number, input: TaskInput, createdAt: string): Task {
      const cols = TASK_COLUMNS.join(', ');
      const params = TASK_COLUMNS.map(c => '@' + c).join(', ');
      const res = sqlite
        .prepare<Record<string, string | number | null>>(
          `INSERT INTO tasks(organization_id, ${cols}, created_at) VALUES(@organization_id, ${params}, @created_at)`,
        )
        .run({ ...taskParams(input), organization_id: organizationId, created_at: createdAt });
      const task = getTask(Number(res.lastInsertRowid));
      if (!task) throw new Error('task insert not visible');
      return task;
    },
    getTask,
    updateTask(id: number, input: TaskInput) {
      const sets = TASK_COLUMNS.map(c => `${c} = @${c}`).join(', ');
      sqlite.prepare<Record<string, string | number | null>>(`UPDATE tasks SET ${sets} WHERE id = @id`).run({ ...taskParams(input), id });
    },
    setTaskStatus(id: number, status: TaskStatus, reason: ClosedReason | null) {
      sqlite.prepare<[TaskStatus, ClosedReason | null, number]>('UPDATE tasks SET status = ?, closed_reason = ? WHERE id = ?').run(status, reason, id);
    },
    markTaskDeleted(id: number) {
      sqlite.prepare<[number]>('UPDATE tasks SET is_deleted = 1 WHERE id = ?').run(id);
    },
    listOrganizationTasks(organizationId: number, opts: { includeDeleted?: boolean } = {}): TaskWithCounts[] {
      const rows = sqlite.prepare<[number, Flag], TaskRow & { approved_count: number; pending_count: number }>(
        `SELECT t.*,
           COUNT(CASE WHEN ${approvedSlot('e.')} THEN 1 END) AS approved_count,
           COUNT(CASE WHEN e.approval_status = 'pending' THEN 1 END) AS pending_count
         FROM tasks t
         LEFT JOIN engagements e ON e.task_id = t.id
         WHERE t.organization_id = ? AND (t.is_deleted = 0 OR ? = 1)
         GROUP BY t.id
         ORDER BY t.id DESC`,
      ).all(organizationId, opts.includeDeleted ? 1 : 0);
      return rows.map(r => ({ ...toTask(r), approved_count: r.approved_count, pending_count: r.pending_count }));
    },
    listAvailableTasks(volunteerId: number, filter: AvailableTaskFilter = {}): AvailableTaskRow[] {
      const where = ['t.is_deleted = 0'];
      const params: Record<string, string | number> = { volunteer_id: volunteerId };
      if (filter.city) { where.push(`t.location LIKE '%' || @city || '%'`); params.city = filter.city; }
      if (filter.status && filter.status !== 'all') { where.push('t.status = @status'); params.status = filter.status; }
      if (filter.category) { where.push('t.category = @category'); params.category = filter.category; }
      if (filter.maxHours && filter.maxHours > 0) { where.push('t.hours_per_day <= @max_hours'); params.max_hours = filter.maxHours; }
      const rows = sqlite.prepare<Record<string, string | number>, TaskRow & {
        approved_count: number; pending_count: number; organization_name: string; already_applied: Flag;
      }>(
        `SELECT t.*, o.name AS organization_name,
           (SELECT COUNT(*) FROM engagements e WHERE e.task_id = t.id AND ${approvedSlot('e.')}) AS approved_count,
           (SELECT COUNT(*) FROM engagements e WHERE e.task_id = t.id AND e.approval_status = 'pending') AS pending_count,
           EXISTS (SELECT 1 FROM engagements e WHERE e.task_id = t.id AND e.volunteer_id = @volunteer_id) AS already_applied
         FROM tasks t
         JOIN organizations o ON o.id = t.organization_id
         WHERE ${where.join(' AND ')}
         ORDER BY t.id DESC`,
      ).all(params);
      return rows.map(r => ({
        ...toTask(r),
        approved_count: r.approved_count,
        pending_count: r.pending_count,
        organization_name: r.organization_name,
        already_applied: r.already_applied === 1,
      }));
    },

    // engagements
    insertEngagement(e: NewEngagement): Engagement {
      let res: Database.RunResult;
      try {
        res = sqlite.prepare<NewEngagement>(
          `INSERT INTO engagements(task_id, volunteer_id, availability_date, hours_committed, contact_email, contact_phone, motivation, created_at)
           VALUES(@task_id, @volunteer_id, @availability_date, @hours_committed, @contact_email, @contact_phone, @motivation, @created_at)`,
        ).run(e);
      } catch (err) {
        if (sqliteErrorCode(err) === 'SQLITE_CONSTRAINT_UNIQUE') throw new DuplicateEngagementError(e.task_id, e.volunteer_id);
        throw err;
      }
      const created = getEngagement(Number(res.lastInsertRowid));
      if (!created) throw new Error('engagement insert not visible');
      return created;
    },
    getEngagement,
    findEngagement(taskId: number, volunteerId: number): Engagement | undefined {
      const row = sqlite.prepare<[number, number], EngagementRow>('SELECT * FROM engagements WHERE task_id = ? AND volunteer_id = ?').get(taskId, volunteerId);
      return row && toEngagement(row);
    },
    updateEngagement(id: number, patch: EngagementPatch) {
      const params: Record<string, string | number | null> = { id };
      const sets: string[] = [];
      if (patch.approval_status !== undefined) { sets.push('approval_status = @approval_status'); params.approval_status = patch.approval_status; }
      if (patch.completion_status !== undefined) { sets.push('completion_status = @completion_status'); params.completion_status = patch.completion_status; }
      if (patch.monetization_value !== undefined) { sets.push('monetization_value = @monetization_value'); params.monetization_value = patch.monetization_value; }
      if (patch.completion_note !== undefined) { sets.push('completion_note = @completion_note'); params.completion_note = patch.completion_note; }
      if (patch.certificate_sent !== undefined) { sets.push('certificate_sent = @certificate_sent'); params.certificate_sent = patch.certificate_sent ? 1 : 0; }
      if (!sets.length) return;
      sqlite.prepare<Record<string, string | number | null>>(`UPDATE engagements SET ${sets.join(', ')} WHERE id = @id`).run(params);
    },
    deleteEngagement(id: number) {
      sqlite.prepare<[number]>('DELETE FROM engagements WHERE id = ?').run(id);
    },
    countApproved(taskId: number): number {
      const row = sqlite.prepare<[number], { count: number }>(`SELECT COUNT(*) AS count FROM engagements WHERE task_id = ? AND ${approvedSlot()}`).get(taskId);
      return row?.count ?? 0;
    },
    listTaskEngagements(taskId: number, approval?: ApprovalStatus): Engagement[] {
      const rows = approval
        ? sqlite.prepare<[number, ApprovalStatus], EngagementRow>('SELECT * FROM engagements WHERE task_id = ? AND approval_status = ? ORDER BY id').all(taskId, approval)
        : sqlite.prepare<[number], EngagementRow>('SELECT * FROM engagements WHERE task_id = ? ORDER BY id').all(taskId);
      return rows.map(toEngagement);
    },
    listTaskVolunteers(taskId: number): EngagementWithVolunteer[] {
      return sqlite.prepare<[number], EngagementRow & { volunteer_name: string; volunteer_email: string; volunteer_location: string | null }>(
        `SELECT e.*, v.name AS volunteer_name, v.email AS volunteer_email, v.location AS volunteer_location
         FROM engagements e JOIN volunteers v ON v.id = e.volunteer_id
         WHERE e.task_id = ?
         ORDER BY e.created_at DESC, e.id DESC`,
      ).all(taskId).map(r => ({ ...r, ...toEngagement(r) }));
    },
    listOrganizationEngagements(organizationId: number): OrganizationEngagement[] {
      return sqlite.prepare<[number], EngagementRow & {
        volunteer_name: string; volunteer_email: string; volunteer_location: string | null; task_title: string; task_category: string | null;
      }>(
        `SELECT e.*, v.name AS volunteer_name, v.email AS volunteer_email, v.location AS volunteer_location,
           t.title AS task_title, t.category AS task_category
         FROM engagements e
         JOIN tasks t ON t.id = e.task_id
         JOIN volunteers v ON v.id = e.volunteer_id
         WHERE t.organization_id = ?
         ORDER BY e.created_at DESC, e.id DESC`,
      ).all(organizationId).map(r => ({ ...r, ...toEngagement(r) }));
    },
    listVolunteerEngagements(volunteerId: number): EngagementWithTask[] {
      return sqlite.prepare<[number], EngagementRow & {
        task_title: string; task_category: string | null; task_status: TaskStatus; task_is_deleted: Flag; organization_id: number; organization_name: string;
      }>(
        `SELECT e.*, t.title AS task_title, t.category AS task_category, t.status AS task_status, t.is_deleted AS task_is_deleted,
           t.organization_id AS organization_id, o.name AS organization_name
         FROM engagements e
         JOIN tasks t ON t.id = e.task_id
         JOIN organizations o ON o.id = t.organization_id
         WHERE e.volunteer_id = ?
         ORDER BY e.created_at DESC, e.id DESC`,
      ).all(volunteerId).map(r => ({ ...r, ...toEngagement(r), task_is_deleted: r.task_is_deleted === 1 }));
    },

    // notifications
    insertNotification(n: NewNotification): Notification {
      const res = sqlite.prepare<NewNotification>(
        `INSERT INTO notifications(recipient_type, recipient_id, message, type, related_id, created_at)
         VALUES(@recipient_type, @recipient_id, @message, @type, @related_id, @created_at)`,
      ).run(n);
      return { ...n, id: Number(res.lastInsertRowid), is_read: false };
    },
    getNotification(id: number): Notification | undefined {
      const row = sqlite.prepare<[number], NotificationRow>('SELECT * FROM notifications WHERE id = ?').get(id);
      return row && toNotification(row);
    },
    markNotificationRead(id: number) {
      sqlite.prepare<[number]>('UPDATE notifications SET is_read = 1 WHERE id = ?').run(id);
    },
    listUnreadNotifications(recipientType: RecipientType, recipientId: number): Notification[] {
      return sqlite.prepare<[RecipientType, number], NotificationRow>(
        `SELECT * FROM notifications WHERE recipient_type = ? AND recipient_id = ? AND is_read = 0
         ORDER BY created_at DESC, id DESC`,
      ).all(recipientType, recipientId).map(toNotification);
    },
  };
}

export type VolunteerHubDb = ReturnType<typeof openDb>;
