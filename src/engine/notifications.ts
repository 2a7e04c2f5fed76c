import { ForbiddenError, NotFoundError } from './errors.js';
import { logEvent } from './events.js';
import { renderTemplate } from './templates.js';
import type { CacheInvalidator } from './read_cache.js';
import type { VolunteerHubDb } from '../adapters/db.js';
import type { Actor, Engagement, Notification, NotificationType, RecipientType, Task } from '../models/types.js';

type NotificationStore = Pick<VolunteerHubDb,
  'insertNotification' | 'getNotification' | 'markNotificationRead' | 'listUnreadNotifications' | 'transaction'>;

/** Writes user-facing notifications as side effects of lifecycle transitions. */
export class NotificationDispatcher {
  constructor(
    private readonly db: NotificationStore,
    private readonly invalidator?: CacheInvalidator,
    private readonly now: () => Date = () => new Date(),
  ) {}

  notify(recipientType: RecipientType, recipientId: number, message: string, type: NotificationType, relatedId: number | null): Notification {
    const n = this.db.insertNotification({
      recipient_type: recipientType,
      recipient_id: recipientId,
      message,
      type,
      related_id: relatedId,
      created_at: this.now().toISOString(),
    });
    logEvent('notification.created', { id: n.id, type, recipient: `${recipientType}:${recipientId}`, related_id: relatedId });
    return n;
  }

  taskDeleted(task: Pick<Task, 'id' | 'title'>, reason: string, volunteerIds: number[]): Notification[] {
    const message = renderTemplate('task_deleted', { title: task.title, reason });
    return volunteerIds.map(v => this.notify('volunteer', v, message, 'task_deleted', task.id));
  }

  taskUpdated(task: Pick<Task, 'id' | 'title'>, changedFields: string[], volunteerIds: number[]): Notification[] {
    if (!changedFields.length) return [];
    const message = renderTemplate('task_updated', {
      title: task.title,
      changes: changedFields.join(', '),
      plural: changedFields.length > 1,
    });
    return volunteerIds.map(v => this.notify('volunteer', v, message, 'task_updated', task.id));
  }

  certificateSent(task: Pick<Task, 'title'>, engagement: Pick<Engagement, 'id' | 'volunteer_id'>): Notification {
    const message = renderTemplate('certificate_sent', { title: task.title });
    return this.notify('volunteer', engagement.volunteer_id, message, 'certificate_sent', engagement.id);
  }

  unread(recipientType: RecipientType, recipientId: number): Notification[] {
    return this.db.listUnreadNotifications(recipientType, recipientId);
  }

  /** Only the recipient may mark a notification read; marking twice is harmless. */
  markRead(actor: Actor, notificationId: number): Notification {
    const updated = this.db.transaction(() => {
      const n = this.db.getNotification(notificationId);
      if (!n) throw new NotFoundError('notification', notificationId);
      if (n.recipient_type !== actor.role) throw new ForbiddenError(`notification ${notificationId} is not addressed to a ${actor.role}`);
      if (n.recipient_id !== actor.id) throw new NotFoundError('notification', notificationId);
      if (!n.is_read) this.db.markNotificationRead(notificationId);
      return { ...n, is_read: true };
    });
    this.invalidator?.invalidate(
      actor.role === 'volunteer' ? { volunteerIds: [actor.id] } : { organizationIds: [actor.id] },
    );
    return updated;
  }
}
