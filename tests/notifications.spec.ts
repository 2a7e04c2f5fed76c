import { describe, it, expect } from 'vitest';
import { makeHub, taskDraft, application } from './helpers.js';
import { ForbiddenError, NotFoundError } from '../src/engine/errors.js';

async function deletedTaskNotice() {
  const ctx = makeHub();
  const { hub, ngo, addVolunteer } = ctx;
  const a = addVolunteer('Asha');
  const task = await hub.createTask(ngo, taskDraft());
  await hub.apply(a, task.id, application());
  await hub.softDelete(ngo, task.id, 'Rained out');
  const [notice] = hub.unreadNotifications('volunteer', a.id);
  if (!notice) throw new Error('expected a notification');
  return { ...ctx, a, notice };
}

describe('NotificationDispatcher', () => {
  it('writes notifications unread and lists them newest first', () => {
    const { hub, addVolunteer } = makeHub();
    const a = addVolunteer('Asha');
    const first = hub.notifications.notify('volunteer', a.id, 'first', 'task_updated', 1);
    const second = hub.notifications.notify('volunteer', a.id, 'second', 'task_updated', 1);
    expect(first.is_read).toBe(false);
    expect(hub.notifications.unread('volunteer', a.id).map(n => n.id)).toEqual([second.id, first.id]);
    expect(hub.notifications.unread('ngo', a.id)).toEqual([]);
  });

  it('lets the recipient mark a notification read', async () => {
    const { hub, a, notice } = await deletedTaskNotice();
    const read = hub.markNotificationRead(a, notice.id);
    expect(read.is_read).toBe(true);
    expect(hub.unreadNotifications('volunteer', a.id)).toEqual([]);
    expect(hub.markNotificationRead(a, notice.id).is_read).toBe(true);
  });

  it('refuses anyone but the recipient', async () => {
    const { hub, ngo, addVolunteer, notice } = await deletedTaskNotice();
    const b = addVolunteer('Bilal');
    expect(() => hub.markNotificationRead(b, notice.id)).toThrow(NotFoundError);
    expect(() => hub.markNotificationRead(ngo, notice.id)).toThrow(ForbiddenError);
    expect(() => hub.markNotificationRead(b, 4242)).toThrow(NotFoundError);
  });
});
