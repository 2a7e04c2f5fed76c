import { describe, it, expect, beforeEach } from 'vitest';
import { makeHub, taskDraft, application } from './helpers.js';
import {
  CapacityExceededError,
  DuplicateEngagementError,
  ForbiddenError,
  InvalidTransitionError,
  NotFoundError,
  TaskClosedError,
  ValidationError,
} from '../src/engine/errors.js';
import { clearEvents, getEvents } from '../src/engine/events.js';

let ctx: ReturnType<typeof makeHub>;

beforeEach(() => {
  ctx = makeHub();
  clearEvents();
});

describe('single-slot task scenario', () => {
  it('approving the only slot closes the task and completion credits 1200', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());

    const applied = await hub.apply(a, task.id, application());
    expect(applied.engagement?.approval_status).toBe('pending');
    expect(applied.engagement?.completion_status).toBe('accepted');
    expect(applied.engagement?.availability_date).toBe('2025-03-10');
    expect(applied.engagement?.hours_committed).toBe(4);
    expect(applied.task.status).toBe('open');
    const engagementId = applied.engagement?.id ?? -1;

    const approved = await hub.approve(ngo, engagementId);
    expect(approved.capacity).toBe('auto_closed');
    expect(approved.task.status).toBe('closed');
    expect(approved.task.closed_reason).toBe('capacity');
    expect(hub.task(task.id).display_status).toBe('full');

    const completed = await hub.complete(ngo, engagementId);
    expect(completed.engagement?.completion_status).toBe('completed');
    expect(completed.engagement?.monetization_value).toBe(1200);
    expect(hub.db.getVolunteer(a.id)?.total_value_generated).toBe(1200);
    expect(hub.engagement(engagementId).display_label).toBe('Completed');

    expect(getEvents({ prefix: 'engagement.' }).map(e => e.type)).toEqual([
      'engagement.apply',
      'engagement.approve',
      'engagement.complete',
    ]);
    expect(getEvents({ type: 'task.auto_closed' })).toHaveLength(1);
  });

  it('withdrawing the approved volunteer reopens a capacity-closed task', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const { engagement } = await hub.apply(a, task.id, application());
    const id = engagement?.id ?? -1;
    await hub.approve(ngo, id);

    const out = await hub.withdraw(a, id);
    expect(out.engagement).toBeNull();
    expect(out.capacity).toBe('auto_reopened');
    expect(out.task.status).toBe('open');
    expect(out.task.closed_reason).toBeNull();
    expect(hub.db.getEngagement(id)).toBeUndefined();
    expect(hub.task(task.id).display_status).toBe('open');
  });

  it('never reopens a task the NGO closed by hand', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft({ max_volunteers: 2 }));
    const { engagement } = await hub.apply(a, task.id, application());
    const id = engagement?.id ?? -1;
    await hub.approve(ngo, id);

    const closed = await hub.closeTask(ngo, task.id);
    expect(closed.closed_reason).toBe('manual');

    const out = await hub.remove(ngo, id);
    expect(out.capacity).toBe('unchanged');
    expect(out.task.status).toBe('closed');
    expect(out.task.closed_reason).toBe('manual');
    expect(hub.task(task.id).display_status).toBe('closed');
  });

  it('marking not completed frees the slot and records the note', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const { engagement } = await hub.apply(a, task.id, application());
    const id = engagement?.id ?? -1;
    await hub.approve(ngo, id);

    await expect(hub.markNotCompleted(ngo, id, '   ')).rejects.toBeInstanceOf(ValidationError);

    const out = await hub.markNotCompleted(ngo, id, 'Did not show up');
    expect(out.engagement?.completion_status).toBe('not_completed');
    expect(out.engagement?.completion_note).toBe('Did not show up');
    expect(out.engagement?.monetization_value).toBe(0);
    expect(out.capacity).toBe('auto_reopened');
    expect(hub.engagement(id).display_label).toBe('Not Completed');
    expect(hub.db.getVolunteer(a.id)?.total_value_generated).toBe(0);
  });
});

describe('apply', () => {
  it('allows exactly one engagement per volunteer and task', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft({ max_volunteers: 3 }));
    await hub.apply(a, task.id, application());
    await expect(hub.apply(a, task.id, application())).rejects.toBeInstanceOf(DuplicateEngagementError);
    expect(hub.db.listTaskEngagements(task.id)).toHaveLength(1);
  });

  it('settles concurrent duplicate submissions to one engagement', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft({ max_volunteers: 3 }));
    const results = await Promise.allSettled([
      hub.apply(a, task.id, application()),
      hub.apply(a, task.id, application()),
    ]);
    expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
    const failed = results.find(r => r.status === 'rejected');
    expect(failed?.status === 'rejected' && failed.reason instanceof DuplicateEngagementError).toBe(true);
    expect(hub.db.listTaskEngagements(task.id)).toHaveLength(1);
  });

  it('falls back to the unique index when the guard is bypassed', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const row = {
      task_id: task.id,
      volunteer_id: a.id,
      availability_date: '2025-03-10',
      hours_committed: 4,
      contact_email: 'asha@example.org',
      contact_phone: '555-0101',
      motivation: 'Happy to help',
      created_at: '2025-03-01T09:00:00.000Z',
    };
    hub.db.insertEngagement(row);
    expect(() => hub.db.insertEngagement(row)).toThrow(DuplicateEngagementError);
  });

  it('requires the contact details and motivation', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    await expect(hub.apply(a, task.id, application({ motivation: '' }))).rejects.toThrow('Motivation is required.');
    await expect(hub.apply(a, task.id, application({ contact_phone: ' ' }))).rejects.toThrow('Contact phone is required.');
    expect(hub.db.listTaskEngagements(task.id)).toHaveLength(0);
  });

  it('keeps optional availability and hours when given', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft({ end_date: '2025-03-12' }));
    const { engagement } = await hub.apply(a, task.id, application({ availability_date: '2025-03-11', hours_committed: 2 }));
    expect(engagement?.availability_date).toBe('2025-03-11');
    expect(engagement?.hours_committed).toBe(2);
  });

  it('refuses closed and deleted tasks', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const b = addVolunteer('Bilal');
    const task = await hub.createTask(ngo, taskDraft());
    const { engagement } = await hub.apply(a, task.id, application());
    await hub.approve(ngo, engagement?.id ?? -1);
    await expect(hub.apply(b, task.id, application())).rejects.toBeInstanceOf(TaskClosedError);

    const other = await hub.createTask(ngo, taskDraft({ title: 'Park cleanup' }));
    await hub.softDelete(ngo, other.id, 'Venue unavailable');
    await expect(hub.apply(b, other.id, application())).rejects.toBeInstanceOf(NotFoundError);
  });

  it('is only open to volunteers', async () => {
    const { hub, ngo } = ctx;
    const task = await hub.createTask(ngo, taskDraft());
    await expect(hub.apply(ngo, task.id, application())).rejects.toBeInstanceOf(ForbiddenError);
  });
});

describe('approve and reject', () => {
  it('never approves past the volunteer limit, even when racing', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const b = addVolunteer('Bilal');
    const task = await hub.createTask(ngo, taskDraft());
    const ea = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;
    const eb = (await hub.apply(b, task.id, application())).engagement?.id ?? -1;

    const results = await Promise.allSettled([hub.approve(ngo, ea), hub.approve(ngo, eb)]);
    expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
    const failed = results.find(r => r.status === 'rejected');
    expect(failed?.status === 'rejected' && failed.reason instanceof CapacityExceededError).toBe(true);
    expect(hub.capacity.approvedCount(task.id)).toBe(1);
  });

  it('only moves pending applications', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft({ max_volunteers: 2 }));
    const id = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;
    await hub.approve(ngo, id);
    await expect(hub.approve(ngo, id)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(hub.reject(ngo, id)).rejects.toThrow('Only pending applications can be rejected (this one is approved).');
  });

  it('lets a rejected volunteer clear the record and reapply', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft({ max_volunteers: 2 }));
    const id = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;

    const rejected = await hub.reject(ngo, id);
    expect(rejected.engagement?.approval_status).toBe('rejected');
    expect(hub.engagement(id).display_label).toBe('Rejected');
    await expect(hub.apply(a, task.id, application())).rejects.toBeInstanceOf(DuplicateEngagementError);

    await hub.withdraw(a, id);
    const again = await hub.apply(a, task.id, application());
    expect(again.engagement?.approval_status).toBe('pending');
  });

  it('hides other organizations\' engagements', async () => {
    const { hub, ngo, addNgo, addVolunteer } = ctx;
    const other = addNgo('Other Org');
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const id = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;
    await expect(hub.approve(other, id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(hub.approve(a, id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(hub.approve(ngo, 9999)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('completion and removal', () => {
  it('only reviews approved, unreviewed engagements', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const id = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;
    await expect(hub.complete(ngo, id)).rejects.toThrow('Only approved volunteers can be reviewed.');
    await hub.approve(ngo, id);
    await hub.complete(ngo, id);
    await expect(hub.complete(ngo, id)).rejects.toThrow('This engagement has already been reviewed.');
    await expect(hub.withdraw(a, id)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it('removing a completed volunteer takes their value back out', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const id = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;
    await hub.approve(ngo, id);
    await hub.complete(ngo, id);
    expect(hub.db.getVolunteer(a.id)?.total_value_generated).toBe(1200);

    const out = await hub.remove(ngo, id);
    expect(out.capacity).toBe('auto_reopened');
    expect(hub.db.getVolunteer(a.id)?.total_value_generated).toBe(0);
  });

  it('cannot remove a volunteer who was never approved', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const id = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;
    await expect(hub.remove(ngo, id)).rejects.toThrow('Only approved volunteers can be removed.');
  });

  it('fails on engagements of a deleted task', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const id = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;
    await hub.softDelete(ngo, task.id, 'Cancelled');
    await expect(hub.approve(ngo, id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(hub.withdraw(a, id)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('sendCertificate', () => {
  it('notifies the volunteer once, after completion', async () => {
    const { hub, ngo, addVolunteer } = ctx;
    const a = addVolunteer('Asha');
    const task = await hub.createTask(ngo, taskDraft());
    const id = (await hub.apply(a, task.id, application())).engagement?.id ?? -1;
    await hub.approve(ngo, id);
    await expect(hub.sendCertificate(ngo, id)).rejects.toThrow('Certificates can only be sent for completed tasks.');
    await hub.complete(ngo, id);

    const out = await hub.sendCertificate(ngo, id);
    expect(out.engagement?.certificate_sent).toBe(true);
    const unread = hub.unreadNotifications('volunteer', a.id);
    expect(unread).toHaveLength(1);
    expect(unread[0]?.type).toBe('certificate_sent');
    expect(unread[0]?.related_id).toBe(id);
    expect(unread[0]?.message).toBe("Your certificate for 'Food bank shift' has been sent to your email/phone number.");

    await expect(hub.sendCertificate(ngo, id)).rejects.toThrow('A certificate has already been sent.');
  });
});
