import { createVolunteerHub, loadConfig, loadPolicies, openDb } from '../src/index.js';
import type { Actor, ApplicationInput, Policies, TaskDraft, WageEstimator } from '../src/index.js';

export function makeClock(start = '2025-03-01T09:00:00.000Z') {
  let t = new Date(start).getTime();
  return {
    now: () => new Date(t),
    advance(ms: number) { t += ms; },
  };
}

export function makeHub(opts: { estimator?: WageEstimator; policies?: Policies } = {}) {
  const clock = makeClock();
  const hub = createVolunteerHub({
    config: loadConfig({}),
    policies: opts.policies ?? loadPolicies('config/policies.yaml'),
    db: openDb(':memory:'),
    estimator: opts.estimator ?? null,
    now: clock.now,
  });
  const org = hub.db.createOrganization({ name: 'Helping Hands', email: 'ngo@example.org' });
  const ngo: Actor = { role: 'ngo', id: org.id, name: org.name };

  function addNgo(name: string): Actor {
    const row = hub.db.createOrganization({ name, email: `${name.toLowerCase().replace(/\s+/g, '.')}@example.org` });
    return { role: 'ngo', id: row.id, name };
  }

  function addVolunteer(name: string): Actor {
    const row = hub.db.createVolunteer({ name, email: `${name.toLowerCase()}@example.org`, location: 'Pune' });
    return { role: 'volunteer', id: row.id, name };
  }

  return { hub, clock, ngo, addNgo, addVolunteer };
}

export function taskDraft(overrides: Partial<TaskDraft> = {}): TaskDraft {
  return {
    title: 'Food bank shift',
    description: 'Sort and pack donations',
    location: 'Pune',
    address: '12 Market Road',
    contact_email: 'ngo@example.org',
    contact_phone: '555-0100',
    start_date: '2025-03-10',
    end_date: '2025-03-10',
    hours_per_day: 4,
    category: 'Food',
    max_volunteers: 1,
    wage_rate: 300,
    ...overrides,
  };
}

export function application(overrides: Partial<ApplicationInput> = {}): ApplicationInput {
  return {
    contact_email: 'volunteer@example.org',
    contact_phone: '555-0101',
    motivation: 'Happy to help',
    ...overrides,
  };
}
