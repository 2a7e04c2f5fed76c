#!/usr/bin/env node
/**
 * Walks one single-slot task through apply, approve, withdraw, reapply and
 * completion, then prints the event journal.
 * Usage: npm run simulate -- [--db data/demo.db]
 */

import { createVolunteerHub, getEvents, isHubError, loadConfig, openDb } from '../src/index.js';
import type { Actor } from '../src/index.js';

function parseArgs() {
  const argv = process.argv.slice(2);
  let dbPath = ':memory:';
  for (let i = 0; i < argv.length; i++) {
    const next = argv[i + 1];
    if (argv[i] === '--db' && next) { dbPath = next; i++; }
  }
  return { dbPath };
}

async function main() {
  const { dbPath } = parseArgs();
  const config = loadConfig();
  const hub = createVolunteerHub({ config, db: openDb(dbPath, { busyTimeoutMs: config.DB_BUSY_TIMEOUT_MS }) });
  const stamp = Date.now();
  const org = hub.db.createOrganization({ name: 'Riverside Shelter', email: `shelter+${stamp}@example.org` });
  const ngo: Actor = { role: 'ngo', id: org.id, name: org.name };
  const volunteer = (name: string): Actor => {
    const v = hub.db.createVolunteer({ name, email: `${name.toLowerCase()}+${stamp}@example.org` });
    return { role: 'volunteer', id: v.id, name };
  };
  const asha = volunteer('Asha');
  const bilal = volunteer('Bilal');

  const task = await hub.createTask(ngo, {
    title: 'Soup kitchen lunch service',
    description: 'Serve lunch and clean up afterwards',
    location: 'Riverside',
    address: '4 Mill Lane',
    contact_email: `shelter+${stamp}@example.org`,
    contact_phone: '555-0100',
    start_date: '2025-06-14',
    end_date: '2025-06-14',
    hours_per_day: 4,
    max_volunteers: 1,
    wage_rate: 300,
  });
  console.log('--- Lifecycle Simulation ---');
  console.log(`Task #${task.id} "${task.title}" (${hub.task(task.id).display_status})`);

  const contact = { contact_phone: '555-0101', motivation: 'I cook at home every day' };
  const first = await hub.apply(asha, task.id, { ...contact, contact_email: 'asha@example.org' });
  const firstId = first.engagement?.id ?? -1;
  await hub.approve(ngo, firstId);
  console.log('After approval:', hub.task(task.id).display_status);

  try {
    await hub.apply(bilal, task.id, { ...contact, contact_email: 'bilal@example.org' });
  } catch (err) {
    if (!isHubError(err)) throw err;
    console.log(`Bilal's application refused: ${err.userMessage}`);
  }

  await hub.withdraw(asha, firstId);
  console.log('After withdrawal:', hub.task(task.id).display_status);

  const second = await hub.apply(bilal, task.id, { ...contact, contact_email: 'bilal@example.org' });
  const secondId = second.engagement?.id ?? -1;
  await hub.approve(ngo, secondId);
  const done = await hub.complete(ngo, secondId);
  await hub.sendCertificate(ngo, secondId);
  console.log(`Bilal completed the task, value ${done.engagement?.monetization_value ?? 0}`);
  console.log('Stats:', JSON.stringify(hub.volunteerStats(bilal.id)));
  console.log('Unread:', hub.unreadNotifications('volunteer', bilal.id).map(n => n.message));

  console.log('\nEvents:');
  for (const e of getEvents()) console.log(`${e.ts} ${e.type} ${JSON.stringify(e.payload)}`);
  hub.close();
}

main().catch(err => {
  console.error('Simulation failed:', err);
  process.exit(1);
});
