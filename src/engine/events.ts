import type { EventLogEntry } from '../models/types.js';

// In-process transition journal; bounded so long-running processes do not grow it forever.
const MAX_EVENTS = 1000;
const events: EventLogEntry[] = [];
let seq = 0;

export function logEvent(type: string, payload: Record<string, unknown>, correlation_id?: string) {
  const entry: EventLogEntry = { id: `${Date.now()}-${seq++}`, ts: new Date().toISOString(), type, correlation_id, payload };
  events.push(entry);
  if (events.length > MAX_EVENTS) events.shift();
  if (process.env.DEBUG_EVENTS) console.debug('[event]', type, JSON.stringify(payload));
  return entry;
}

export function getEvents(filter?: { type?: string; prefix?: string }) {
  if (!filter) return [...events];
  return events.filter(e =>
    (filter.type ? e.type === filter.type : true) && (filter.prefix ? e.type.startsWith(filter.prefix) : true));
}

export function clearEvents() {
  events.length = 0;
}
