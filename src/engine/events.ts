import type { EventLogEntry } from '../models/types.js';
import { logger } from '../logger.js';

// In-process structured log of pipeline milestones. Bounded; oldest entries drop first.
const MAX_EVENTS = 1000;
const events: EventLogEntry[] = [];
let seq = 0;

export function logEvent(type: string, payload: Record<string, unknown> = {}, correlation_id?: string) {
  events.push({ id: `${Date.now()}-${seq++}`, ts: new Date().toISOString(), type, correlation_id, payload });
  if (events.length > MAX_EVENTS) events.shift();
  logger.debug(`[event] ${type}`, payload);
}

export function getEvents(filter?: { type?: string; correlation_id?: string }) {
  if (!filter) return [...events];
  return events.filter(e =>
    (filter.type ? e.type === filter.type : true) &&
    (filter.correlation_id ? e.correlation_id === filter.correlation_id : true));
}

export function clearEvents() {
  events.length = 0;
}
