import { z } from 'zod';
import type { Db } from '../adapters/db.js';
import { ATTENDANCE_STATUSES, AttendanceRecord, EventRecord, EventStatus, Player } from '../models/types.js';
import type { ReadQuery } from '../agent/decision.js';
import type { IdentityResolver } from './identity.js';
import { logEvent } from './events.js';
import { dayBounds } from '../util/time.js';
import { logger } from '../logger.js';

export interface SetStatusAction {
  kind: 'set_status';
  status: string;
  targetKey?: string;
  originalMessage?: string;
  confidence?: number;
}

export interface QueryAction {
  kind: 'query';
  query: ReadQuery;
  date?: string; // YYYY-MM-DD; omitted means the next upcoming event
}

export type Action = SetStatusAction | QueryAction;

export interface EventDetails {
  event_id: string;
  start_time: string;
  location: string;
  capacity: number;
  status: EventStatus;
  confirmed: number;
}

export interface RosterStatus {
  event_id: string;
  start_time: string;
  capacity: number;
  confirmed: string[];
  maybe: string[];
  declined: string[];
  pending: string[];
}

export interface StatusSetOutcome {
  ok: true;
  kind: 'status_set';
  player: Player;
  event: EventRecord;
  record: AttendanceRecord;
  confirmed: number;
}

export type QueryOutcome =
  | { ok: true; kind: 'query'; query: 'event_details'; data: EventDetails }
  | { ok: true; kind: 'query'; query: 'roster_status'; data: RosterStatus };

export interface FailedOutcome {
  ok: false;
  error: 'no_upcoming_event' | 'invalid_status' | 'identity_not_found';
  detail?: string;
}

export type Outcome = StatusSetOutcome | QueryOutcome | FailedOutcome;

export interface DispatchExecutor {
  apply(action: SetStatusAction, identityKey: string): Promise<StatusSetOutcome | FailedOutcome>;
  apply(action: QueryAction, identityKey: string): Promise<QueryOutcome | FailedOutcome>;
  apply(action: Action, identityKey: string): Promise<Outcome>;
}

const statusSchema = z.string().trim().toLowerCase().pipe(z.enum(ATTENDANCE_STATUSES));

export interface DispatchOptions {
  timezone: string;
  now?: () => Date;
}

/**
 * Single place where attendance is written. Upserts are last-write-wins on
 * (event, player); the store's unique constraint makes concurrent writes converge.
 */
export function createDispatchExecutor(db: Db, identity: IdentityResolver, opts: DispatchOptions): DispatchExecutor {
  const now = opts.now ?? (() => new Date());

  function findEvent(date?: string): EventRecord | undefined {
    if (!date || date.trim().toLowerCase() === 'next') return db.getNextEvent(now());
    const bounds = dayBounds(date, opts.timezone);
    if (!bounds) return db.getNextEvent(now());
    return db.getEventOnDay(bounds.start, bounds.end);
  }

  async function setStatus(action: SetStatusAction, identityKey: string): Promise<StatusSetOutcome | FailedOutcome> {
    const parsed = statusSchema.safeParse(action.status);
    if (!parsed.success) {
      logEvent('attendance.rejected', { identityKey, status: action.status });
      return { ok: false, error: 'invalid_status', detail: action.status };
    }
    if (action.targetKey && identity.resolve(action.targetKey) !== identity.resolve(identityKey)) {
      logger.warn('[dispatch] ignoring target', action.targetKey, 'for sender', identityKey);
    }
    const player = identity.lookup(identityKey);
    if (!player) return { ok: false, error: 'identity_not_found' };
    const event = db.getNextEvent(now());
    if (!event) return { ok: false, error: 'no_upcoming_event' };

    const record = db.upsertAttendance({
      event_id: event.id,
      player_id: player.id,
      status: parsed.data,
      original_message: action.originalMessage ?? null,
      confidence: action.confidence ?? null,
    });
    const confirmed = db.countByStatus(event.id, 'confirmed');
    logEvent('attendance.upserted', { event_id: event.id, player_id: player.id, status: record.status, confirmed });
    return { ok: true, kind: 'status_set', player, event, record, confirmed };
  }

  async function query(action: QueryAction): Promise<QueryOutcome | FailedOutcome> {
    const event = findEvent(action.date);
    if (!event) return { ok: false, error: 'no_upcoming_event' };
    if (action.query === 'event_details') {
      return {
        ok: true, kind: 'query', query: 'event_details',
        data: {
          event_id: event.id,
          start_time: event.start_time,
          location: event.location,
          capacity: event.capacity,
          status: event.status,
          confirmed: db.countByStatus(event.id, 'confirmed'),
        },
      };
    }
    const data: RosterStatus = { event_id: event.id, start_time: event.start_time, capacity: event.capacity, confirmed: [], maybe: [], declined: [], pending: [] };
    for (const entry of db.getRoster(event.id)) data[entry.status].push(entry.name);
    return { ok: true, kind: 'query', query: 'roster_status', data };
  }

  function apply(action: SetStatusAction, identityKey: string): Promise<StatusSetOutcome | FailedOutcome>;
  function apply(action: QueryAction, identityKey: string): Promise<QueryOutcome | FailedOutcome>;
  function apply(action: Action, identityKey: string): Promise<Outcome>;
  function apply(action: Action, identityKey: string): Promise<Outcome> {
    return action.kind === 'set_status' ? setStatus(action, identityKey) : query(action);
  }

  return { apply };
}
