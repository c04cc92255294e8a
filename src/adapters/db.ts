import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import {
  ATTENDANCE_STATUSES,
  type AttendanceRecord,
  type AttendanceStatus,
  type ConversationTurn,
  type EventRecord,
  type EventStatus,
  type Player,
  type RosterEntry,
  type TurnRole,
} from '../models/types.js';
import { StoreUnavailableError } from '../engine/errors.js';

// Uniqueness on players.identity_key and attendance(event_id, player_id) is what
// keeps concurrent deliveries safe. There is no application-level locking.
const SCHEMA = `
CREATE TABLE IF NOT EXISTS players (
  id TEXT PRIMARY KEY,
  identity_key TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL,
  language TEXT NOT NULL DEFAULT 'English',
  country TEXT NOT NULL DEFAULT 'Israel',
  active INTEGER NOT NULL DEFAULT 1,
  skill TEXT NOT NULL DEFAULT 'Intermediate',
  created_at TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS events (
  id TEXT PRIMARY KEY,
  start_time TEXT NOT NULL,
  location TEXT NOT NULL DEFAULT 'Beach Court 1',
  capacity INTEGER NOT NULL DEFAULT 4,
  status TEXT NOT NULL DEFAULT 'recruiting' CHECK (status IN ('recruiting','closed','cancelled')),
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS events_start_time ON events (start_time);
CREATE TABLE IF NOT EXISTS attendance (
  id TEXT PRIMARY KEY,
  event_id TEXT NOT NULL REFERENCES events(id) ON DELETE CASCADE,
  player_id TEXT NOT NULL REFERENCES players(id) ON DELETE CASCADE,
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending','confirmed','declined','maybe')),
  original_message TEXT,
  confidence REAL,
  updated_at TEXT NOT NULL,
  UNIQUE (event_id, player_id)
);
CREATE TABLE IF NOT EXISTS conversation_turns (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  identity_key TEXT NOT NULL,
  role TEXT NOT NULL CHECK (role IN ('inbound','outbound')),
  content TEXT NOT NULL,
  external_id TEXT UNIQUE,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS conversation_turns_identity ON conversation_turns (identity_key, seq);
`;

interface PlayerRow { id: string; identity_key: string; name: string; language: string; country: string; active: number; skill: string; created_at: string; }
interface EventRow { id: string; start_time: string; location: string; capacity: number; status: string; created_at: string; }
interface AttendanceRow { id: string; event_id: string; player_id: string; status: string; original_message: string | null; confidence: number | null; updated_at: string; }
interface TurnRow { seq: number; identity_key: string; role: string; content: string; external_id: string | null; created_at: string; }
interface RosterRow { player_id: string; name: string; status: string | null; }

export interface NewPlayer { identity_key: string; name: string; language?: string; country?: string; skill?: string; }
export interface NewEvent { start_time: string | Date; location?: string; capacity?: number; status?: EventStatus; }
export interface AttendanceUpsert { event_id: string; player_id: string; status: AttendanceStatus; original_message?: string | null; confidence?: number | null; }
export interface NewTurn { identity_key: string; role: TurnRole; content: string; external_id?: string | null; }

export interface DbOptions { now?: () => Date; }

function toPlayer(r: PlayerRow): Player {
  return { ...r, active: r.active === 1 };
}

function toEvent(r: EventRow): EventRecord {
  return { ...r, status: asEventStatus(r.status) };
}

function toAttendance(r: AttendanceRow): AttendanceRecord {
  return { ...r, status: asAttendanceStatus(r.status) };
}

function toTurn(r: TurnRow): ConversationTurn {
  return { ...r, role: r.role === 'outbound' ? 'outbound' : 'inbound' };
}

function asAttendanceStatus(s: string | null): AttendanceStatus {
  return ATTENDANCE_STATUSES.find(x => x === s) ?? 'pending';
}

function asEventStatus(s: string): EventStatus {
  return s === 'closed' || s === 'cancelled' ? s : 'recruiting';
}

function isoDate(v: string | Date) {
  const d = v instanceof Date ? v : new Date(v);
  if (Number.isNaN(d.getTime())) throw new RangeError(`Invalid date: ${String(v)}`);
  return d.toISOString();
}

// Driver failures (locked file, disk full, closed handle) surface as StoreUnavailableError.
// Programming errors such as a bad date pass through untouched.
function guard<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
  return (...args: A) => {
    try {
      return fn(...args);
    } catch (err) {
      if (err instanceof Database.SqliteError || (err instanceof TypeError && /database connection is not open/i.test(err.message))) {
        throw new StoreUnavailableError(`Store unavailable: ${err.message}`, { cause: err });
      }
      throw err;
    }
  };
}

export function createDb(file = ':memory:', opts: DbOptions = {}) {
  const now = opts.now ?? (() => new Date());
  const conn = new Database(file);
  conn.pragma('journal_mode = WAL');
  conn.pragma('foreign_keys = ON');
  conn.exec(SCHEMA);

  const stmt = {
    insertPlayer: conn.prepare<[string, string, string, string, string, string, string]>(
      `INSERT INTO players (id, identity_key, name, language, country, skill, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?) ON CONFLICT (identity_key) DO NOTHING`),
    playerByKey: conn.prepare<[string], PlayerRow>('SELECT * FROM players WHERE identity_key = ?'),
    playerById: conn.prepare<[string], PlayerRow>('SELECT * FROM players WHERE id = ?'),
    activePlayers: conn.prepare<[], PlayerRow>('SELECT * FROM players WHERE active = 1 ORDER BY created_at, name'),
    setActive: conn.prepare<[number, string]>('UPDATE players SET active = ? WHERE id = ?'),
    insertEvent: conn.prepare<[string, string, string, number, string, string], EventRow>(
      `INSERT INTO events (id, start_time, location, capacity, status, created_at)
       VALUES (?, ?, ?, ?, ?, ?) RETURNING *`),
    eventById: conn.prepare<[string], EventRow>('SELECT * FROM events WHERE id = ?'),
    nextEvent: conn.prepare<[string], EventRow>(
      'SELECT * FROM events WHERE start_time > ? ORDER BY start_time ASC LIMIT 1'),
    eventsBetween: conn.prepare<[string, string], EventRow>(
      'SELECT * FROM events WHERE start_time >= ? AND start_time < ? ORDER BY start_time ASC LIMIT 1'),
    setEventStatus: conn.prepare<[string, string]>('UPDATE events SET status = ? WHERE id = ?'),
    upsertAttendance: conn.prepare<[string, string, string, string, string | null, number | null, string], AttendanceRow>(
      `INSERT INTO attendance (id, event_id, player_id, status, original_message, confidence, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (event_id, player_id) DO UPDATE SET
         status = excluded.status,
         original_message = excluded.original_message,
         confidence = excluded.confidence,
         updated_at = excluded.updated_at
       RETURNING *`),
    attendanceFor: conn.prepare<[string, string], AttendanceRow>(
      'SELECT * FROM attendance WHERE event_id = ? AND player_id = ?'),
    attendanceCount: conn.prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM attendance WHERE event_id = ?'),
    countByStatus: conn.prepare<[string, string], { n: number }>(
      'SELECT COUNT(*) AS n FROM attendance WHERE event_id = ? AND status = ?'),
    roster: conn.prepare<[string], RosterRow>(
      `SELECT p.id AS player_id, p.name AS name, a.status AS status
       FROM players p LEFT JOIN attendance a ON a.player_id = p.id AND a.event_id = ?
       WHERE p.active = 1 OR a.id IS NOT NULL
       ORDER BY COALESCE(a.updated_at, p.created_at), p.name`),
    insertTurn: conn.prepare<[string, string, string, string | null, string], TurnRow>(
      `INSERT INTO conversation_turns (identity_key, role, content, external_id, created_at)
       VALUES (?, ?, ?, ?, ?) ON CONFLICT (external_id) DO NOTHING RETURNING *`),
    recentTurns: conn.prepare<[string, number], TurnRow>(
      'SELECT * FROM conversation_turns WHERE identity_key = ? ORDER BY seq DESC LIMIT ?'),
    turnCount: conn.prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM conversation_turns WHERE identity_key = ?'),
  };

  return {
    createPlayer: guard((p: NewPlayer): Player => {
      stmt.insertPlayer.run(randomUUID(), p.identity_key, p.name, p.language ?? 'English', p.country ?? 'Israel', p.skill ?? 'Intermediate', now().toISOString());
      const row = stmt.playerByKey.get(p.identity_key);
      if (!row) throw new StoreUnavailableError(`Player ${p.identity_key} vanished after insert`);
      return toPlayer(row);
    }),
    getPlayerByKey: guard((key: string): Player | undefined => {
      const row = stmt.playerByKey.get(key);
      return row ? toPlayer(row) : undefined;
    }),
    getPlayer: guard((id: string): Player | undefined => {
      const row = stmt.playerById.get(id);
      return row ? toPlayer(row) : undefined;
    }),
    listActivePlayers: guard((): Player[] => stmt.activePlayers.all().map(toPlayer)),
    setPlayerActive: guard((id: string, active: boolean) => { stmt.setActive.run(active ? 1 : 0, id); }),

    createEvent: guard((e: NewEvent): EventRecord => {
      const row = stmt.insertEvent.get(randomUUID(), isoDate(e.start_time), e.location ?? 'Beach Court 1', e.capacity ?? 4, e.status ?? 'recruiting', now().toISOString());
      if (!row) throw new StoreUnavailableError('Event insert returned no row');
      return toEvent(row);
    }),
    getEvent: guard((id: string): EventRecord | undefined => {
      const row = stmt.eventById.get(id);
      return row ? toEvent(row) : undefined;
    }),
    // Earliest start strictly after `at`. Status is deliberately not consulted.
    getNextEvent: guard((at: Date = now()): EventRecord | undefined => {
      const row = stmt.nextEvent.get(at.toISOString());
      return row ? toEvent(row) : undefined;
    }),
    getEventOnDay: guard((dayStart: Date, dayEnd: Date): EventRecord | undefined => {
      const row = stmt.eventsBetween.get(dayStart.toISOString(), dayEnd.toISOString());
      return row ? toEvent(row) : undefined;
    }),
    setEventStatus: guard((id: string, status: EventStatus) => { stmt.setEventStatus.run(status, id); }),

    upsertAttendance: guard((a: AttendanceUpsert): AttendanceRecord => {
      const row = stmt.upsertAttendance.get(randomUUID(), a.event_id, a.player_id, a.status, a.original_message ?? null, a.confidence ?? null, now().toISOString());
      if (!row) throw new StoreUnavailableError('Attendance upsert returned no row');
      return toAttendance(row);
    }),
    getAttendance: guard((event_id: string, player_id: string): AttendanceRecord | undefined => {
      const row = stmt.attendanceFor.get(event_id, player_id);
      return row ? toAttendance(row) : undefined;
    }),
    countAttendance: guard((event_id: string): number => stmt.attendanceCount.get(event_id)?.n ?? 0),
    countByStatus: guard((event_id: string, status: AttendanceStatus): number => stmt.countByStatus.get(event_id, status)?.n ?? 0),
    getRoster: guard((event_id: string): RosterEntry[] =>
      stmt.roster.all(event_id).map(r => ({ player_id: r.player_id, name: r.name, status: asAttendanceStatus(r.status) }))),

    /** Returns undefined when a turn with the same external_id was already recorded. */
    appendTurn: guard((t: NewTurn): ConversationTurn | undefined => {
      const row = stmt.insertTurn.get(t.identity_key, t.role, t.content, t.external_id ?? null, now().toISOString());
      return row ? toTurn(row) : undefined;
    }),
    /** Most recent `limit` turns, oldest first. */
    getRecentTurns: guard((key: string, limit: number): ConversationTurn[] =>
      stmt.recentTurns.all(key, limit).map(toTurn).reverse()),
    countTurns: guard((key: string): number => stmt.turnCount.get(key)?.n ?? 0),

    close() { conn.close(); },
  };
}

export type Db = ReturnType<typeof createDb>;
