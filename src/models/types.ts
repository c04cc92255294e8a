export const ATTENDANCE_STATUSES = ['pending', 'confirmed', 'declined', 'maybe'] as const;
export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];

export const EVENT_STATUSES = ['recruiting', 'closed', 'cancelled'] as const;
export type EventStatus = (typeof EVENT_STATUSES)[number];

export type TurnRole = 'inbound' | 'outbound';

export interface Player {
  id: string;
  identity_key: string; // canonical phone digits, e.g. 972501234567
  name: string;
  language: string;
  country: string;
  active: boolean;
  skill: string;
  created_at: string; // ISO
}

export interface EventRecord {
  id: string;
  start_time: string; // ISO, UTC
  location: string;
  capacity: number;
  status: EventStatus;
  created_at: string;
}

export interface AttendanceRecord {
  id: string;
  event_id: string;
  player_id: string;
  status: AttendanceStatus;
  original_message: string | null;
  confidence: number | null;
  updated_at: string;
}

export interface ConversationTurn {
  seq: number;
  identity_key: string;
  role: TurnRole;
  content: string;
  external_id: string | null; // gateway message id, inbound only
  created_at: string;
}

export interface RosterEntry {
  player_id: string;
  name: string;
  status: AttendanceStatus;
}

export interface EventLogEntry {
  id: string;
  ts: string;
  type: string;
  correlation_id?: string;
  payload: Record<string, unknown>;
}
