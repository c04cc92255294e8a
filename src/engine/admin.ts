// Organizer-facing operations used by the scripts.
import type { Db } from '../adapters/db.js';
import type { AttendanceStatus, EventRecord, Player, RosterEntry } from '../models/types.js';
import { logEvent } from './events.js';
import type { IdentityResolver } from './identity.js';

export interface EventStatusReport {
  event: EventRecord;
  counts: Record<AttendanceStatus, number>;
  roster: RosterEntry[];
  spotsLeft: number;
}

export interface NewPlayerInput { phone: string; name: string; language?: string; country?: string; skill?: string; }

export function createAdmin(db: Db, identity: IdentityResolver, defaults: { language: string; country: string }) {
  return {
    createEvent(startTime: string | Date, location: string, capacity: number): EventRecord {
      if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`Capacity must be a positive integer, got ${capacity}`);
      const event = db.createEvent({ start_time: startTime, location: location.trim(), capacity });
      logEvent('event.created', { event_id: event.id, start_time: event.start_time, capacity });
      return event;
    },

    listActivePlayers(): Player[] {
      return db.listActivePlayers();
    },

    getEventStatus(eventId: string): EventStatusReport | undefined {
      const event = db.getEvent(eventId);
      if (!event) return undefined;
      const roster = db.getRoster(event.id);
      const counts: Record<AttendanceStatus, number> = { pending: 0, confirmed: 0, declined: 0, maybe: 0 };
      for (const entry of roster) counts[entry.status]++;
      return { event, counts, roster, spotsLeft: Math.max(0, event.capacity - counts.confirmed) };
    },

    /** Idempotent on the canonical key: an existing player is returned unchanged. */
    addPlayer(input: NewPlayerInput): Player {
      const country = input.country ?? defaults.country;
      const existing = identity.lookup(input.phone, country);
      if (existing) return existing;
      const player = db.createPlayer({
        identity_key: identity.resolve(input.phone, country),
        name: input.name.trim(),
        language: input.language ?? defaults.language,
        country,
        skill: input.skill,
      });
      logEvent('player.added', { player_id: player.id, identityKey: player.identity_key });
      return player;
    },
  };
}

export type Admin = ReturnType<typeof createAdmin>;
