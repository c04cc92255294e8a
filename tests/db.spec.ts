import { describe, it, expect, beforeEach } from 'vitest';
import { createDb, type Db } from '../src/adapters/db.js';
import { StoreUnavailableError } from '../src/engine/errors.js';

const NOW = new Date('2026-10-19T09:00:00.000Z');
let db: Db;

beforeEach(() => {
  db = createDb(':memory:', { now: () => NOW });
});

describe('players', () => {
  it('enforces identity key uniqueness', () => {
    const first = db.createPlayer({ identity_key: '972501234567', name: 'Dana' });
    const again = db.createPlayer({ identity_key: '972501234567', name: 'Someone Else' });
    expect(again.id).toBe(first.id);
    expect(again.name).toBe('Dana');
    expect(db.listActivePlayers()).toHaveLength(1);
  });

  it('soft-disables players', () => {
    const p = db.createPlayer({ identity_key: '972501234567', name: 'Dana' });
    db.setPlayerActive(p.id, false);
    expect(db.listActivePlayers()).toEqual([]);
    expect(db.getPlayer(p.id)?.active).toBe(false);
  });
});

describe('events', () => {
  it('picks the earliest event strictly after now', () => {
    db.createEvent({ start_time: '2026-10-18T15:00:00Z' });
    db.createEvent({ start_time: '2026-10-28T15:00:00Z' });
    const soon = db.createEvent({ start_time: '2026-10-21T15:00:00Z' });
    expect(db.getNextEvent()?.id).toBe(soon.id);
    expect(db.getNextEvent(new Date('2026-10-21T15:00:00Z'))?.start_time).toBe('2026-10-28T15:00:00.000Z');
  });

  it('still selects a cancelled event as next', () => {
    const e = db.createEvent({ start_time: '2026-10-21T15:00:00Z', status: 'cancelled' });
    expect(db.getNextEvent()?.id).toBe(e.id);
  });

  it('rejects invalid dates', () => {
    expect(() => db.createEvent({ start_time: 'next tuesday' })).toThrow(RangeError);
  });
});

describe('attendance', () => {
  it('keeps one record per event and player', () => {
    const p = db.createPlayer({ identity_key: '972501234567', name: 'Dana' });
    const e = db.createEvent({ start_time: '2026-10-21T15:00:00Z' });
    for (let i = 0; i < 3; i++) db.upsertAttendance({ event_id: e.id, player_id: p.id, status: 'confirmed' });
    expect(db.countAttendance(e.id)).toBe(1);
    const last = db.upsertAttendance({ event_id: e.id, player_id: p.id, status: 'declined', original_message: 'sorry', confidence: 0.9 });
    expect(last).toMatchObject({ status: 'declined', original_message: 'sorry', confidence: 0.9 });
    expect(db.countAttendance(e.id)).toBe(1);
  });

  it('lists the roster with pending for players who have not answered', () => {
    const e = db.createEvent({ start_time: '2026-10-21T15:00:00Z' });
    const dana = db.createPlayer({ identity_key: '972501234567', name: 'Dana' });
    db.createPlayer({ identity_key: '972527654321', name: 'Avi' });
    db.upsertAttendance({ event_id: e.id, player_id: dana.id, status: 'maybe' });
    expect(db.getRoster(e.id).map(r => `${r.name}:${r.status}`)).toEqual(['Avi:pending', 'Dana:maybe']);
  });
});

describe('conversation turns', () => {
  it('returns the most recent window oldest first', () => {
    for (let i = 1; i <= 5; i++) db.appendTurn({ identity_key: 'k', role: i % 2 ? 'inbound' : 'outbound', content: `t${i}` });
    expect(db.getRecentTurns('k', 3).map(t => t.content)).toEqual(['t3', 't4', 't5']);
    expect(db.countTurns('k')).toBe(5);
  });

  it('ignores a second turn with the same external id', () => {
    expect(db.appendTurn({ identity_key: 'k', role: 'inbound', content: 'hi', external_id: 'wamid.1' })).toBeDefined();
    expect(db.appendTurn({ identity_key: 'k', role: 'inbound', content: 'hi', external_id: 'wamid.1' })).toBeUndefined();
    db.appendTurn({ identity_key: 'k', role: 'outbound', content: 'a' });
    db.appendTurn({ identity_key: 'k', role: 'outbound', content: 'b' });
    expect(db.countTurns('k')).toBe(3);
  });
});

describe('failures', () => {
  it('reports a closed store as unavailable', () => {
    db.close();
    expect(() => db.getNextEvent()).toThrow(StoreUnavailableError);
  });
});
