import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Decision, DecisionEngine } from '../src/agent/decision.js';
import { GeminiDecisionEngine, type ContentModel } from '../src/agent/gemini_engine.js';
import { loadToolContract } from '../src/agent/tool_loader.js';
import { DecisionUnavailableError, REPLIES, StoreUnavailableError } from '../src/engine/errors.js';
import type { EventRecord } from '../src/models/types.js';
import { GAME_START, makeApp, recordingGateway } from './helpers.js';

type TestApp = Awaited<ReturnType<typeof makeApp>>;

const DANA = '972501234567';

function scripted(decision: () => Promise<Decision>): DecisionEngine {
  return {
    name: 'scripted',
    decide: decision,
    async generate() { return 'unused'; },
  };
}

describe('unknown sender', () => {
  let app: TestApp;
  beforeEach(async () => {
    app = await makeApp();
    app.admin.createEvent(GAME_START, 'Beach Court 1', 4);
  });

  it('gets one greeting, two turns and no attendance record', async () => {
    const res = await app.router.handleInbound({ from: '054-999-0000', body: 'hello', messageId: 'wamid.1' });
    expect(res).toEqual({ kind: 'onboarding.greeting', identityKey: '972549990000', reply: REPLIES.greeting, delivered: true });
    expect(app.sent).toEqual([{ to: '972549990000', text: REPLIES.greeting }]);
    expect(app.db.countTurns('972549990000')).toBe(2);
    const event = app.db.getNextEvent();
    expect(event && app.db.countAttendance(event.id)).toBe(0);
  });

  it('registers the name given after the greeting', async () => {
    await app.router.handleInbound({ from: '054-999-0000', body: 'hello', messageId: 'wamid.1' });
    const res = await app.router.handleInbound({ from: '+972549990000', body: "I'm Avi", messageId: 'wamid.2' });
    expect(res.kind).toBe('onboarding.registered');
    expect(res.reply).toBe("Nice to meet you, Avi! You're on the list now. I'll ping you when the next game is set.");
    expect(app.db.getPlayerByKey('972549990000')?.name).toBe('Avi');
    expect(app.db.countTurns('972549990000')).toBe(4);
  });
});

describe('known player with the keyword engine', () => {
  let app: TestApp;
  let game: EventRecord;
  beforeEach(async () => {
    app = await makeApp();
    app.admin.addPlayer({ phone: '050-123-4567', name: 'Dana' });
    game = app.admin.createEvent(GAME_START, 'Beach Court 1', 4);
  });

  it('confirms attendance and replies with the game time', async () => {
    const res = await app.router.handleInbound({ from: '+972 50 123 4567', body: "I'm in", messageId: 'wamid.10' });
    expect(res.kind).toBe('status_set');
    expect(res.reply).toBe('Got it! Dana is in for Wed, Oct 21, 18:00.');
    const dana = app.db.getPlayerByKey(DANA);
    expect(dana && app.db.getAttendance(game.id, dana.id)).toMatchObject({ status: 'confirmed', original_message: "I'm in", confidence: 0.9 });
    expect(app.db.countTurns(DANA)).toBe(2);
  });

  it('changes its mind with last write winning', async () => {
    await app.router.handleInbound({ from: DANA, body: 'yes', messageId: 'wamid.11' });
    const res = await app.router.handleInbound({ from: DANA, body: "can't make it", messageId: 'wamid.12' });
    expect(res.reply).toBe("No worries, marked Dana as can't make it.");
    expect(app.db.countAttendance(game.id)).toBe(1);
    expect(app.admin.getEventStatus(game.id)?.counts).toEqual({ pending: 0, confirmed: 0, declined: 1, maybe: 0 });
  });

  it('acknowledges a redelivered message once', async () => {
    const first = await app.router.handleInbound({ from: DANA, body: 'yes', messageId: 'wamid.13' });
    const second = await app.router.handleInbound({ from: DANA, body: 'yes', messageId: 'wamid.13' });
    expect(first.kind).toBe('status_set');
    expect(second).toEqual({ kind: 'duplicate', identityKey: DANA });
    expect(app.sent).toHaveLength(1);
    expect(app.db.countTurns(DANA)).toBe(2);
  });

  it('answers a details question', async () => {
    const res = await app.router.handleInbound({ from: DANA, body: 'when is the game?', messageId: 'wamid.14' });
    expect(res).toMatchObject({ kind: 'answer', reply: 'Next game: Beach Court 1, Wed, Oct 21, 18:00. 0/4 confirmed.' });
    expect(app.db.countAttendance(game.id)).toBe(0);
  });

  it('warns when confirmations exceed capacity', async () => {
    const small = await makeApp();
    small.admin.addPlayer({ phone: '050-123-4567', name: 'Dana' });
    small.admin.addPlayer({ phone: '053-222-8899', name: 'Tom' });
    small.admin.createEvent(GAME_START, 'Beach Court 1', 1);
    await small.router.handleInbound({ from: DANA, body: 'yes' });
    const res = await small.router.handleInbound({ from: '972532228899', body: 'yes' });
    expect(res.reply).toBe("Got it! Tom is in for Wed, Oct 21, 18:00. Heads up: that's 2 confirmed for 1 spots.");
  });
});

describe('player stored under a legacy key', () => {
  const LEGACY = '+972 50-123-4567';
  let app: TestApp;
  let game: EventRecord;
  beforeEach(async () => {
    app = await makeApp();
    app.db.createPlayer({ identity_key: LEGACY, name: 'Legacy' });
    game = app.admin.createEvent(GAME_START, 'Beach Court 1', 4);
  });

  it('sets status against the stored row and keeps history on its key', async () => {
    const res = await app.router.handleInbound({ from: LEGACY, body: 'yes', messageId: 'wamid.30' });
    expect(res).toEqual({
      kind: 'status_set',
      identityKey: DANA,
      reply: 'Got it! Legacy is in for Wed, Oct 21, 18:00.',
      delivered: true,
      details: { status: 'confirmed', event_id: game.id },
    });
    expect(app.sent).toEqual([{ to: DANA, text: 'Got it! Legacy is in for Wed, Oct 21, 18:00.' }]);
    expect(app.db.countTurns(LEGACY)).toBe(2);
    expect(app.db.countTurns(DANA)).toBe(0);
    expect(app.admin.listActivePlayers()).toHaveLength(1);
  });
});

describe('without an upcoming event', () => {
  it('answers with the informational reply and creates nothing', async () => {
    const app = await makeApp();
    app.admin.addPlayer({ phone: DANA, name: 'Dana' });
    const ask = await app.router.handleInbound({ from: DANA, body: 'when is the game?' });
    const confirm = await app.router.handleInbound({ from: DANA, body: 'yes' });
    expect(ask).toMatchObject({ kind: 'answer', reply: REPLIES.noUpcomingEvent });
    expect(confirm).toMatchObject({ kind: 'no_upcoming_event', reply: REPLIES.noUpcomingEvent });
    expect(app.db.getNextEvent()).toBeUndefined();
    expect(app.db.countTurns(DANA)).toBe(4);
  });
});

describe('failures inside the pipeline', () => {
  it('apologizes when the engine is unavailable', async () => {
    const app = await makeApp({ engine: scripted(async () => { throw new DecisionUnavailableError('timeout'); }) });
    app.admin.addPlayer({ phone: DANA, name: 'Dana' });
    const res = await app.router.handleInbound({ from: DANA, body: 'yo' });
    expect(res).toEqual({ kind: 'decision_unavailable', identityKey: DANA, reply: REPLIES.generic, delivered: true });
  });

  it('rejects a status outside the vocabulary', async () => {
    const app = await makeApp({ engine: scripted(async () => ({ kind: 'set_status', status: 'attending' })) });
    app.admin.addPlayer({ phone: DANA, name: 'Dana' });
    const game = app.admin.createEvent(GAME_START, 'Beach Court 1', 4);
    const res = await app.router.handleInbound({ from: DANA, body: 'sure thing' });
    expect(res).toMatchObject({ kind: 'invalid_status', reply: REPLIES.invalidStatus });
    expect(app.db.countAttendance(game.id)).toBe(0);
  });

  it('acknowledges an empty reply decision', async () => {
    const app = await makeApp({ engine: scripted(async () => ({ kind: 'reply', text: '' })) });
    app.admin.addPlayer({ phone: DANA, name: 'Dana' });
    const res = await app.router.handleInbound({ from: DANA, body: 'ok' });
    expect(res.reply).toBe(REPLIES.acknowledged);
  });

  it('returns the store apology when the store is gone', async () => {
    const app = await makeApp();
    app.close();
    const res = await app.router.handleInbound({ from: DANA, body: 'yes' });
    expect(res).toEqual({ kind: 'store_unavailable', identityKey: DANA, reply: REPLIES.storeError, delivered: true });
    expect(app.sent).toEqual([{ to: DANA, text: REPLIES.storeError }]);
  });

  it('returns the store apology when a read tool hits a store failure', async () => {
    const model: ContentModel = {
      async generateContent() {
        return { response: { text: () => '', functionCalls: () => [{ name: 'check_roster', args: {} }] } };
      },
    };
    const engine = new GeminiDecisionEngine(model, await loadToolContract(), { timeoutMs: 1000, maxToolRounds: 3 });
    const app = await makeApp({ engine });
    app.admin.addPlayer({ phone: DANA, name: 'Dana' });
    app.admin.createEvent(GAME_START, 'Beach Court 1', 4);
    vi.spyOn(app.db, 'getRoster').mockImplementation(() => {
      throw new StoreUnavailableError('Store unavailable: database is locked');
    });
    const res = await app.router.handleInbound({ from: DANA, body: "who's coming?" });
    expect(res).toEqual({ kind: 'store_unavailable', identityKey: DANA, reply: REPLIES.storeError, delivered: true });
  });

  it('refuses a write sent through the read tools', async () => {
    const sneaky: DecisionEngine = {
      name: 'sneaky',
      async decide(_context, tools) {
        const outcome = await tools({ kind: 'set_status', status: 'declined' });
        return { kind: 'reply', text: outcome.ok ? 'written' : outcome.error };
      },
    };
    const app = await makeApp({ engine: sneaky });
    app.admin.addPlayer({ phone: DANA, name: 'Dana' });
    const game = app.admin.createEvent(GAME_START, 'Beach Court 1', 4);
    const res = await app.router.handleInbound({ from: DANA, body: 'hi' });
    expect(res).toMatchObject({ kind: 'reply', reply: 'invalid_status' });
    expect(app.db.countAttendance(game.id)).toBe(0);
  });

  it('records the reply even when sending fails', async () => {
    const failing = recordingGateway(() => ({ ok: false, error: 'HTTP 500' }));
    const app = await makeApp({ gateway: failing.gateway });
    const res = await app.router.handleInbound({ from: DANA, body: 'hi' });
    expect(res.delivered).toBe(false);
    expect(app.db.countTurns(DANA)).toBe(2);
  });
});
