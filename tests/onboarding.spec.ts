import { describe, it, expect } from 'vitest';
import { createDb } from '../src/adapters/db.js';
import { REPLIES } from '../src/engine/errors.js';
import { awaitingName, extractName, onboard } from '../src/engine/onboarding.js';

describe('extractName', () => {
  it.each([
    ["I'm Avi", 'Avi'],
    ['my name is Dana Levi.', 'Dana Levi'],
    ['hey, call me Tom!', 'Tom'],
    ['קוראים לי נועה', 'נועה'],
    ['  Maya  ', 'Maya'],
  ])('%s -> %s', (text, name) => {
    expect(extractName(text)).toBe(name);
  });

  it('refuses things that are not names', () => {
    expect(extractName('12345')).toBeUndefined();
    expect(extractName('')).toBeUndefined();
    expect(extractName('I would like to know when the next game is')).toBeUndefined();
  });
});

describe('onboard', () => {
  const greeted = [{ role: 'inbound' as const, text: 'hi' }, { role: 'outbound' as const, text: REPLIES.greeting }];

  it('greets until a name was asked for', () => {
    const db = createDb();
    expect(awaitingName([])).toBe(false);
    expect(onboard(db, '972549990000', 'Avi', [], { language: 'English', country: 'Israel' }))
      .toEqual({ kind: 'onboarding.greeting', reply: REPLIES.greeting });
    expect(db.getPlayerByKey('972549990000')).toBeUndefined();
  });

  it('registers Hebrew names with Hebrew as the language', () => {
    const db = createDb();
    const res = onboard(db, '972549990000', 'אני דנה', greeted, { language: 'English', country: 'Israel' });
    expect(res.kind).toBe('onboarding.registered');
    expect(db.getPlayerByKey('972549990000')).toMatchObject({ name: 'דנה', language: 'Hebrew', active: true });
  });

  it('asks again when the answer is not a name', () => {
    const db = createDb();
    expect(onboard(db, '972549990000', '???', greeted, { language: 'English', country: 'Israel' }).reply).toBe(REPLIES.greeting);
  });
});
