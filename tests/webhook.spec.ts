import { describe, it, expect } from 'vitest';
import type { InboundMessage, InboundResult } from '../src/engine/inbound_router.js';
import { extractTextMessages, processPayload, verifySubscription } from '../src/webhook.js';

function payload(value: Record<string, unknown>) {
  return { object: 'whatsapp_business_account', entry: [{ id: 'waba', changes: [{ field: 'messages', value }] }] };
}

const textMessage = {
  from: '972501234567', id: 'wamid.A', timestamp: '1792400400', type: 'text', text: { body: "I'm in" },
};

describe('verifySubscription', () => {
  it('echoes the challenge when the token matches', () => {
    expect(verifySubscription({ mode: 'subscribe', token: 'test-verify', challenge: '42' }, 'test-verify')).toBe('42');
  });

  it('rejects a wrong token, a wrong mode or no configured token', () => {
    expect(verifySubscription({ mode: 'subscribe', token: 'nope', challenge: '42' }, 'test-verify')).toBeUndefined();
    expect(verifySubscription({ mode: 'unsubscribe', token: 'test-verify', challenge: '42' }, 'test-verify')).toBeUndefined();
    expect(verifySubscription({ mode: 'subscribe', token: undefined, challenge: '42' }, undefined)).toBeUndefined();
  });
});

describe('extractTextMessages', () => {
  it('pulls text messages out of the payload', () => {
    expect(extractTextMessages(payload({ messages: [textMessage] }))).toEqual({
      messages: [{ from: '972501234567', body: "I'm in", messageId: 'wamid.A', received_at: '2026-10-19T09:00:00.000Z' }],
      ignored: 0,
    });
  });

  it('ignores other message types and status callbacks', () => {
    const image = { from: '972501234567', id: 'wamid.B', type: 'image' };
    expect(extractTextMessages(payload({ messages: [image] }))).toEqual({ messages: [], ignored: 1 });
    expect(extractTextMessages(payload({ statuses: [{ id: 'wamid.A', status: 'delivered' }] }))).toEqual({ messages: [], ignored: 1 });
    expect(extractTextMessages('garbage')).toEqual({ messages: [], ignored: 1 });
  });
});

describe('processPayload', () => {
  it('runs each message and survives a failing one', async () => {
    const handled: InboundMessage[] = [];
    const router = {
      async handleInbound(m: InboundMessage): Promise<InboundResult> {
        handled.push(m);
        if (m.messageId === 'wamid.B') throw new Error('boom');
        return { kind: 'reply', identityKey: m.from };
      },
    };
    const body = payload({ messages: [textMessage, { ...textMessage, id: 'wamid.B' }, { ...textMessage, id: 'wamid.C', type: 'audio' }] });
    expect(await processPayload(router, body)).toEqual({ processed: 2, ignored: 1, failed: 1 });
    expect(handled.map(m => m.messageId)).toEqual(['wamid.A', 'wamid.B']);
  });
});
