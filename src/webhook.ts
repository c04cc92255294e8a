import express from 'express';
import { z } from 'zod';
import type { InboundMessage, InboundRouter } from './engine/inbound_router.js';
import { errorMessage } from './engine/errors.js';
import { logEvent } from './engine/events.js';
import { logger } from './logger.js';

// WhatsApp Cloud API webhook payload, only the parts we read.
const messageSchema = z.object({
  from: z.string(),
  id: z.string(),
  timestamp: z.string().optional(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
});

const payloadSchema = z.object({
  entry: z.array(z.object({
    changes: z.array(z.object({
      value: z.object({ messages: z.array(messageSchema).optional() }).passthrough(),
    })).default([]),
  })).default([]),
});

export interface VerifyQuery { mode?: string; token?: string; challenge?: string; }

/** Subscription handshake: the challenge to echo, or undefined to reject. */
export function verifySubscription(query: VerifyQuery, verifyToken: string | undefined): string | undefined {
  if (!verifyToken || query.mode !== 'subscribe' || query.token !== verifyToken) return undefined;
  return query.challenge ?? '';
}

export interface Extracted { messages: InboundMessage[]; ignored: number; }

export function extractTextMessages(payload: unknown): Extracted {
  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success) return { messages: [], ignored: 1 };
  const messages: InboundMessage[] = [];
  let ignored = 0;
  for (const entry of parsed.data.entry) {
    for (const change of entry.changes) {
      // Status callbacks carry no messages array.
      const incoming = change.value.messages;
      if (!incoming) { ignored++; continue; }
      for (const m of incoming) {
        if (m.type !== 'text' || !m.text?.body.trim()) { ignored++; continue; }
        const received_at = m.timestamp && /^\d+$/.test(m.timestamp)
          ? new Date(Number(m.timestamp) * 1000).toISOString()
          : undefined;
        messages.push({ from: m.from, body: m.text.body, messageId: m.id, received_at });
      }
    }
  }
  return { messages, ignored };
}

/** Runs every text message through the pipeline. Never rejects. */
export async function processPayload(router: Pick<InboundRouter, 'handleInbound'>, payload: unknown) {
  const { messages, ignored } = extractTextMessages(payload);
  if (ignored) logEvent('webhook.ignored', { count: ignored });
  const results = await Promise.allSettled(messages.map(m => router.handleInbound(m)));
  let failed = 0;
  for (const r of results) {
    if (r.status === 'rejected') {
      failed++;
      logger.error('[webhook] message processing failed', errorMessage(r.reason));
    }
  }
  return { processed: messages.length, ignored, failed };
}

function queryString(v: unknown) {
  return typeof v === 'string' ? v : undefined;
}

// The POST handler answers 200 whatever happens inside; a non-2xx makes the
// gateway redeliver the same message.
export function createWebhookRouter(router: InboundRouter, verifyToken: string | undefined) {
  const r = express.Router();

  r.get('/webhook', (req, res) => {
    const challenge = verifySubscription({
      mode: queryString(req.query['hub.mode']),
      token: queryString(req.query['hub.verify_token']),
      challenge: queryString(req.query['hub.challenge']),
    }, verifyToken);
    if (challenge === undefined) {
      logger.warn('[webhook] verification rejected');
      res.sendStatus(403);
      return;
    }
    res.status(200).send(challenge);
  });

  r.post('/webhook', async (req, res) => {
    try {
      const summary = await processPayload(router, req.body);
      logger.debug('[webhook] handled', JSON.stringify(summary));
    } catch (err) {
      logger.error('[webhook] unexpected failure', err);
    }
    res.sendStatus(200);
  });

  return r;
}
