import type { Db } from '../adapters/db.js';
import type { MessageGateway } from '../adapters/gateway.js';
import { coerceDecision, type Decision, type DecisionEngine, type ReadTools } from '../agent/decision.js';
import { logger } from '../logger.js';
import type { ContextAssembler, ConversationContext } from './context.js';
import { withIncoming } from './context.js';
import type { DispatchExecutor } from './dispatch.js';
import { errorMessage, failureKind, REPLIES } from './errors.js';
import { logEvent } from './events.js';
import type { IdentityResolver } from './identity.js';
import { onboard } from './onboarding.js';
import { failureReply, statusReply } from './replies.js';

export interface InboundMessage { from: string; body: string; messageId?: string; received_at?: string; }

export type InboundKind =
  | 'duplicate'
  | 'onboarding.greeting'
  | 'onboarding.registered'
  | 'reply'
  | 'answer'
  | 'status_set'
  | 'no_upcoming_event'
  | 'invalid_status'
  | 'identity_not_found'
  | 'store_unavailable'
  | 'decision_unavailable'
  | 'error';

export interface InboundResult {
  kind: InboundKind;
  identityKey: string;
  reply?: string;
  delivered?: boolean;
  details?: Record<string, unknown>;
}

export interface InboundDeps {
  db: Db;
  identity: IdentityResolver;
  assembler: ContextAssembler;
  executor: DispatchExecutor;
  engine: DecisionEngine;
  gateway: MessageGateway;
  timezone: string;
  defaultLanguage: string;
  defaultCountry: string;
}

/**
 * Inbound pipeline: resolve sender, assemble context, decide, apply, record, reply.
 * Every handled failure becomes a reply; nothing is thrown back to the transport.
 */
export function createInboundRouter(deps: InboundDeps) {
  const { db, identity, assembler, executor, engine, gateway } = deps;

  // Engines only ever read; a write smuggled through the tool callback is refused.
  function readOnlyTools(playerKey: string): ReadTools {
    return async action => {
      if (action.kind !== 'query') {
        logger.warn('[inbound] engine attempted a write through a read tool', playerKey);
        logEvent('decision.write_refused', { identityKey: playerKey, kind: action.kind });
        return { ok: false, error: 'invalid_status', detail: 'read-only tool' };
      }
      return executor.apply(action, playerKey);
    };
  }

  // `playerKey` is the key the player is stored under, which may predate canonical keys.
  async function converse(identityKey: string, playerKey: string, context: ConversationContext, body: string): Promise<InboundResult> {
    let decision: Decision;
    try {
      decision = coerceDecision(await engine.decide(context, readOnlyTools(playerKey)));
    } catch (err) {
      if (failureKind(err) === 'store_unavailable') throw err;
      logger.warn('[inbound] decision failed', identityKey, errorMessage(err));
      logEvent('decision.unavailable', { identityKey, engine: engine.name, error: errorMessage(err) });
      return { kind: 'decision_unavailable', identityKey, reply: REPLIES.generic };
    }
    logEvent('decision.made', { identityKey, engine: engine.name, kind: decision.kind });

    switch (decision.kind) {
      case 'reply':
        return { kind: 'reply', identityKey, reply: decision.text || REPLIES.acknowledged };
      case 'answer':
        return { kind: 'answer', identityKey, reply: decision.text || REPLIES.acknowledged, details: { query: decision.query } };
      case 'set_status': {
        const outcome = await executor.apply(
          { kind: 'set_status', status: decision.status, targetKey: decision.targetKey, confidence: decision.confidence, originalMessage: body },
          playerKey,
        );
        if (!outcome.ok) {
          return { kind: outcome.error, identityKey, reply: failureReply(outcome), details: { status: decision.status } };
        }
        return {
          kind: 'status_set',
          identityKey,
          reply: statusReply(outcome, deps.timezone),
          details: { status: outcome.record.status, event_id: outcome.event.id },
        };
      }
    }
  }

  function recover(identityKey: string, err: unknown): InboundResult {
    const kind = failureKind(err) ?? 'error';
    logger.error('[inbound] processing failed', identityKey, err);
    logEvent('inbound.failed', { identityKey, kind, error: errorMessage(err) });
    return { kind, identityKey, reply: kind === 'store_unavailable' ? REPLIES.storeError : REPLIES.generic };
  }

  // Records the reply, then sends it. A failed send is logged and reported, not thrown.
  async function deliver(identityKey: string, historyKey: string, reply: string): Promise<boolean> {
    try {
      db.appendTurn({ identity_key: historyKey, role: 'outbound', content: reply });
    } catch (err) {
      logger.error('[inbound] could not record reply', identityKey, err);
    }
    try {
      const sent = await gateway.send(identityKey, reply);
      if (!sent.ok) logEvent('inbound.send_failed', { identityKey, error: sent.error });
      return sent.ok;
    } catch (err) {
      logger.warn('[inbound] send threw', identityKey, errorMessage(err));
      logEvent('inbound.send_failed', { identityKey, error: errorMessage(err) });
      return false;
    }
  }

  async function handleInbound(msg: InboundMessage): Promise<InboundResult> {
    const identityKey = identity.resolve(msg.from);
    const body = msg.body.trim();
    logEvent('inbound.received', { identityKey, chars: body.length }, msg.messageId);

    let result: InboundResult;
    let historyKey = identityKey;
    try {
      const player = identity.lookup(msg.from);
      if (player) historyKey = player.identity_key;
      // History is read before this message is recorded, so it is not counted twice.
      const context = assembler.assemble(historyKey, { player });
      const recorded = db.appendTurn({ identity_key: historyKey, role: 'inbound', content: body, external_id: msg.messageId });
      if (!recorded) {
        logEvent('inbound.duplicate', { identityKey }, msg.messageId);
        return { kind: 'duplicate', identityKey };
      }
      if (player) {
        result = await converse(identityKey, historyKey, withIncoming(context, body), body);
      } else {
        const step = onboard(db, identityKey, body, context.turns, { language: deps.defaultLanguage, country: deps.defaultCountry });
        result = { kind: step.kind, identityKey, reply: step.reply };
      }
    } catch (err) {
      result = recover(identityKey, err);
    }

    if (result.reply) result.delivered = await deliver(identityKey, historyKey, result.reply);
    logEvent('inbound.handled', { identityKey, kind: result.kind, delivered: result.delivered }, msg.messageId);
    return result;
  }

  return { handleInbound };
}

export type InboundRouter = ReturnType<typeof createInboundRouter>;
