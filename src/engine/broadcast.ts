import type { Db } from '../adapters/db.js';
import type { MessageGateway } from '../adapters/gateway.js';
import type { DecisionEngine } from '../agent/decision.js';
import { fallbackInvitation, generateInvitation } from '../agent/invitations.js';
import { logger } from '../logger.js';
import type { EventRecord, Player } from '../models/types.js';
import { canonicalize } from '../util/phone.js';
import type { ContextAssembler } from './context.js';
import { errorMessage } from './errors.js';
import { logEvent } from './events.js';

// `fallback` is a template sent on purpose (no model configured). `fallback_after_failure`
// is a template sent because generation failed; it is counted as a failure.
export type RecipientStatus = 'generated' | 'fallback' | 'fallback_after_failure' | 'send_failed' | 'skipped' | 'failed';

export interface RecipientOutcome {
  player_id: string;
  identity_key: string;
  status: RecipientStatus;
  text?: string;
  error?: string;
}

export interface BroadcastReport {
  event_id: string;
  recipients: RecipientOutcome[];
  counts: Record<RecipientStatus, number>;
  succeeded: number;
  failed: number;
}

export interface BroadcastOptions {
  /** Recipients not started by this instant are reported as skipped. */
  deadline?: Date;
  concurrency?: number;
}

export interface BroadcastDeps {
  db: Db;
  assembler: ContextAssembler;
  engine: DecisionEngine;
  gateway: MessageGateway;
  timezone: string;
  concurrency: number;
  now?: () => Date;
}

export function summarize(event_id: string, recipients: RecipientOutcome[]): BroadcastReport {
  const counts: Record<RecipientStatus, number> = { generated: 0, fallback: 0, fallback_after_failure: 0, send_failed: 0, skipped: 0, failed: 0 };
  for (const r of recipients) counts[r.status]++;
  const succeeded = counts.generated + counts.fallback;
  return { event_id, recipients, counts, succeeded, failed: recipients.length - succeeded - counts.skipped };
}

export function createBroadcaster(deps: BroadcastDeps) {
  const now = deps.now ?? (() => new Date());

  async function invite(player: Player, event: EventRecord): Promise<RecipientOutcome> {
    const base = { player_id: player.id, identity_key: player.identity_key };
    let text: string;
    let status: RecipientStatus = 'generated';
    let decisionError: string | undefined;

    if (!deps.engine.generate) {
      text = await fallbackInvitation(player, event, deps.timezone);
      status = 'fallback';
    } else {
      const context = deps.assembler.assemble(player.identity_key, { player });
      try {
        text = await generateInvitation(deps.engine, context, player, event, deps.timezone);
      } catch (err) {
        decisionError = errorMessage(err);
        logger.warn('[broadcast] generation failed, using template', player.identity_key, decisionError);
        text = await fallbackInvitation(player, event, deps.timezone);
        status = 'fallback_after_failure';
      }
    }

    // Rows stored before canonical keys existed keep their key for history, but sends need the canonical number.
    const sent = await deps.gateway.send(canonicalize(player.identity_key, player.country), text);
    if (!sent.ok) return { ...base, status: 'send_failed', text, error: sent.error };

    deps.db.appendTurn({ identity_key: player.identity_key, role: 'outbound', content: text });
    return { ...base, status, text, error: decisionError };
  }

  async function attempt(player: Player, event: EventRecord, deadline: Date | undefined): Promise<RecipientOutcome> {
    const base = { player_id: player.id, identity_key: player.identity_key };
    if (!player.active) return { ...base, status: 'skipped', error: 'inactive' };
    if (deadline && now().getTime() >= deadline.getTime()) return { ...base, status: 'skipped', error: 'deadline' };
    try {
      return await invite(player, event);
    } catch (err) {
      logger.error('[broadcast] recipient failed', player.identity_key, err);
      return { ...base, status: 'failed', error: errorMessage(err) };
    }
  }

  /**
   * Sends an invitation for `event` to each roster member. Recipient failures are
   * collected into the report; the call itself only rejects on programming errors.
   */
  async function broadcast(event: EventRecord, roster: Player[], opts: BroadcastOptions = {}): Promise<BroadcastReport> {
    const limit = Math.max(1, Math.min(opts.concurrency ?? deps.concurrency, roster.length || 1));
    const outcomes: RecipientOutcome[] = [];
    let cursor = 0;

    logEvent('broadcast.started', { event_id: event.id, recipients: roster.length, concurrency: limit });

    async function worker() {
      while (cursor < roster.length) {
        const index = cursor++;
        const outcome = await attempt(roster[index], event, opts.deadline);
        outcomes[index] = outcome;
        logEvent('broadcast.recipient', { event_id: event.id, identityKey: outcome.identity_key, status: outcome.status, error: outcome.error });
      }
    }

    await Promise.all(Array.from({ length: limit }, worker));

    const report = summarize(event.id, outcomes);
    logger.info('[broadcast] done', event.id, JSON.stringify(report.counts));
    logEvent('broadcast.finished', { event_id: event.id, ...report.counts });
    return report;
  }

  return { broadcast };
}

export type Broadcaster = ReturnType<typeof createBroadcaster>;
