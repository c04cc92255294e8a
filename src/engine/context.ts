import type { Db } from '../adapters/db.js';
import type { AttendanceStatus, EventRecord, Player } from '../models/types.js';
import type { IdentityResolver } from './identity.js';

export type ContextRole = 'inbound' | 'outbound' | 'context';

export interface ContextTurn {
  role: ContextRole;
  text: string;
}

export type StatusSummary =
  | { kind: 'no_upcoming_event' }
  | { kind: 'no_response'; event: EventRecord }
  | { kind: 'responded'; event: EventRecord; status: AttendanceStatus };

export interface ConversationContext {
  identityKey: string;
  player?: Player;
  event?: EventRecord;
  status: StatusSummary;
  turns: ContextTurn[];
}

export interface AssembleOptions {
  windowSize?: number;
  /** Already resolved by the caller; skips a second lookup that could miss a legacy key. */
  player?: Player;
}

export interface ContextAssembler {
  assemble(identityKey: string, opts?: AssembleOptions): ConversationContext;
}

export function describeStatus(summary: StatusSummary): string {
  switch (summary.kind) {
    case 'no_upcoming_event': return 'no upcoming event';
    case 'no_response': return `no response yet for the event at ${summary.event.start_time}`;
    case 'responded': return `${summary.status} for the event at ${summary.event.start_time}`;
  }
}

export function contextAnnotation(identityKey: string, player: Player | undefined, summary: StatusSummary): string {
  const name = player?.name ?? 'unknown (not registered yet)';
  return `[CONTEXT] Player: ${name}. Phone: ${identityKey}. Current status: ${describeStatus(summary)}.`;
}

/** Appends the message being answered; it always comes last, after the annotation. */
export function withIncoming(context: ConversationContext, text: string): ConversationContext {
  return { ...context, turns: [...context.turns, { role: 'inbound', text }] };
}

export function createContextAssembler(db: Db, identity: IdentityResolver, opts: { windowSize: number; now?: () => Date }): ContextAssembler {
  const now = opts.now ?? (() => new Date());

  return {
    assemble(identityKey, { windowSize = opts.windowSize, player = identity.lookup(identityKey) } = {}) {
      const history = db.getRecentTurns(identityKey, windowSize);
      const event = db.getNextEvent(now());
      let status: StatusSummary;
      if (!event) status = { kind: 'no_upcoming_event' };
      else {
        const record = player ? db.getAttendance(event.id, player.id) : undefined;
        status = record ? { kind: 'responded', event, status: record.status } : { kind: 'no_response', event };
      }
      const turns: ContextTurn[] = history.map(t => ({ role: t.role, text: t.content }));
      turns.push({ role: 'context', text: contextAnnotation(identityKey, player, status) });
      return { identityKey, player, event, status, turns };
    },
  };
}
