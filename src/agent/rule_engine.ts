// Keyword engine used when no model key is configured. Handles the common short
// replies well enough to keep attendance flowing; anything else gets a nudge.
import type { ConversationContext } from '../engine/context.js';
import { REPLIES } from '../engine/errors.js';
import type { EventDetails, RosterStatus } from '../engine/dispatch.js';
import { shortDateTime } from '../util/time.js';
import type { Decision, DecisionEngine, ReadTools } from './decision.js';

// \b does not see Hebrew letters as word characters, so word ends are matched explicitly.
const END = String.raw`(?=$|[\s,.!?])`;
const CONFIRM = new RegExp(String.raw`^(yes|yep|yeah|y|in|i'?m in|count me in|sure|definitely|כן|בא|אני בא|אני בפנים)` + END, 'i');
const DECLINE = new RegExp(String.raw`^(no|nope|n|out|i'?m out|can'?t( make it)?|cannot|not this time|לא|לא יכול|לא אגיע)` + END, 'i');
const MAYBE = new RegExp(String.raw`^(maybe|not sure|might|perhaps|אולי|לא בטוח)` + END, 'i');
const ROSTER = /\bwho('?s| is| else)\b|\bhow many\b|מי בא|מי מגיע/i;
const DETAILS = /\b(when|where|what time|which court|location)\b|מתי|איפה/i;

export const FALLBACK_NUDGE = "I can help with the next game: tell me if you're coming, or ask who's in or when it is.";

export function formatEventDetails(d: EventDetails, timezone: string) {
  return `Next game: ${d.location}, ${shortDateTime(new Date(d.start_time), timezone)}. ${d.confirmed}/${d.capacity} confirmed.`;
}

export function formatRoster(r: RosterStatus) {
  const parts: string[] = [];
  if (r.confirmed.length) parts.push(`Confirmed (${r.confirmed.length}/${r.capacity}): ${r.confirmed.join(', ')}`);
  if (r.maybe.length) parts.push(`Maybe: ${r.maybe.join(', ')}`);
  if (r.declined.length) parts.push(`Can't make it: ${r.declined.join(', ')}`);
  return parts.length ? parts.join('\n') : 'No responses yet for this game.';
}

function lastInbound(context: ConversationContext) {
  for (let i = context.turns.length - 1; i >= 0; i--) {
    const t = context.turns[i];
    if (t.role === 'inbound') return t.text.trim();
  }
  return '';
}

export class RuleDecisionEngine implements DecisionEngine {
  readonly name = 'rules';

  constructor(private readonly timezone: string) {}

  async decide(context: ConversationContext, tools: ReadTools): Promise<Decision> {
    const text = lastInbound(context);
    if (MAYBE.test(text)) return { kind: 'set_status', status: 'maybe', targetKey: context.identityKey, confidence: 0.8 };
    if (DECLINE.test(text)) return { kind: 'set_status', status: 'declined', targetKey: context.identityKey, confidence: 0.9 };
    if (CONFIRM.test(text)) return { kind: 'set_status', status: 'confirmed', targetKey: context.identityKey, confidence: 0.9 };
    if (ROSTER.test(text)) {
      const outcome = await tools({ kind: 'query', query: 'roster_status' });
      if (!outcome.ok) return { kind: 'answer', query: 'roster_status', text: REPLIES.noUpcomingEvent };
      return { kind: 'answer', query: 'roster_status', text: outcome.query === 'roster_status' ? formatRoster(outcome.data) : '' };
    }
    if (DETAILS.test(text)) {
      const outcome = await tools({ kind: 'query', query: 'event_details' });
      if (!outcome.ok) return { kind: 'answer', query: 'event_details', text: REPLIES.noUpcomingEvent };
      return { kind: 'answer', query: 'event_details', text: outcome.query === 'event_details' ? formatEventDetails(outcome.data, this.timezone) : '' };
    }
    return { kind: 'reply', text: FALLBACK_NUDGE };
  }
}
