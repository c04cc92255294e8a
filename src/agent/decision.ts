// Contract between the pipeline and whatever reasoning component sits behind it.
// Engines see read-only tools; writes only ever leave an engine as a `set_status` decision.
import { z } from 'zod';
import type { ConversationContext } from '../engine/context.js';
import type { Action, QueryOutcome, FailedOutcome } from '../engine/dispatch.js';

export const READ_QUERIES = ['event_details', 'roster_status'] as const;
export type ReadQuery = (typeof READ_QUERIES)[number];

export type Decision =
  | { kind: 'answer'; query: ReadQuery; text: string }
  | { kind: 'set_status'; status: string; targetKey?: string; confidence?: number }
  | { kind: 'reply'; text: string };

/** Queries an engine may call while deciding. Anything other than a query is refused. */
export type ReadTools = (action: Action) => Promise<QueryOutcome | FailedOutcome>;

export interface DecisionEngine {
  readonly name: string;
  decide(context: ConversationContext, tools: ReadTools): Promise<Decision>;
  /**
   * Free text for an instruction turn (invitations). Throws DecisionUnavailableError.
   * Engines without a language model leave it out and invitations use templates.
   */
  generate?(context: ConversationContext): Promise<string>;
}

export const decisionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('answer'), query: z.enum(READ_QUERIES), text: z.string() }),
  z.object({
    kind: z.literal('set_status'),
    status: z.string().min(1),
    targetKey: z.string().optional(),
    confidence: z.number().min(0).max(1).optional(),
  }),
  z.object({ kind: z.literal('reply'), text: z.string() }),
]);

/**
 * Engines are untrusted: anything that does not parse as a Decision becomes a
 * plain reply, using whatever text can be salvaged.
 */
export function coerceDecision(raw: unknown): Decision {
  const parsed = decisionSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  if (typeof raw === 'string') return { kind: 'reply', text: raw.trim() };
  if (raw && typeof raw === 'object' && 'text' in raw && typeof raw.text === 'string') {
    return { kind: 'reply', text: raw.text.trim() };
  }
  return { kind: 'reply', text: '' };
}
