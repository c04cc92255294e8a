// Invitation copy: model-generated when possible, templated otherwise.
import type { ConversationContext } from '../engine/context.js';
import { DecisionUnavailableError } from '../engine/errors.js';
import { renderTemplate } from '../engine/templates.js';
import type { EventRecord, Player } from '../models/types.js';
import { calendarDate, localizedPartOfDay, weekday } from '../util/time.js';
import type { DecisionEngine } from './decision.js';
import { invitationPrompt } from './prompts.js';

const MAX_CHARS = 320;

export function invitationInstruction(player: Player, event: EventRecord, timezone: string): string {
  const start = new Date(event.start_time);
  const eventDate = `${weekday(start, timezone, 'english')} ${calendarDate(start, timezone)}, ${localizedPartOfDay(start, timezone, 'english')}`;
  return invitationPrompt({ playerName: player.name, eventDate, language: player.language });
}

/** Seeds the context with the instruction and asks the engine for text. Throws when the engine fails. */
export async function generateInvitation(engine: DecisionEngine, context: ConversationContext, player: Player, event: EventRecord, timezone: string): Promise<string> {
  const seeded: ConversationContext = {
    ...context,
    turns: [...context.turns, { role: 'context', text: invitationInstruction(player, event, timezone) }],
  };
  if (!engine.generate) throw new DecisionUnavailableError(`Engine ${engine.name} cannot generate text`);
  const text = (await engine.generate(seeded)).replace(/^["']|["']$/g, '').trim();
  if (!text) throw new DecisionUnavailableError('Generated invitation was empty');
  // Cut by code point so an emoji is never split in half.
  const chars = Array.from(text);
  return chars.length > MAX_CHARS ? chars.slice(0, MAX_CHARS).join('') : text;
}

export async function fallbackInvitation(player: Player, event: EventRecord, timezone: string): Promise<string> {
  const start = new Date(event.start_time);
  return renderTemplate('invite', player.language, {
    name: player.name,
    weekday: weekday(start, timezone, player.language),
    partOfDay: localizedPartOfDay(start, timezone, player.language),
    location: event.location,
  });
}
