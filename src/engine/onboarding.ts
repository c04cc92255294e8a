// First contact from an unknown number: ask for a name, then register them.
import type { Db } from '../adapters/db.js';
import type { Player } from '../models/types.js';
import type { ContextTurn } from './context.js';
import { REPLIES } from './errors.js';
import { logEvent } from './events.js';

const GREETING_PREFIX = /^(hi|hey|hello|hiya|שלום|היי)[\s,!.]+/iu;
const NAME_PREFIX = /^(i'?m|i am|my name is|it'?s|this is|call me|name'?s|קוראים לי|שמי|אני)\s+/iu;
const HEBREW = /[\u0590-\u05FF]/u;
const MAX_NAME = 40;

export type OnboardingResult =
  | { kind: 'onboarding.greeting'; reply: string }
  | { kind: 'onboarding.registered'; reply: string; player: Player };

/** Pulls a display name out of a free-text answer; undefined when it does not look like one. */
export function extractName(text: string): string | undefined {
  const name = text
    .trim()
    .replace(GREETING_PREFIX, '')
    .replace(NAME_PREFIX, '')
    .replace(/[\s.!?,]+$/u, '')
    .replace(/\s+/gu, ' ')
    .trim();
  if (!name || name.length > MAX_NAME) return undefined;
  if (!/\p{L}/u.test(name)) return undefined;
  if (name.split(' ').length > 4) return undefined;
  return name;
}

export function awaitingName(history: ContextTurn[]): boolean {
  for (let i = history.length - 1; i >= 0; i--) {
    const t = history[i];
    if (t.role === 'outbound') return t.text === REPLIES.greeting || t.text === REPLIES.playerNotFound;
  }
  return false;
}

export function welcomeReply(name: string) {
  return `Nice to meet you, ${name}! You're on the list now. I'll ping you when the next game is set.`;
}

export function onboard(
  db: Db,
  identityKey: string,
  text: string,
  history: ContextTurn[],
  defaults: { language: string; country: string },
): OnboardingResult {
  const name = awaitingName(history) ? extractName(text) : undefined;
  if (!name) {
    logEvent('onboarding.greeting', { identityKey });
    return { kind: 'onboarding.greeting', reply: REPLIES.greeting };
  }
  const player = db.createPlayer({
    identity_key: identityKey,
    name,
    language: HEBREW.test(name) ? 'Hebrew' : defaults.language,
    country: defaults.country,
  });
  logEvent('onboarding.registered', { identityKey, player_id: player.id });
  return { kind: 'onboarding.registered', reply: welcomeReply(player.name), player };
}
