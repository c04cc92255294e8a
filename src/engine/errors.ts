export type ErrorKind =
  | 'identity_not_found'
  | 'no_upcoming_event'
  | 'invalid_status'
  | 'store_unavailable'
  | 'decision_unavailable'
  | 'gateway_send_failure';

export class StoreUnavailableError extends Error {
  readonly kind = 'store_unavailable' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export class DecisionUnavailableError extends Error {
  readonly kind = 'decision_unavailable' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecisionUnavailableError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Classifies a pipeline failure by its cause chain. A store failure anywhere in
 * the chain wins over a decision failure wrapped around it.
 */
export function failureKind(err: unknown): 'store_unavailable' | 'decision_unavailable' | undefined {
  let kind: 'decision_unavailable' | undefined;
  let current: unknown = err;
  for (let depth = 0; current instanceof Error && depth < 5; depth++) {
    if (current instanceof StoreUnavailableError) return 'store_unavailable';
    if (current instanceof DecisionUnavailableError) kind = 'decision_unavailable';
    current = current.cause;
  }
  return kind;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// User-facing copy for every handled failure. Casual, short, no emojis.
export const REPLIES = {
  greeting: "Hey! I don't think we've met. What's your name?",
  noUpcomingEvent: "No games scheduled yet, I'll let you know when something's up!",
  storeError: 'Hmm, had a little technical issue. Can you try again?',
  generic: 'Oops, something went wrong. Mind trying again?',
  invalidStatus: "Sorry, didn't quite get that. Are you coming, not coming, or not sure yet?",
  playerNotFound: "I don't have you in my list yet. What's your name?",
  acknowledged: 'Got it.',
} as const;
