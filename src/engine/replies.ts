import { REPLIES } from './errors.js';
import type { FailedOutcome, StatusSetOutcome } from './dispatch.js';
import { shortDateTime } from '../util/time.js';

export function statusReply(outcome: StatusSetOutcome, timezone: string): string {
  const name = outcome.player.name;
  switch (outcome.record.status) {
    case 'confirmed': {
      const when = shortDateTime(new Date(outcome.event.start_time), timezone);
      const base = `Got it! ${name} is in for ${when}.`;
      return outcome.confirmed > outcome.event.capacity
        ? `${base} Heads up: that's ${outcome.confirmed} confirmed for ${outcome.event.capacity} spots.`
        : base;
    }
    case 'declined': return `No worries, marked ${name} as can't make it.`;
    case 'maybe': return `Cool, ${name} is a maybe for now.`;
    case 'pending': return `Updated ${name}'s status to pending.`;
  }
}

export function failureReply(outcome: FailedOutcome): string {
  switch (outcome.error) {
    case 'no_upcoming_event': return REPLIES.noUpcomingEvent;
    case 'invalid_status': return REPLIES.invalidStatus;
    case 'identity_not_found': return REPLIES.playerNotFound;
  }
}
