import { describe, it, expect } from 'vitest';
import { dayBounds, localizedPartOfDay, partOfDay, shortDateTime } from '../src/util/time.js';

const TZ = 'Asia/Jerusalem';

describe('time helpers', () => {
  it('names the part of day in the local zone', () => {
    expect(partOfDay(new Date('2026-10-21T06:30:00Z'), TZ)).toBe('morning');
    expect(partOfDay(new Date('2026-10-21T12:00:00Z'), TZ)).toBe('afternoon');
    expect(partOfDay(new Date('2026-10-21T15:00:00Z'), TZ)).toBe('evening');
    expect(localizedPartOfDay(new Date('2026-10-21T15:00:00Z'), TZ, 'Hebrew')).toBe('בערב');
  });

  it('formats a short date and time', () => {
    expect(shortDateTime(new Date('2026-10-21T15:00:00Z'), TZ)).toBe('Wed, Oct 21, 18:00');
  });

  it('computes day bounds across the daylight saving change', () => {
    expect(dayBounds('2026-10-21', TZ)).toEqual({ start: new Date('2026-10-20T21:00:00Z'), end: new Date('2026-10-21T21:00:00Z') });
    expect(dayBounds('2026-10-28', TZ)?.start).toEqual(new Date('2026-10-27T22:00:00Z'));
    expect(dayBounds('next week', TZ)).toBeUndefined();
  });
});
