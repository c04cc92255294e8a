// Human phrasing of event times. Invitations talk about "Tuesday evening", never raw timestamps.

export type PartOfDay = 'morning' | 'afternoon' | 'evening';

const LOCALES: Record<string, string> = { english: 'en-US', hebrew: 'he-IL' };

const PART_OF_DAY: Record<string, Record<PartOfDay, string>> = {
  english: { morning: 'morning', afternoon: 'afternoon', evening: 'evening' },
  hebrew: { morning: 'בבוקר', afternoon: 'אחר הצהריים', evening: 'בערב' },
};

export function localeFor(language: string) {
  return LOCALES[language.toLowerCase()] ?? 'en-US';
}

export function hourIn(date: Date, timezone: string): number {
  const hour = new Intl.DateTimeFormat('en-US', { hour: 'numeric', hourCycle: 'h23', timeZone: timezone }).format(date);
  return Number(hour);
}

export function partOfDay(date: Date, timezone: string): PartOfDay {
  const h = hourIn(date, timezone);
  if (h < 12) return 'morning';
  if (h < 17) return 'afternoon';
  return 'evening';
}

export function localizedPartOfDay(date: Date, timezone: string, language: string) {
  const table = PART_OF_DAY[language.toLowerCase()] ?? PART_OF_DAY.english;
  return table[partOfDay(date, timezone)];
}

export function weekday(date: Date, timezone: string, language: string) {
  return new Intl.DateTimeFormat(localeFor(language), { weekday: 'long', timeZone: timezone }).format(date);
}

/** YYYY-MM-DD of the instant in the given zone. */
export function calendarDate(date: Date, timezone: string) {
  return new Intl.DateTimeFormat('en-CA', { year: 'numeric', month: '2-digit', day: '2-digit', timeZone: timezone }).format(date);
}

/** e.g. "Tue, Oct 21, 18:00" in the event's time zone. */
export function shortDateTime(date: Date, timezone: string) {
  const d = new Intl.DateTimeFormat('en-US', { weekday: 'short', month: 'short', day: 'numeric', timeZone: timezone }).format(date);
  const t = new Intl.DateTimeFormat('en-US', { hour: '2-digit', minute: '2-digit', hourCycle: 'h23', timeZone: timezone }).format(date);
  return `${d}, ${t}`;
}

/** UTC bounds of a calendar day (YYYY-MM-DD) in the given time zone. */
export function dayBounds(day: string, timezone: string): { start: Date; end: Date } | undefined {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(day.trim());
  if (!m) return undefined;
  const utcMidnight = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
  if (Number.isNaN(utcMidnight)) return undefined;
  const start = new Date(utcMidnight - offsetMs(new Date(utcMidnight), timezone));
  const end = new Date(start.getTime() + 24 * 3600 * 1000);
  return { start, end };
}

// Offset of the zone from UTC at the given instant.
function offsetMs(at: Date, timezone: string) {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone, hourCycle: 'h23',
    year: 'numeric', month: '2-digit', day: '2-digit', hour: '2-digit', minute: '2-digit', second: '2-digit',
  }).formatToParts(at);
  const get = (type: string) => Number(parts.find(p => p.type === type)?.value ?? 0);
  const asUtc = Date.UTC(get('year'), get('month') - 1, get('day'), get('hour'), get('minute'), get('second'));
  return asUtc - at.getTime();
}
