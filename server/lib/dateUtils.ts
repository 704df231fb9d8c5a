/**
 * Shared date helpers. Day keys are `YYYY-MM-DD` in UTC throughout.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function addUtcDays(date: Date, days: number): Date {
  const next = new Date(date);
  next.setUTCDate(next.getUTCDate() + days);
  return next;
}

function utcDateKey(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

function utcDateKeyFromUnixSeconds(unixSeconds: number): string {
  if (!Number.isFinite(unixSeconds)) return '';
  return utcDateKey(new Date(unixSeconds * 1000));
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const match = String(dateKey || '')
    .trim()
    .match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return NaN;
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

function isWeekdayUtc(date: Date): boolean {
  const day = date.getUTCDay();
  return day !== 0 && day !== 6;
}

/** `count` weekday keys, oldest first, ending at `end` (or the weekday before it). */
function businessDayKeysEnding(count: number, end: Date): string[] {
  const keys: string[] = [];
  let cursor = new Date(Date.UTC(end.getUTCFullYear(), end.getUTCMonth(), end.getUTCDate()));
  while (keys.length < count) {
    if (isWeekdayUtc(cursor)) keys.push(utcDateKey(cursor));
    cursor = addUtcDays(cursor, -1);
  }
  return keys.reverse();
}

/** True when both instants fall on the same UTC calendar day. */
function isSameUtcDay(a: Date, b: Date): boolean {
  return utcDateKey(a) === utcDateKey(b);
}

/** Next weekday occurrence of `hour:minute` UTC strictly after `now`. */
function nextWeekdayRunUtcMs(now: Date, hour: number, minute: number): number {
  let candidate = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), hour, minute));
  if (candidate.getTime() <= now.getTime()) candidate = addUtcDays(candidate, 1);
  for (let i = 0; i < 7 && !isWeekdayUtc(candidate); i++) {
    candidate = addUtcDays(candidate, 1);
  }
  return candidate.getTime();
}

export {
  DAY_MS,
  addUtcDays,
  utcDateKey,
  utcDateKeyFromUnixSeconds,
  parseDateKeyToUtcMs,
  isWeekdayUtc,
  businessDayKeysEnding,
  isSameUtcDay,
  nextWeekdayRunUtcMs,
};
