import dayjs from '@utils/dayjs';
import type { Shift } from './types';

export const DATE_KEY_FORMAT = 'YYYY-MM-DD';

const WEEKEND_DAYS = new Set([0, 6]);
const DAYS_PER_WEEK = 7;

export function formatZoned(ms: number, timezone: string): string {
  return dayjs(ms).tz(timezone).format();
}

export function dateKeyOf(ms: number, timezone: string): string {
  return dayjs(ms).tz(timezone).format(DATE_KEY_FORMAT);
}

export function addDaysToKey(dateKey: string, days: number): string {
  return dayjs.utc(dateKey, DATE_KEY_FORMAT, true).add(days, 'day').format(DATE_KEY_FORMAT);
}

export function startOfDateKey(dateKey: string, timezone: string): number {
  return dayjs.tz(dateKey, timezone).valueOf();
}

export function weekdayOf(ms: number, timezone: string): number {
  return dayjs(ms).tz(timezone).day();
}

/** Monday of the calendar week containing `ms`, as a date key. */
export function weekStartKey(ms: number, timezone: string): string {
  const daysSinceMonday = (weekdayOf(ms, timezone) + 6) % DAYS_PER_WEEK;
  return addDaysToKey(dateKeyOf(ms, timezone), -daysSinceMonday);
}

export type WeekWindow = { startMs: number; endMs: number; weekStartKey: string };

export function weekWindowFor(ms: number, timezone: string): WeekWindow {
  const startKey = weekStartKey(ms, timezone);
  return {
    weekStartKey: startKey,
    startMs: startOfDateKey(startKey, timezone),
    endMs: startOfDateKey(addDaysToKey(startKey, DAYS_PER_WEEK), timezone),
  };
}

/**
 * Start of tomorrow in the operative timezone. Shifts starting before it are
 * history and never enter a trade.
 */
export function futureCutoff(now: number, timezone: string): number {
  return startOfDateKey(addDaysToKey(dateKeyOf(now, timezone), 1), timezone);
}

export function isWeekend(ms: number, timezone: string): boolean {
  return WEEKEND_DAYS.has(weekdayOf(ms, timezone));
}

export function isWeekendShift(shift: Shift, timezone: string): boolean {
  return isWeekend(shift.startMs, timezone) || isWeekend(shift.endMs - 1, timezone);
}

export function hoursBetween(startMs: number, endMs: number): number {
  return (endMs - startMs) / 3_600_000;
}
