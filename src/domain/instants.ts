import dayjs from '@utils/dayjs';
import type { Dayjs } from 'dayjs';
import { MalformedEventError } from './errors';
import type { RawInstant } from './types';

export type RawInstantKind = 'date' | 'zoned' | 'naive';

const MINUTE_MS = 60_000;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const COMPACT_DATE = /^\d{8}$/;
const ZONED_ISO = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;
const NAIVE_ISO = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/i;
const COMPACT_UTC = /^\d{8}T\d{6}Z$/i;
const COMPACT_NAIVE = /^\d{8}T\d{6}$/i;
const ISO_DURATION =
  /^P(?!$)(?:\d+(?:\.\d+)?Y)?(?:\d+(?:\.\d+)?M)?(?:\d+(?:\.\d+)?W)?(?:\d+(?:\.\d+)?D)?(?:T(?=\d)(?:\d+(?:\.\d+)?H)?(?:\d+(?:\.\d+)?M)?(?:\d+(?:\.\d+)?S)?)?$/i;

export const DEFAULT_SHIFT_DURATION_MS = 60 * MINUTE_MS;

export function floorToMinute(ms: number): number {
  return Math.floor(ms / MINUTE_MS) * MINUTE_MS;
}

export function classifyRawInstant(raw: RawInstant): RawInstantKind | null {
  if (raw instanceof Date) {
    return 'zoned';
  }
  const value = raw.trim();
  if (DATE_ONLY.test(value) || COMPACT_DATE.test(value)) {
    return 'date';
  }
  if (ZONED_ISO.test(value) || COMPACT_UTC.test(value)) {
    return 'zoned';
  }
  if (NAIVE_ISO.test(value) || COMPACT_NAIVE.test(value)) {
    return 'naive';
  }
  return null;
}

function withColonOffset(value: string): string {
  const normalized = value.replace(' ', 'T').replace(/z$/, 'Z');
  return normalized.replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
}

function hasValidCalendarDate(value: string): boolean {
  return /^\d{8}/.test(value)
    ? dayjs(value.slice(0, 8), 'YYYYMMDD', true).isValid()
    : dayjs(value.slice(0, 10), 'YYYY-MM-DD', true).isValid();
}

function parseRaw(raw: RawInstant, timezone: string): Dayjs {
  if (raw instanceof Date) {
    return dayjs(raw);
  }
  const value = raw.trim();
  if (classifyRawInstant(value) !== null && !hasValidCalendarDate(value)) {
    throw new MalformedEventError(`Invalid calendar date in "${value}"`);
  }
  switch (classifyRawInstant(value)) {
    case 'date':
      return COMPACT_DATE.test(value)
        ? dayjs.tz(value, 'YYYYMMDD', timezone)
        : dayjs.tz(value, timezone);
    case 'zoned':
      return COMPACT_UTC.test(value)
        ? dayjs.utc(value.toUpperCase(), 'YYYYMMDD[T]HHmmss[Z]', true)
        : dayjs(withColonOffset(value));
    case 'naive':
      return COMPACT_NAIVE.test(value)
        ? dayjs.tz(value.toUpperCase(), 'YYYYMMDD[T]HHmmss', timezone)
        : dayjs.tz(value.replace(' ', 'T'), timezone);
    default:
      throw new MalformedEventError(`Unrecognised timestamp "${value}"`);
  }
}

/**
 * Converts a raw calendar timestamp into the operative timezone, floored to the
 * minute. Every instant compared downstream must pass through here.
 */
export function normalizeInstant(raw: RawInstant, timezone: string): Dayjs {
  const parsed = parseRaw(raw, timezone);
  if (!parsed.isValid()) {
    throw new MalformedEventError(`Invalid timestamp "${String(raw)}"`);
  }
  return dayjs(floorToMinute(parsed.valueOf())).tz(timezone);
}

export function parseIsoDuration(value: string): number {
  const trimmed = value.trim();
  if (!ISO_DURATION.test(trimmed)) {
    throw new MalformedEventError(`Unrecognised duration "${trimmed}"`);
  }
  return dayjs.duration(trimmed.toUpperCase()).asMilliseconds();
}
