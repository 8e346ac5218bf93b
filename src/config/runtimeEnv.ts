import { ConfigError } from '@domain/errors';
import {
  DEFAULT_OFF_RUN_CONFIG,
  DEFAULT_WEEKLY_CAP_HOURS,
  type EngineConfig,
} from '@domain/types';
import { isKnownTimezone, resolveConfiguredTimezone } from '@utils/dayjs';
import { debugLog } from '@utils/debug';

export const DEFAULT_CACHE_TTL_SECONDS = 120;
export const DEFAULT_ROSTER_PATH = 'calendars.json';

export type RuntimeEnv = Readonly<{
  timezone: string;
  weeklyCapHours: number;
  cacheTtlMs: number;
  rosterPath: string;
  titlePatternsPath: string | null;
}>;

export type RawEnv = {
  readonly SHIFT_TRADE_TZ?: string;
  readonly TZ_OPERATIVE?: string;
  readonly SHIFT_TRADE_WEEKLY_CAP_HOURS?: string;
  readonly SHIFT_TRADE_CACHE_TTL_SECONDS?: string;
  readonly SHIFT_TRADE_ROSTER_PATH?: string;
  readonly SHIFT_TRADE_TITLE_PATTERNS_PATH?: string;
};

let cachedEnv: RuntimeEnv | null = null;

function normalize(value: string | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function ensureNonNegativeNumber(name: string, raw: string | null, fallback: number): number {
  if (raw === null) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`Invalid ${name} provided: "${raw}" is not a non-negative number`);
  }
  return parsed;
}

export function resolveRuntimeEnv(rawEnv: RawEnv = process.env): RuntimeEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const timezone = resolveConfiguredTimezone(rawEnv);
  if (!isKnownTimezone(timezone)) {
    throw new ConfigError(`Invalid SHIFT_TRADE_TZ provided: unknown timezone "${timezone}"`);
  }

  const weeklyCapHours = ensureNonNegativeNumber(
    'SHIFT_TRADE_WEEKLY_CAP_HOURS',
    normalize(rawEnv.SHIFT_TRADE_WEEKLY_CAP_HOURS),
    DEFAULT_WEEKLY_CAP_HOURS,
  );
  const cacheTtlSeconds = ensureNonNegativeNumber(
    'SHIFT_TRADE_CACHE_TTL_SECONDS',
    normalize(rawEnv.SHIFT_TRADE_CACHE_TTL_SECONDS),
    DEFAULT_CACHE_TTL_SECONDS,
  );
  const configuredRosterPath = normalize(rawEnv.SHIFT_TRADE_ROSTER_PATH);
  if (!configuredRosterPath) {
    debugLog('env', `SHIFT_TRADE_ROSTER_PATH not set; falling back to ${DEFAULT_ROSTER_PATH}.`);
  }
  const rosterPath = configuredRosterPath ?? DEFAULT_ROSTER_PATH;

  cachedEnv = {
    timezone,
    weeklyCapHours,
    cacheTtlMs: cacheTtlSeconds * 1000,
    rosterPath,
    titlePatternsPath: normalize(rawEnv.SHIFT_TRADE_TITLE_PATTERNS_PATH),
  };

  return cachedEnv;
}

export function resetRuntimeEnv(): void {
  cachedEnv = null;
}

export function engineConfigFromEnv(env: RuntimeEnv = resolveRuntimeEnv()): EngineConfig {
  return {
    timezone: env.timezone,
    weeklyCapHours: env.weeklyCapHours,
    offRun: DEFAULT_OFF_RUN_CONFIG,
  };
}
