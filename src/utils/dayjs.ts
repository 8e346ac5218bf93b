import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import duration from 'dayjs/plugin/duration';

export const DEFAULT_TIMEZONE = 'America/New_York';

export type EnvLike =
  | {
      SHIFT_TRADE_TZ?: string | undefined;
      TZ_OPERATIVE?: string | undefined;
    }
  | undefined;

export function resolveConfiguredTimezone(env: EnvLike): string {
  const candidate = env?.SHIFT_TRADE_TZ ?? env?.TZ_OPERATIVE;
  if (typeof candidate === 'string' && candidate.trim().length > 0) {
    return candidate.trim();
  }
  return DEFAULT_TIMEZONE;
}

export function isKnownTimezone(name: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: name });
    return true;
  } catch {
    return false;
  }
}

const configuredTimezone = (() => {
  const fromEnv = resolveConfiguredTimezone(
    typeof process !== 'undefined' ? process.env : undefined,
  );
  return isKnownTimezone(fromEnv) ? fromEnv : DEFAULT_TIMEZONE;
})();

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);
dayjs.extend(duration);

dayjs.tz.setDefault(configuredTimezone);

export const ACTIVE_TIMEZONE = configuredTimezone;

export default dayjs;
