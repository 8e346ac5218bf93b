import { addDaysToKey, dateKeyOf } from './calendar';
import { buildPostSwapSchedules } from './rules';
import {
  DEFAULT_OFF_RUN_CONFIG,
  OffRunAdvisory,
  OffRunConfig,
  Shift,
  SwapContext,
} from './types';

export function shiftStartDateKeys(schedule: readonly Shift[], timezone: string): Set<string> {
  return new Set(schedule.map((shift) => dateKeyOf(shift.startMs, timezone)));
}

/**
 * Length of the run of consecutive days without a shift start that contains
 * `dateKey`, or 0 when a shift starts on `dateKey`. The walk backward stops once
 * the count reaches `lookbackGuard`; the walk forward once it reaches
 * `lookaheadGuard`.
 */
export function offRunLength(
  schedule: readonly Shift[],
  dateKey: string,
  timezone: string,
  options: OffRunConfig = DEFAULT_OFF_RUN_CONFIG,
): number {
  const startDates = shiftStartDateKeys(schedule, timezone);
  if (startDates.has(dateKey)) {
    return 0;
  }

  let runLength = 1;
  let cursor = dateKey;
  while (runLength < options.lookbackGuard) {
    cursor = addDaysToKey(cursor, -1);
    if (startDates.has(cursor)) {
      break;
    }
    runLength += 1;
  }

  cursor = dateKey;
  while (runLength < options.lookaheadGuard) {
    cursor = addDaysToKey(cursor, 1);
    if (startDates.has(cursor)) {
      break;
    }
    runLength += 1;
  }

  return runLength;
}

export function isInLongOffRun(
  schedule: readonly Shift[],
  dateKey: string,
  timezone: string,
  options: OffRunConfig = DEFAULT_OFF_RUN_CONFIG,
): boolean {
  return offRunLength(schedule, dateKey, timezone, options) >= options.threshold;
}

/**
 * Advisory only: whether either side receives its new shift on a day inside a
 * long stretch without shift starts. Each recipient is judged on the post-trade
 * schedule minus the shift being received, since that shift always starts on
 * the day under test.
 */
export function offRunAdvisoryForSwap(
  traderShift: Shift,
  counterShift: Shift,
  ctx: SwapContext,
): OffRunAdvisory {
  const { timezone, offRun } = ctx.config;
  const postSwap = buildPostSwapSchedules(traderShift, counterShift, ctx);
  const receivesOnOffRun = (schedule: readonly Shift[], received: Shift): boolean =>
    isInLongOffRun(
      schedule.filter((shift) => shift !== received),
      dateKeyOf(received.startMs, timezone),
      timezone,
      offRun,
    );
  return {
    recipientOnOffRun: receivesOnOffRun(postSwap.scheduleB, postSwap.receivedByB),
    giverOnOffRun: receivesOnOffRun(postSwap.scheduleA, postSwap.receivedByA),
  };
}
