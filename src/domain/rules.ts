import { hoursBetween, weekWindowFor } from './calendar';
import { reassignShift } from './schedule';
import type { Shift, SwapContext, SwapVerdict } from './types';
import { debugLog } from '@utils/debug';

export function hasOverlap(
  aStartMs: number,
  aEndMs: number,
  bStartMs: number,
  bEndMs: number,
): boolean {
  return aStartMs < bEndMs && bStartMs < aEndMs;
}

export function isFreeForInterval(
  schedule: readonly Shift[],
  startMs: number,
  endMs: number,
  excludeId?: string,
): boolean {
  return !schedule.some(
    (shift) =>
      (excludeId === undefined || shift.id !== excludeId) &&
      hasOverlap(shift.startMs, shift.endMs, startMs, endMs),
  );
}

/**
 * Rest around the shift at `index` only: the gap before it must be at least as
 * long as the previous shift, and the gap after it at least as long as itself.
 */
export function localRestOk(sortedSchedule: readonly Shift[], index: number): boolean {
  const current = sortedSchedule[index];
  if (!current) {
    return true;
  }
  const prev = index > 0 ? sortedSchedule[index - 1] : undefined;
  const next = sortedSchedule[index + 1];

  if (prev && current.startMs - prev.endMs < prev.endMs - prev.startMs) {
    return false;
  }
  if (next && next.startMs - current.endMs < current.endMs - current.startMs) {
    return false;
  }
  return true;
}

export function weeklyHours(schedule: readonly Shift[], anchor: Shift, timezone: string): number {
  const week = weekWindowFor(anchor.startMs, timezone);
  return schedule
    .filter((shift) => shift.startMs >= week.startMs && shift.startMs < week.endMs)
    .reduce((total, shift) => total + hoursBetween(shift.startMs, shift.endMs), 0);
}

export function weeklyCapOk(
  schedule: readonly Shift[],
  inserted: Shift,
  capHours: number,
  timezone: string,
): boolean {
  return weeklyHours(schedule, inserted, timezone) <= capHours;
}

export type PostSwapSchedules = {
  scheduleA: Shift[];
  scheduleB: Shift[];
  receivedByA: Shift;
  receivedByB: Shift;
};

function insertSorted(schedule: readonly Shift[], givenAwayId: string, incoming: Shift): Shift[] {
  const next = schedule.filter((shift) => shift.id !== givenAwayId);
  next.push(incoming);
  return next.sort((a, b) => a.startMs - b.startMs);
}

/** Throwaway post-trade schedules; the inputs are left untouched. */
export function buildPostSwapSchedules(
  shiftA: Shift,
  shiftB: Shift,
  ctx: SwapContext,
): PostSwapSchedules {
  const receivedByA = reassignShift(shiftB, shiftA.owner);
  const receivedByB = reassignShift(shiftA, shiftB.owner);
  return {
    scheduleA: insertSorted(ctx.schedules.get(shiftA.owner) ?? [], shiftA.id, receivedByA),
    scheduleB: insertSorted(ctx.schedules.get(shiftB.owner) ?? [], shiftB.id, receivedByB),
    receivedByA,
    receivedByB,
  };
}

export type SwapExplanation = SwapVerdict & { postSwap?: PostSwapSchedules };

export function explainSwap(shiftA: Shift, shiftB: Shift, ctx: SwapContext): SwapExplanation {
  if (shiftA.id === shiftB.id) {
    return { ok: false, reason: 'same-person' };
  }
  if (!shiftA.eligible || !shiftB.eligible) {
    return { ok: false, reason: 'ineligible-title' };
  }
  if (shiftA.owner === shiftB.owner) {
    return { ok: false, reason: 'same-person' };
  }

  const scheduleA = ctx.schedules.get(shiftA.owner) ?? [];
  const scheduleB = ctx.schedules.get(shiftB.owner) ?? [];
  if (!isFreeForInterval(scheduleB, shiftA.startMs, shiftA.endMs, shiftB.id)) {
    return { ok: false, reason: 'B-not-free-for-A' };
  }
  if (!isFreeForInterval(scheduleA, shiftB.startMs, shiftB.endMs, shiftA.id)) {
    return { ok: false, reason: 'A-not-free-for-B' };
  }

  const postSwap = buildPostSwapSchedules(shiftA, shiftB, ctx);
  if (!localRestOk(postSwap.scheduleA, postSwap.scheduleA.indexOf(postSwap.receivedByA))) {
    return { ok: false, reason: 'A-break-rule', postSwap };
  }
  if (!localRestOk(postSwap.scheduleB, postSwap.scheduleB.indexOf(postSwap.receivedByB))) {
    return { ok: false, reason: 'B-break-rule', postSwap };
  }

  const { weeklyCapHours, timezone } = ctx.config;
  if (!weeklyCapOk(postSwap.scheduleA, postSwap.receivedByA, weeklyCapHours, timezone)) {
    return { ok: false, reason: 'A-weekly-cap', postSwap };
  }
  if (!weeklyCapOk(postSwap.scheduleB, postSwap.receivedByB, weeklyCapHours, timezone)) {
    return { ok: false, reason: 'B-weekly-cap', postSwap };
  }

  return { ok: true, reason: 'ok', postSwap };
}

export function simulateSwap(shiftA: Shift, shiftB: Shift, ctx: SwapContext): SwapVerdict {
  const explanation = explainSwap(shiftA, shiftB, ctx);
  return explanation.ok
    ? { ok: true, reason: 'ok' }
    : { ok: false, reason: explanation.reason };
}

export function isFeasibleSwap(shiftA: Shift, shiftB: Shift, ctx: SwapContext): boolean {
  const verdict = simulateSwap(shiftA, shiftB, ctx);
  if (verdict.ok) {
    debugLog('swap.accepted', () => ({
      shiftA: { id: shiftA.id, owner: shiftA.owner, start: shiftA.startISO, end: shiftA.endISO },
      shiftB: { id: shiftB.id, owner: shiftB.owner, start: shiftB.startISO, end: shiftB.endISO },
    }));
  } else {
    debugLog('swap.reject', { shiftA: shiftA.id, shiftB: shiftB.id, reason: verdict.reason });
  }
  return verdict.ok;
}
