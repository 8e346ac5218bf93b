import { explainSwap } from '@domain/rules';
import { offRunAdvisoryForSwap } from '@domain/offRun';
import { sortCandidates } from '@domain/swapSort';
import type { ReasonCode, Shift, SwapContext, TradeCandidate } from '@domain/types';
import { debugLog, withDebugGroup } from '@utils/debug';

const MAX_REJECTION_SAMPLES = 10;

export type RejectionSample = {
  reason: Exclude<ReasonCode, 'ok'>;
  counterShiftId: string;
};

export type CandidateSearchResult = {
  accepted: TradeCandidate[];
  totalPairs: number;
  rejectionReasons: Partial<Record<Exclude<ReasonCode, 'ok'>, number>>;
  samples: RejectionSample[];
};

function logRejectionSummary(label: string, result: CandidateSearchResult): void {
  const topReasons = Object.entries(result.rejectionReasons)
    .sort((a, b) => (b[1] ?? 0) - (a[1] ?? 0))
    .slice(0, 5);
  debugLog(`${label}:topReasons`, topReasons);
  if (result.samples.length > 0) {
    debugLog(`${label}:samplePairs`, result.samples.slice(0, 5));
  }
}

/**
 * Runs the swap simulator for `traderShift` against every shift held by someone
 * else and keeps the legal ones, with their off-run advisories, in display
 * order. Rejections are tallied per reason code.
 */
export function searchCandidates(
  shifts: readonly Shift[],
  traderShift: Shift,
  ctx: SwapContext,
): CandidateSearchResult {
  return withDebugGroup(
    'searchCandidates',
    () => ({ traderShift: traderShift.id, owner: traderShift.owner, pool: shifts.length }),
    () => {
      const accepted: TradeCandidate[] = [];
      const rejectionReasons: CandidateSearchResult['rejectionReasons'] = {};
      const samples: RejectionSample[] = [];
      let totalPairs = 0;

      for (const counterShift of shifts) {
        if (counterShift.owner === traderShift.owner) {
          continue;
        }
        totalPairs += 1;
        const verdict = explainSwap(traderShift, counterShift, ctx);
        if (!verdict.ok) {
          rejectionReasons[verdict.reason] = (rejectionReasons[verdict.reason] ?? 0) + 1;
          if (samples.length < MAX_REJECTION_SAMPLES) {
            samples.push({ reason: verdict.reason, counterShiftId: counterShift.id });
          }
          continue;
        }
        accepted.push({
          traderShift,
          counterpartyOwner: counterShift.owner,
          counterpartyShift: counterShift,
          reason: 'ok',
          advisory: offRunAdvisoryForSwap(traderShift, counterShift, ctx),
        });
      }

      const result: CandidateSearchResult = {
        accepted: sortCandidates(accepted),
        totalPairs,
        rejectionReasons,
        samples,
      };
      if (result.accepted.length === 0) {
        logRejectionSummary('searchCandidates', result);
      }
      debugLog('searchCandidates:results', () => ({
        feasible: result.accepted.length,
        rejected: totalPairs - result.accepted.length,
        first: result.accepted.slice(0, 5).map((candidate) => candidate.counterpartyShift.id),
      }));
      return result;
    },
  );
}

export function findCandidates(
  shifts: readonly Shift[],
  traderShift: Shift,
  ctx: SwapContext,
): TradeCandidate[] {
  return searchCandidates(shifts, traderShift, ctx).accepted;
}
