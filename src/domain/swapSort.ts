import type { TradeCandidate } from './types';

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Earliest counter-shift first; ties go to the counter-party name, then the
 * shift id, so equal datasets always list candidates in the same order.
 */
export function compareCandidates(a: TradeCandidate, b: TradeCandidate): number {
  const diff = a.counterpartyShift.startMs - b.counterpartyShift.startMs;
  if (diff !== 0) {
    return diff;
  }
  const byOwner = compareText(a.counterpartyOwner, b.counterpartyOwner);
  if (byOwner !== 0) {
    return byOwner;
  }
  return compareText(a.counterpartyShift.id, b.counterpartyShift.id);
}

export function sortCandidates(candidates: readonly TradeCandidate[]): TradeCandidate[] {
  return [...candidates].sort(compareCandidates);
}
