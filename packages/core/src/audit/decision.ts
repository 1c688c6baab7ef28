import type { AuditDecision, ReviewComparison, WorstCase } from './types';
import { formatScore } from './reportRows';

/**
 * Inclusive on the pass side: a micro-F1 equal to the threshold passes.
 */
export function decide(microF1: number, threshold: number): AuditDecision {
  return microF1 >= threshold ? 'pass' : 'fail';
}

/**
 * Reviews whose reported (three-decimal) F1 is below the cutoff, lowest first.
 * Ties keep review id order.
 */
export function selectWorstCases(
  comparisons: readonly ReviewComparison[],
  f1Below: number,
  limit: number
): WorstCase[] {
  return comparisons
    .map(comparison => ({
      reviewId: comparison.reviewId,
      f1: formatScore(comparison.metrics.f1),
      detail: comparison.metrics.detail,
    }))
    .filter(worst => parseFloat(worst.f1) < f1Below)
    .sort((a, b) => parseFloat(a.f1) - parseFloat(b.f1))
    .slice(0, limit);
}
