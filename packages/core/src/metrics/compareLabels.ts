import type { MetricResult } from './types';

/**
 * Case-folded label -> first spelling seen, in input order
 */
function foldLabels(labels: readonly string[]): Map<string, string> {
  const folded = new Map<string, string>();
  for (const label of labels) {
    const key = label.toLowerCase();
    if (!folded.has(key)) {
      folded.set(key, label);
    }
  }
  return folded;
}

function describeGroup(title: string, keys: string[], spelling: Map<string, string>): string | null {
  if (keys.length === 0) {
    return null;
  }
  const names = [...keys].sort().map(key => spelling.get(key) ?? key);
  return `${title}: ${names.join(', ')}`;
}

export function f1Score(recall: number, precision: number): number {
  return recall + precision > 0 ? (2 * recall * precision) / (recall + precision) : 0;
}

/**
 * Compares the aspect labels of one review.
 *
 * Degenerate cases are settled before any division:
 *   - both empty: perfect agreement (1.0 across the board)
 *   - empty reference: every candidate label is a false positive
 *   - empty candidate: every reference label is a false negative
 *
 * Otherwise both lists are compared as case-insensitive sets.
 */
export function compareLabels(reference: readonly string[], candidate: readonly string[]): MetricResult {
  if (reference.length === 0 && candidate.length === 0) {
    return {
      recall: 1,
      precision: 1,
      f1: 1,
      truePositives: 0,
      falseNegatives: 0,
      falsePositives: 0,
      detail: 'Both empty',
    };
  }

  if (reference.length === 0) {
    return {
      recall: 0,
      precision: 0,
      f1: 0,
      truePositives: 0,
      falseNegatives: 0,
      falsePositives: candidate.length,
      detail: 'Reference has no aspects',
    };
  }

  if (candidate.length === 0) {
    return {
      recall: 0,
      precision: 0,
      f1: 0,
      truePositives: 0,
      falseNegatives: reference.length,
      falsePositives: 0,
      detail: 'Candidate found no aspects',
    };
  }

  const referenceSet = foldLabels(reference);
  const candidateSet = foldLabels(candidate);

  const matched = [...referenceSet.keys()].filter(key => candidateSet.has(key));
  const missed = [...referenceSet.keys()].filter(key => !candidateSet.has(key));
  const extra = [...candidateSet.keys()].filter(key => !referenceSet.has(key));

  const recall = matched.length / referenceSet.size;
  const precision = matched.length / candidateSet.size;

  const details = [
    describeGroup('Matched', matched, referenceSet),
    describeGroup('Missed', missed, referenceSet),
    describeGroup('Extra', extra, candidateSet),
  ].filter((group): group is string => group !== null);

  return {
    recall,
    precision,
    f1: f1Score(recall, precision),
    truePositives: matched.length,
    falseNegatives: missed.length,
    falsePositives: extra.length,
    detail: details.length > 0 ? details.join(' | ') : 'Perfect match',
  };
}
