import { describe, it, expect } from 'vitest';
import { decide, selectWorstCases } from '../decision';
import { compareLabels } from '../../metrics/compareLabels';
import type { MetricResult } from '../../metrics/types';
import type { ReviewComparison } from '../types';

function comparison(reviewId: string, f1: number, detail = 'detail'): ReviewComparison {
  const metrics: MetricResult = {
    recall: f1,
    precision: f1,
    f1,
    truePositives: 0,
    falseNegatives: 0,
    falsePositives: 0,
    detail,
  };
  return { reviewId, referenceAspects: [], candidateAspects: [], metrics };
}

describe('decide', () => {
  it('passes at exactly the threshold', () => {
    expect(decide(80, 80)).toBe('pass');
  });

  it('fails just below the threshold', () => {
    expect(decide(79.999, 80)).toBe('fail');
  });

  it('passes above the threshold', () => {
    expect(decide(92.5, 80)).toBe('pass');
  });
});

describe('selectWorstCases', () => {
  it('keeps reviews below the cutoff, lowest F1 first', () => {
    const worst = selectWorstCases(
      [comparison('R1', 0.4), comparison('R2', 0), comparison('R3', 1), comparison('R4', 0.25)],
      0.5,
      10
    );

    expect(worst.map(w => [w.reviewId, w.f1])).toEqual([
      ['R2', '0.000'],
      ['R4', '0.250'],
      ['R1', '0.400'],
    ]);
  });

  it('compares the rounded F1 that the report shows', () => {
    expect(selectWorstCases([comparison('R1', 0.4996)], 0.5, 10)).toEqual([]);
    expect(selectWorstCases([comparison('R1', 0.4994)], 0.5, 10)).toEqual([
      { reviewId: 'R1', f1: '0.499', detail: 'detail' },
    ]);
  });

  it('keeps review order for ties and honours the limit', () => {
    const comparisons = ['R1', 'R2', 'R3', 'R4'].map(id => comparison(id, 0));

    expect(selectWorstCases(comparisons, 0.5, 2).map(w => w.reviewId)).toEqual(['R1', 'R2']);
  });

  it('carries the detail text of each review', () => {
    const real: ReviewComparison = {
      reviewId: 'R9',
      referenceAspects: ['Comfort'],
      candidateAspects: [],
      metrics: compareLabels(['Comfort'], []),
    };

    expect(selectWorstCases([real], 0.5, 10)).toEqual([
      { reviewId: 'R9', f1: '0.000', detail: 'Candidate found no aspects' },
    ]);
  });
});
