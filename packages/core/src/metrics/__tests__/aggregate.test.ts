import { describe, it, expect } from 'vitest';
import { aggregateMetrics, MetricAccumulator } from '../aggregate';
import { compareLabels } from '../compareLabels';

describe('aggregateMetrics', () => {
  it('keeps macro and micro averages apart when label-set sizes differ', () => {
    const results = [
      compareLabels(['A'], ['A']),
      compareLabels(['A', 'B', 'C', 'D'], ['A']),
    ];

    const aggregate = aggregateMetrics(results);

    // Per review F1: 1.0 and 0.4
    expect(aggregate.macroF1).toBeCloseTo(70, 10);
    expect(aggregate.macroRecall).toBeCloseTo(62.5, 10);
    expect(aggregate.macroPrecision).toBeCloseTo(100, 10);

    // Summed counts: tp 2, fn 3, fp 0
    expect(aggregate.totals).toEqual({ truePositives: 2, falseNegatives: 3, falsePositives: 0 });
    expect(aggregate.microRecall).toBeCloseTo(40, 10);
    expect(aggregate.microPrecision).toBeCloseTo(100, 10);
    expect(aggregate.microF1).toBeCloseTo(57.142857, 5);

    expect(Math.abs(aggregate.macroF1 - aggregate.microF1)).toBeGreaterThan(10);
  });

  it('matches macro and micro when every review has the same shape', () => {
    const aggregate = aggregateMetrics([
      compareLabels(['A', 'B'], ['A', 'C']),
      compareLabels(['D', 'E'], ['D', 'F']),
    ]);

    expect(aggregate.macroF1).toBeCloseTo(50, 10);
    expect(aggregate.microF1).toBeCloseTo(50, 10);
  });

  it('reports zero for an empty run', () => {
    expect(aggregateMetrics([])).toEqual({
      reviewCount: 0,
      macroRecall: 0,
      macroPrecision: 0,
      macroF1: 0,
      microRecall: 0,
      microPrecision: 0,
      microF1: 0,
      totals: { truePositives: 0, falseNegatives: 0, falsePositives: 0 },
    });
  });

  it('counts both-empty reviews in the macro average only', () => {
    const aggregate = aggregateMetrics([compareLabels([], [])]);

    expect(aggregate.reviewCount).toBe(1);
    expect(aggregate.macroF1).toBe(100);
    expect(aggregate.microF1).toBe(0);
  });
});

describe('MetricAccumulator', () => {
  it('lands exactly on 80% micro-F1 when the counts do', () => {
    const shared = Array.from({ length: 18 }, (_, i) => `Shared ${i + 1}`);
    const reference = [...shared, 'Missed 1'];
    const candidate = [...shared, ...Array.from({ length: 8 }, (_, i) => `Extra ${i + 1}`)];

    const accumulator = new MetricAccumulator();
    accumulator.add(compareLabels(reference, candidate));
    const aggregate = accumulator.summarize();

    expect(aggregate.totals).toEqual({ truePositives: 18, falseNegatives: 1, falsePositives: 8 });
    expect(aggregate.microF1).toBe(80);
  });

  it('summarizes incrementally added results', () => {
    const accumulator = new MetricAccumulator();
    accumulator.add(compareLabels(['A'], ['A', 'B']));
    accumulator.add(compareLabels([], ['C']));

    const aggregate = accumulator.summarize();

    expect(aggregate.reviewCount).toBe(2);
    expect(aggregate.totals).toEqual({ truePositives: 1, falseNegatives: 0, falsePositives: 2 });
    expect(aggregate.microRecall).toBe(100);
    expect(aggregate.microPrecision).toBeCloseTo(100 / 3, 10);
  });
});
