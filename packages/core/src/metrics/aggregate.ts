import type { AggregateMetrics, MetricResult } from './types';

/**
 * Running totals for macro (mean of per-review values) and micro (recomputed
 * from summed counts) averages. The two only agree when every review carries
 * the same number of labels, so both are always reported.
 */
export class MetricAccumulator {
  private reviewCount = 0;
  private recallSum = 0;
  private precisionSum = 0;
  private f1Sum = 0;
  private truePositives = 0;
  private falseNegatives = 0;
  private falsePositives = 0;

  add(result: MetricResult): void {
    this.reviewCount++;
    this.recallSum += result.recall;
    this.precisionSum += result.precision;
    this.f1Sum += result.f1;
    this.truePositives += result.truePositives;
    this.falseNegatives += result.falseNegatives;
    this.falsePositives += result.falsePositives;
  }

  summarize(): AggregateMetrics {
    const n = this.reviewCount;
    const tp = this.truePositives;
    const fn = this.falseNegatives;
    const fp = this.falsePositives;

    const microRecall = tp + fn > 0 ? (tp / (tp + fn)) * 100 : 0;
    const microPrecision = tp + fp > 0 ? (tp / (tp + fp)) * 100 : 0;
    // From the integer totals, so an exact 80% stays exactly 80
    const microF1 = 2 * tp + fn + fp > 0 ? (200 * tp) / (2 * tp + fn + fp) : 0;

    return {
      reviewCount: n,
      macroRecall: n > 0 ? (this.recallSum / n) * 100 : 0,
      macroPrecision: n > 0 ? (this.precisionSum / n) * 100 : 0,
      macroF1: n > 0 ? (this.f1Sum / n) * 100 : 0,
      microRecall,
      microPrecision,
      microF1,
      totals: { truePositives: tp, falseNegatives: fn, falsePositives: fp },
    };
  }
}

export function aggregateMetrics(results: Iterable<MetricResult>): AggregateMetrics {
  const accumulator = new MetricAccumulator();
  for (const result of results) {
    accumulator.add(result);
  }
  return accumulator.summarize();
}
