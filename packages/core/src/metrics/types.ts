export interface MetricResult {
  readonly recall: number;
  readonly precision: number;
  readonly f1: number;
  readonly truePositives: number;
  readonly falseNegatives: number;
  readonly falsePositives: number;
  /** "Matched: ... | Missed: ... | Extra: ..." */
  readonly detail: string;
}

export interface ConfusionTotals {
  truePositives: number;
  falseNegatives: number;
  falsePositives: number;
}

/**
 * Aggregate metrics, all expressed as percentages (0-100)
 */
export interface AggregateMetrics {
  reviewCount: number;
  macroRecall: number;
  macroPrecision: number;
  macroF1: number;
  microRecall: number;
  microPrecision: number;
  microF1: number;
  totals: ConfusionTotals;
}
