import type { AggregateMetrics, MetricResult } from '../metrics/types';

export type AuditDecision = 'pass' | 'fail';

export interface ReviewComparison {
  reviewId: string;
  referenceAspects: string[];
  candidateAspects: string[];
  metrics: MetricResult;
}

export interface WorstCase {
  reviewId: string;
  /** Rounded to three decimals, as written to the report */
  f1: string;
  detail: string;
}

/**
 * Returned by runAudit. Percentages are 0-100.
 */
export interface AuditSummary {
  macroF1: number;
  microF1: number;
  microRecall: number;
  microPrecision: number;
  totalTp: number;
  totalFn: number;
  totalFp: number;
  reviewCount: number;
  macroRecall: number;
  macroPrecision: number;
  threshold: number;
  decision: AuditDecision;
  worstCases: WorstCase[];
  /** F1 cutoff the worst cases were selected under */
  worstCaseF1Below: number;
  outputPath: string;
}

export interface SourceTotals {
  name: string;
  reviews: number;
  aspects: number;
}

export interface AuditReportInput {
  aggregate: AggregateMetrics;
  reference: SourceTotals;
  candidate: SourceTotals;
  threshold: number;
  decision: AuditDecision;
  worstCases: WorstCase[];
  worstCaseF1Below: number;
  outputPath: string;
}
