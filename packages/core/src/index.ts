/**
 * @aspect-audit/core
 *
 * Label agreement audit between a reference labeler and a candidate labeler:
 * vocabulary normalization, the two source loaders, per-review metrics,
 * macro/micro aggregation and the go/no-go decision.
 */

// ============================================================================
// Audit Driver
// ============================================================================
export { runAudit, compareSources, collectReviewIds } from './audit/runAudit';
export type { RunAuditOptions } from './audit/runAudit';
export { decide, selectWorstCases } from './audit/decision';
export { renderSummary, renderDecision, renderFooter } from './audit/consoleReport';
export {
  reportColumns,
  renderReportCsv,
  writeReportCsv,
  toReportRow,
  formatScore,
  NONE_TOKEN,
} from './audit/reportRows';
export type {
  AuditDecision,
  AuditSummary,
  AuditReportInput,
  ReviewComparison,
  SourceTotals,
  WorstCase,
} from './audit/types';

// ============================================================================
// Vocabulary
// ============================================================================
export { AspectNormalizer } from './vocabulary/AspectNormalizer';
export { DEFAULT_SYNONYMS, type SynonymTable } from './vocabulary/defaultVocabulary';

// ============================================================================
// Loaders
// ============================================================================
export { loadReference, parseReferenceCsv } from './loaders/referenceLoader';
export { loadCandidate, parseCandidateExport } from './loaders/candidateLoader';
export {
  parseCandidateLine,
  splitTolerantLine,
  stripOuterQuotes,
  type CandidateLine,
} from './loaders/tolerantLineParser';
export {
  countLabels,
  DEFAULT_REFERENCE_COLUMNS,
  type LabelIndex,
  type ReferenceColumns,
} from './loaders/types';

// ============================================================================
// Metrics
// ============================================================================
export { compareLabels, f1Score } from './metrics/compareLabels';
export { MetricAccumulator, aggregateMetrics } from './metrics/aggregate';
export type { MetricResult, AggregateMetrics, ConfusionTotals } from './metrics/types';

// ============================================================================
// Schemas & Configuration
// ============================================================================
export {
  AuditConfigSchema,
  validateAuditConfig,
  validateVocabularyFile,
  formatValidationErrors,
  CURRENT_SCHEMA_VERSION,
  SUPPORTED_SCHEMA_VERSIONS,
  type AuditConfigFile,
  type ValidationResult,
  type ValidationError,
} from './schemas';
export { ConfigLoader, DEFAULT_AUDIT_SETTINGS, type AuditSettings } from './utils/ConfigLoader';

// ============================================================================
// Utilities
// ============================================================================
export { Logger } from './utils/logger';
