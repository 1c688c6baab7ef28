/**
 * Audit Driver
 *
 * Loads both label exports, compares every review either side mentions,
 * writes the row-level CSV and prints the summary and recommendation.
 */

import { Logger } from '../utils/logger';
import { DEFAULT_AUDIT_SETTINGS, type AuditSettings } from '../utils/ConfigLoader';
import { AspectNormalizer } from '../vocabulary/AspectNormalizer';
import { loadReference } from '../loaders/referenceLoader';
import { loadCandidate } from '../loaders/candidateLoader';
import { countLabels, type LabelIndex } from '../loaders/types';
import { compareLabels } from '../metrics/compareLabels';
import { MetricAccumulator } from '../metrics/aggregate';
import { writeReportCsv } from './reportRows';
import { decide, selectWorstCases } from './decision';
import { renderDecision, renderFooter, renderSummary } from './consoleReport';
import type { AuditReportInput, AuditSummary, ReviewComparison } from './types';

export interface RunAuditOptions {
  referencePath: string;
  candidatePath: string;
  outputPath: string;
  /** Defaults to DEFAULT_AUDIT_SETTINGS; partial settings are merged over it */
  settings?: Partial<AuditSettings>;
  /** Receives each console report line (default: console.log) */
  print?: (line: string) => void;
}

const RULE = '='.repeat(80);

/**
 * Sorted union of review ids from both sources
 */
export function collectReviewIds(reference: LabelIndex, candidate: LabelIndex): string[] {
  return [...new Set([...reference.keys(), ...candidate.keys()])].sort();
}

/**
 * Compares each review in the union. A review missing from one side counts
 * as having no aspects on that side.
 */
export function compareSources(reference: LabelIndex, candidate: LabelIndex): ReviewComparison[] {
  return collectReviewIds(reference, candidate).map(reviewId => {
    const referenceAspects = reference.get(reviewId) ?? [];
    const candidateAspects = candidate.get(reviewId) ?? [];
    const metrics = compareLabels(referenceAspects, candidateAspects);
    Logger.debug(`[Audit] ${reviewId}: F1=${metrics.f1.toFixed(3)} (${metrics.detail})`);
    return { reviewId, referenceAspects, candidateAspects, metrics };
  });
}

export function runAudit(options: RunAuditOptions): AuditSummary {
  const settings: AuditSettings = { ...DEFAULT_AUDIT_SETTINGS, ...options.settings };
  const print = options.print ?? ((line: string) => console.log(line));
  const normalizer = new AspectNormalizer(settings.synonyms);
  const { referenceName, candidateName } = settings;
  const { outputPath } = options;

  print(RULE);
  print(`ASPECT LABEL AGREEMENT AUDIT: ${referenceName.toUpperCase()} VS ${candidateName.toUpperCase()}`);
  print(RULE);

  print(`\n1. Loading ${referenceName} labels...`);
  const reference = loadReference(options.referencePath, normalizer, settings.referenceColumns);
  const referenceAspects = countLabels(reference);
  print(`   Loaded ${reference.size} reviews from ${referenceName}`);
  print(`   Total aspects: ${referenceAspects}`);

  print(`\n2. Loading ${candidateName} labels...`);
  const candidate = loadCandidate(options.candidatePath, normalizer);
  const candidateAspects = countLabels(candidate);
  print(`   Loaded ${candidate.size} reviews from ${candidateName}`);
  print(`   Total aspects: ${candidateAspects}`);

  print('\n3. Calculating metrics...');
  const comparisons = compareSources(reference, candidate);
  const accumulator = new MetricAccumulator();
  comparisons.forEach(comparison => accumulator.add(comparison.metrics));

  print(`\n4. Writing results to ${outputPath}...`);
  writeReportCsv(outputPath, comparisons, referenceName, candidateName);

  const aggregate = accumulator.summarize();
  const decision = decide(aggregate.microF1, settings.threshold);
  const worstCases =
    decision === 'fail'
      ? selectWorstCases(comparisons, settings.worstCaseF1Below, settings.worstCaseLimit)
      : [];

  const report: AuditReportInput = {
    aggregate,
    reference: { name: referenceName, reviews: reference.size, aspects: referenceAspects },
    candidate: { name: candidateName, reviews: candidate.size, aspects: candidateAspects },
    threshold: settings.threshold,
    decision,
    worstCases,
    worstCaseF1Below: settings.worstCaseF1Below,
    outputPath,
  };
  [...renderSummary(report), ...renderDecision(report), ...renderFooter(outputPath)].forEach(print);

  Logger.info(
    `[Audit] ✓ ${aggregate.reviewCount} reviews, micro-F1 ${aggregate.microF1.toFixed(2)}% → ${decision}`
  );

  return {
    macroF1: aggregate.macroF1,
    microF1: aggregate.microF1,
    microRecall: aggregate.microRecall,
    microPrecision: aggregate.microPrecision,
    totalTp: aggregate.totals.truePositives,
    totalFn: aggregate.totals.falseNegatives,
    totalFp: aggregate.totals.falsePositives,
    reviewCount: aggregate.reviewCount,
    macroRecall: aggregate.macroRecall,
    macroPrecision: aggregate.macroPrecision,
    threshold: settings.threshold,
    decision,
    worstCases,
    worstCaseF1Below: settings.worstCaseF1Below,
    outputPath,
  };
}
