import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import { Logger } from '../utils/logger';
import type { ReviewComparison } from './types';

export const NONE_TOKEN = 'NONE';

export function formatScore(value: number): string {
  return value.toFixed(3);
}

/**
 * Column prefix for a source: its display name with whitespace removed
 */
function columnPrefix(sourceName: string): string {
  return sourceName.replace(/\s+/g, '');
}

export function reportColumns(referenceName: string, candidateName: string): string[] {
  const ref = columnPrefix(referenceName);
  const cand = columnPrefix(candidateName);
  return [
    'Review_ID',
    `${ref}_Aspects`,
    `${ref}_Count`,
    `${cand}_Aspects`,
    `${cand}_Count`,
    'True_Positives',
    'False_Negatives',
    'False_Positives',
    'Recall',
    'Precision',
    'F1_Score',
    'Details',
  ];
}

function joinLabels(labels: string[]): string {
  return labels.length > 0 ? labels.join(', ') : NONE_TOKEN;
}

export function toReportRow(comparison: ReviewComparison): Array<string | number> {
  const { metrics } = comparison;
  return [
    comparison.reviewId,
    joinLabels(comparison.referenceAspects),
    comparison.referenceAspects.length,
    joinLabels(comparison.candidateAspects),
    comparison.candidateAspects.length,
    metrics.truePositives,
    metrics.falseNegatives,
    metrics.falsePositives,
    formatScore(metrics.recall),
    formatScore(metrics.precision),
    formatScore(metrics.f1),
    metrics.detail,
  ];
}

/**
 * CSV text without a trailing line break, whether or not there are rows
 */
export function renderReportCsv(
  comparisons: readonly ReviewComparison[],
  referenceName: string,
  candidateName: string
): string {
  return Papa.unparse(
    {
      fields: reportColumns(referenceName, candidateName),
      data: comparisons.map(toReportRow),
    },
    { newline: '\n' }
  ).replace(/\n$/, '');
}

/**
 * Writes the row-level report, creating the parent directory when needed.
 * The header is written even when there are no rows.
 */
export function writeReportCsv(
  outputPath: string,
  comparisons: readonly ReviewComparison[],
  referenceName: string,
  candidateName: string
): void {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    Logger.debug(`[ReportWriter] Created output directory: ${dir}`);
  }
  fs.writeFileSync(outputPath, renderReportCsv(comparisons, referenceName, candidateName) + '\n', 'utf-8');
  Logger.info(`[ReportWriter] ✓ ${comparisons.length} rows written: ${outputPath}`);
}
