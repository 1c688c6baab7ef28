import Papa from 'papaparse';
import { Logger } from '../utils/logger';
import { readTextFile } from '../utils/textFile';
import type { AspectNormalizer } from '../vocabulary/AspectNormalizer';
import { DEFAULT_REFERENCE_COLUMNS, type LabelIndex, type ReferenceColumns } from './types';

/**
 * Parses reference CSV content: one row per review, every aspect of the review
 * packed into one comma-separated cell.
 *
 * When a review id appears on more than one row, the last row wins.
 */
export function parseReferenceCsv(
  content: string,
  normalizer: AspectNormalizer,
  columns: ReferenceColumns = DEFAULT_REFERENCE_COLUMNS
): LabelIndex {
  const parsed = Papa.parse<Record<string, string | undefined>>(content, {
    header: true,
    skipEmptyLines: 'greedy',
  });

  const fields = parsed.meta.fields ?? [];
  const missing = [columns.reviewIdColumn, columns.aspectsColumn].filter(
    column => !fields.includes(column)
  );
  if (missing.length > 0) {
    throw new Error(
      `Reference file is missing required column(s): ${missing.join(', ')} (found: ${fields.join(', ') || 'none'})`
    );
  }

  const reviews: LabelIndex = new Map();

  for (const row of parsed.data) {
    const reviewId = row[columns.reviewIdColumn] ?? '';
    const packed = row[columns.aspectsColumn] ?? '';

    const aspects = packed
      .split(',')
      .map(aspect => normalizer.normalize(aspect))
      .filter(aspect => aspect.length > 0);

    if (reviews.has(reviewId)) {
      Logger.debug(`[ReferenceLoader] Review ${reviewId} repeated, keeping the later row`);
    }
    reviews.set(reviewId, aspects);
  }

  return reviews;
}

export function loadReference(
  filePath: string,
  normalizer: AspectNormalizer,
  columns: ReferenceColumns = DEFAULT_REFERENCE_COLUMNS
): LabelIndex {
  Logger.debug(`[ReferenceLoader] Reading ${filePath}`);
  const reviews = parseReferenceCsv(readTextFile(filePath), normalizer, columns);
  Logger.info(`[ReferenceLoader] ✓ Loaded ${reviews.size} reviews from ${filePath}`);
  return reviews;
}
