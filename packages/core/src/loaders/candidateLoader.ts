import { Logger } from '../utils/logger';
import { readTextFile } from '../utils/textFile';
import type { AspectNormalizer } from '../vocabulary/AspectNormalizer';
import { parseCandidateLine } from './tolerantLineParser';
import type { LabelIndex } from './types';

/**
 * Parses candidate export content: a header line, then one aspect per line
 * (`review_id,aspect[,sentiment,evidence...]`). Rows for the same review
 * accumulate in file order. Lines with fewer than two columns are skipped.
 */
export function parseCandidateExport(content: string, normalizer: AspectNormalizer): LabelIndex {
  const reviews: LabelIndex = new Map();
  const lines = content.split('\n');

  // Skip the header (first line)
  for (let i = 1; i < lines.length; i++) {
    const parsed = parseCandidateLine(lines[i]);
    if (!parsed) {
      if (lines[i].trim().length > 0) {
        Logger.debug(`[CandidateLoader] Skipping malformed line ${i + 1}: ${lines[i].trim()}`);
      }
      continue;
    }

    const aspect = normalizer.normalize(parsed.aspect);
    if (!aspect) {
      continue;
    }

    const existing = reviews.get(parsed.reviewId);
    if (existing) {
      existing.push(aspect);
    } else {
      reviews.set(parsed.reviewId, [aspect]);
    }
  }

  return reviews;
}

export function loadCandidate(filePath: string, normalizer: AspectNormalizer): LabelIndex {
  Logger.debug(`[CandidateLoader] Reading ${filePath}`);
  const reviews = parseCandidateExport(readTextFile(filePath), normalizer);
  Logger.info(`[CandidateLoader] ✓ Loaded ${reviews.size} reviews from ${filePath}`);
  return reviews;
}
