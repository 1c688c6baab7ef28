/**
 * Tolerant Line Parser
 *
 * Splits one line of the candidate export. Those exports wrap whole rows in an
 * extra pair of quotes and carry free-text evidence with quoted commas, so
 * the line is not valid CSV and a strict parser rejects it.
 *
 * Parsing is positional:
 *   1. trailing whitespace (including the line break) is removed
 *   2. one leading and one trailing `"` are removed, when present
 *   3. the rest is split on every comma, quoted or not, and each column trimmed
 *
 * A comma inside a quoted value therefore splits that value. Only the first
 * two columns are ever read, so this only bites when the review id or the
 * aspect itself holds a comma.
 */

const QUOTE = '"';

export interface CandidateLine {
  reviewId: string;
  aspect: string;
  /** Columns after the aspect (sentiment, evidence, ...), as split */
  rest: string[];
}

export function stripOuterQuotes(line: string): string {
  let result = line;
  if (result.startsWith(QUOTE)) {
    result = result.slice(1);
  }
  if (result.endsWith(QUOTE)) {
    result = result.slice(0, -1);
  }
  return result;
}

export function splitTolerantLine(line: string): string[] {
  return stripOuterQuotes(line.trimEnd())
    .split(',')
    .map(column => column.trim());
}

/**
 * Returns null for lines with fewer than two columns
 */
export function parseCandidateLine(line: string): CandidateLine | null {
  const columns = splitTolerantLine(line);
  if (columns.length < 2) {
    return null;
  }
  const [reviewId, aspect, ...rest] = columns;
  return { reviewId, aspect, rest };
}
