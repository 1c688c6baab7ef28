/**
 * review id -> normalized aspect labels, in file order.
 *
 * A review that never appeared in the source is absent from the map; one that
 * appeared with no labels maps to an empty list.
 */
export type LabelIndex = Map<string, string[]>;

export interface ReferenceColumns {
  reviewIdColumn: string;
  aspectsColumn: string;
}

export const DEFAULT_REFERENCE_COLUMNS: ReferenceColumns = {
  reviewIdColumn: 'Review_ID',
  aspectsColumn: 'Reference_Aspect',
};

export function countLabels(index: LabelIndex): number {
  let total = 0;
  for (const labels of index.values()) {
    total += labels.length;
  }
  return total;
}
