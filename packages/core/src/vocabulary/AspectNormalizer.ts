import { DEFAULT_SYNONYMS, type SynonymTable } from './defaultVocabulary';

/**
 * Maps free-text aspect labels onto the canonical vocabulary.
 *
 * Lookup is case-insensitive on the trimmed label. Labels missing from the
 * table pass through trimmed but otherwise untouched, so new vocabulary keeps
 * flowing; it just won't merge with near-duplicates until the table learns it.
 */
export class AspectNormalizer {
  private readonly synonyms: SynonymTable;

  constructor(synonyms: SynonymTable = DEFAULT_SYNONYMS) {
    this.synonyms = Object.freeze({ ...synonyms });
  }

  normalize(raw: string): string {
    const trimmed = raw.trim();
    const key = trimmed.toLowerCase();
    return Object.prototype.hasOwnProperty.call(this.synonyms, key) ? this.synonyms[key] : trimmed;
  }

  get vocabularySize(): number {
    return Object.keys(this.synonyms).length;
  }

  /**
   * Distinct canonical labels, sorted
   */
  canonicalLabels(): string[] {
    return [...new Set(Object.values(this.synonyms))].sort();
  }
}
