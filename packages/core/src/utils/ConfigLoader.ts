import * as path from 'path';
import { Logger } from './logger';
import {
  formatValidationErrors,
  validateAuditConfig,
  validateVocabularyFile,
  type AuditConfigFile,
} from '../schemas';
import { DEFAULT_SYNONYMS, type SynonymTable } from '../vocabulary/defaultVocabulary';
import { DEFAULT_REFERENCE_COLUMNS, type ReferenceColumns } from '../loaders/types';

/**
 * Fully resolved audit settings: every optional config key filled in
 */
export interface AuditSettings {
  /** Pass mark for micro-F1, in percent */
  threshold: number;
  worstCaseLimit: number;
  worstCaseF1Below: number;
  referenceName: string;
  candidateName: string;
  referenceColumns: ReferenceColumns;
  synonyms: SynonymTable;
}

export const DEFAULT_AUDIT_SETTINGS: AuditSettings = Object.freeze({
  threshold: 80,
  worstCaseLimit: 10,
  worstCaseF1Below: 0.5,
  referenceName: 'Reference',
  candidateName: 'Candidate',
  referenceColumns: DEFAULT_REFERENCE_COLUMNS,
  synonyms: DEFAULT_SYNONYMS,
});

export class ConfigLoader {
  /**
   * Loads and validates an audit.yaml file, resolving a vocabulary path
   * relative to the config file's directory.
   */
  static load(configPath: string): AuditSettings {
    Logger.debug(`[ConfigLoader] Validating config with Zod schema: ${configPath}`);
    const result = validateAuditConfig(configPath);

    if (!result.valid) {
      throw new Error(
        `Config validation failed for ${configPath}:\n${formatValidationErrors(result.errors)}`
      );
    }

    Logger.debug(
      `[ConfigLoader] ✓ Config validated successfully (schema: ${result.data.schemaVersion})`
    );
    return this.resolve(result.data, path.dirname(configPath));
  }

  static resolve(config: AuditConfigFile, baseDir: string): AuditSettings {
    const defaults = DEFAULT_AUDIT_SETTINGS;
    const reference = config.sources?.reference;

    return {
      threshold: config.threshold ?? defaults.threshold,
      worstCaseLimit: config.worstCases?.limit ?? defaults.worstCaseLimit,
      worstCaseF1Below: config.worstCases?.f1Below ?? defaults.worstCaseF1Below,
      referenceName: reference?.name ?? defaults.referenceName,
      candidateName: config.sources?.candidate?.name ?? defaults.candidateName,
      referenceColumns: {
        reviewIdColumn: reference?.reviewIdColumn ?? defaults.referenceColumns.reviewIdColumn,
        aspectsColumn: reference?.aspectsColumn ?? defaults.referenceColumns.aspectsColumn,
      },
      synonyms: this.resolveVocabulary(config.vocabulary, baseDir) ?? defaults.synonyms,
    };
  }

  private static resolveVocabulary(
    vocabulary: AuditConfigFile['vocabulary'],
    baseDir: string
  ): SynonymTable | undefined {
    if (vocabulary === undefined) {
      return undefined;
    }
    if (typeof vocabulary !== 'string') {
      Logger.debug(`[ConfigLoader] Using inline vocabulary (${Object.keys(vocabulary).length} entries)`);
      return vocabulary;
    }

    const vocabularyPath = path.resolve(baseDir, vocabulary);
    Logger.debug(`[ConfigLoader] Loading vocabulary from: ${vocabularyPath}`);
    const result = validateVocabularyFile(vocabularyPath);

    if (!result.valid) {
      throw new Error(
        `Vocabulary validation failed for ${vocabularyPath}:\n${formatValidationErrors(result.errors)}`
      );
    }
    return result.data;
  }
}
