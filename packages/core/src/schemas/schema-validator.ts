/**
 * Schema Validator Utility
 *
 * Validation functions for audit config and vocabulary files using Zod schemas
 */

import { z, ZodError } from 'zod';
import * as yaml from 'js-yaml';
import { readTextFile } from '../utils/textFile';
import { AuditConfigSchema, VocabularyFileSchema, type AuditConfigFile } from './audit-config-schema';
import { validateSchemaVersion } from './version';
import type { SynonymTable } from '../vocabulary/defaultVocabulary';

export interface ValidationError {
  path: string;
  message: string;
  expected?: string;
}

export type ValidationResult<T> =
  | { valid: true; filePath: string; data: T }
  | { valid: false; filePath: string; errors: ValidationError[] };

function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map(err => ({
    path: err.path.join('.') || 'root',
    message: err.message,
    expected:
      err.code === z.ZodIssueCode.invalid_type
        ? `expected ${err.expected}, got ${err.received}`
        : undefined,
  }));
}

function loadYamlFile(filePath: string): unknown {
  const fileContent = readTextFile(filePath);
  try {
    return yaml.load(fileContent);
  } catch (error) {
    throw new Error(
      `Failed to parse YAML file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function readSchemaVersion(data: unknown): unknown {
  if (typeof data === 'object' && data !== null && 'schemaVersion' in data) {
    return data.schemaVersion;
  }
  return undefined;
}

function validateWithSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  filePath: string,
  requireSchemaVersion: boolean
): ValidationResult<T> {
  if (requireSchemaVersion) {
    const versionCheck = validateSchemaVersion(readSchemaVersion(data));
    if (!versionCheck.valid) {
      return {
        valid: false,
        filePath,
        errors: [
          {
            path: 'schemaVersion',
            message: versionCheck.error ?? 'Invalid schema version',
            expected: versionCheck.suggestion,
          },
        ],
      };
    }
  }

  const parsed = schema.safeParse(data);
  if (parsed.success) {
    return { valid: true, filePath, data: parsed.data };
  }
  return { valid: false, filePath, errors: formatZodErrors(parsed.error) };
}

// ============================================================================
// Public Validation Functions
// ============================================================================

export function validateAuditConfig(filePath: string): ValidationResult<AuditConfigFile> {
  return validateWithSchema(AuditConfigSchema, loadYamlFile(filePath), filePath, true);
}

export function validateVocabularyFile(filePath: string): ValidationResult<SynonymTable> {
  return validateWithSchema(VocabularyFileSchema, loadYamlFile(filePath), filePath, false);
}

export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map(err => `  [${err.path}]: ${err.message}${err.expected ? ` (${err.expected})` : ''}`)
    .join('\n');
}
