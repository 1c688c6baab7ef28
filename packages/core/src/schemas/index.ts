export { AuditConfigSchema, VocabularyFileSchema, type AuditConfigFile } from './audit-config-schema';
export {
  validateAuditConfig,
  validateVocabularyFile,
  formatValidationErrors,
  type ValidationResult,
  type ValidationError,
} from './schema-validator';
export {
  CURRENT_SCHEMA_VERSION,
  SUPPORTED_SCHEMA_VERSIONS,
  validateSchemaVersion,
  type SupportedSchemaVersion,
} from './version';
