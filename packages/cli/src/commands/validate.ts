/**
 * Validate Command
 *
 * Validates an audit config file (and the vocabulary file it points to).
 *
 * Usage:
 *   aspect-audit validate
 *   aspect-audit validate --config=staging-audit.yaml
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import {
  ConfigLoader,
  CURRENT_SCHEMA_VERSION,
  validateAuditConfig,
} from '@aspect-audit/core';

export interface ValidateCommandOptions {
  config: string;
}

export async function validateCommand(options: ValidateCommandOptions): Promise<void> {
  console.log(chalk.bold('\n✅ Aspect Audit - Validate Configuration\n'));

  if (!fs.existsSync(options.config)) {
    console.log(chalk.red(`  ✗ Config file not found: ${options.config}`));
    process.exit(1);
  }

  const errors: string[] = [];

  try {
    const result = validateAuditConfig(options.config);
    if (result.valid) {
      const settings = ConfigLoader.resolve(result.data, path.dirname(options.config));
      console.log(chalk.green(`  ✓ ${options.config} (schema: ${result.data.schemaVersion})`));
      console.log(`    threshold: ${settings.threshold}%`);
      console.log(`    sources: ${settings.referenceName} vs ${settings.candidateName}`);
      console.log(`    vocabulary: ${Object.keys(settings.synonyms).length} synonyms`);
    } else {
      console.log(chalk.red(`  ✗ ${options.config} - VALIDATION FAILED`));
      result.errors.forEach(err => {
        errors.push(`[${err.path}]: ${err.message}${err.expected ? ` (${err.expected})` : ''}`);
      });
    }
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  console.log('\n' + '='.repeat(60));
  console.log('VALIDATION RESULTS');
  console.log('='.repeat(60) + '\n');

  if (errors.length > 0) {
    console.log(chalk.red(`✗  Errors (${errors.length}):`));
    errors.forEach(e => console.log(`   ${e}`));
    console.log(chalk.red('\n✗ VALIDATION FAILED\n'));
    console.log(`Schema version: ${CURRENT_SCHEMA_VERSION}`);
    process.exit(1);
  }

  console.log(chalk.green('✓ VALIDATION PASSED\n'));
}
