/**
 * Run Command
 *
 * Audits candidate labels against reference labels and writes the row-level report.
 *
 * Usage:
 *   aspect-audit run reference.csv candidate.csv results.csv
 *   aspect-audit run reference.csv candidate.csv results.csv --config=audit.yaml --threshold=75
 */

import * as fs from 'fs';
import chalk from 'chalk';
import ora from 'ora';
import {
  ConfigLoader,
  DEFAULT_AUDIT_SETTINGS,
  Logger,
  runAudit,
  type AuditSettings,
  type AuditSummary,
} from '@aspect-audit/core';

export interface RunCommandOptions {
  config?: string;
  threshold?: string;
  verbose?: boolean;
}

export function parseThreshold(raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value) || value < 0 || value > 100) {
    throw new Error(`--threshold must be a percentage between 0 and 100, got "${raw}"`);
  }
  return value;
}

export function resolveSettings(options: RunCommandOptions): AuditSettings {
  let settings: AuditSettings = DEFAULT_AUDIT_SETTINGS;

  if (options.config) {
    if (!fs.existsSync(options.config)) {
      throw new Error(`Config file not found: ${options.config}`);
    }
    settings = ConfigLoader.load(options.config);
  }

  if (options.threshold !== undefined) {
    settings = { ...settings, threshold: parseThreshold(options.threshold) };
  }

  return settings;
}

export async function runCommand(
  referencePath: string,
  candidatePath: string,
  outputPath: string,
  options: RunCommandOptions
): Promise<AuditSummary> {
  console.log(chalk.bold('\n🔍 Aspect Audit - Label Agreement\n'));

  if (options.verbose) {
    Logger.setVerbosity(3);
  }

  const spinner = ora('Loading configuration...').start();

  try {
    const settings = resolveSettings(options);
    spinner.succeed(
      `Configuration ready (threshold ${settings.threshold}%, ${Object.keys(settings.synonyms).length} synonyms)`
    );

    const summary = runAudit({ referencePath, candidatePath, outputPath, settings });

    const verdict = summary.decision === 'pass' ? chalk.green('PASS') : chalk.red('FAIL');
    console.log(
      `${chalk.bold('Micro F1:')} ${summary.microF1.toFixed(2)}%  ${chalk.bold('Macro F1:')} ${summary.macroF1.toFixed(2)}%  ${verdict}`
    );
    console.log(`Output: ${chalk.cyan(summary.outputPath)}\n`);

    return summary;
  } catch (error) {
    spinner.fail('Audit failed');
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
