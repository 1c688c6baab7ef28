#!/usr/bin/env tsx

/**
 * Aspect Audit CLI
 *
 * Usage:
 *   aspect-audit run <reference> <candidate> <output>   Audit candidate labels against the reference
 *   aspect-audit validate                               Validate an audit config file
 *   aspect-audit schema-version                         Show config schema versions
 */

import { Command } from 'commander';
import { runCommand, type RunCommandOptions } from '../commands/run';
import { validateCommand, type ValidateCommandOptions } from '../commands/validate';
import { versionCommand } from '../commands/version';

const program = new Command();

program.name('aspect-audit').description('Aspect label agreement audit').version('1.0.0');

// aspect-audit run <reference> <candidate> <output>
program
  .command('run <reference> <candidate> <output>')
  .description('Compare candidate aspect labels with reference labels and write a CSV report')
  .option('-c, --config <file>', 'Audit config file (YAML)')
  .option('-t, --threshold <percent>', 'Override the micro-F1 pass threshold')
  .option('-v, --verbose', 'Verbose output')
  .action(async (reference: string, candidate: string, output: string, options: RunCommandOptions) => {
    await runCommand(reference, candidate, output, options);
  });

// aspect-audit validate
program
  .command('validate')
  .description('Validate an audit config file')
  .option('-c, --config <file>', 'Config file to validate', 'audit.yaml')
  .action(async (options: ValidateCommandOptions) => {
    await validateCommand(options);
  });

// aspect-audit schema-version
program
  .command('schema-version')
  .description('Show current schema version')
  .action(async () => {
    await versionCommand();
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
