/**
 * @aspect-audit/cli
 *
 * Command implementations behind the aspect-audit binary.
 */

export { runCommand, resolveSettings, parseThreshold, type RunCommandOptions } from './commands/run';
export { validateCommand, type ValidateCommandOptions } from './commands/validate';
export { versionCommand } from './commands/version';
