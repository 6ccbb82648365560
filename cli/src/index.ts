/**
 * @kqlrun/cli
 *
 * Command-line interface for running folders of KQL queries.
 *
 * Commands:
 *   kqlrun run -f <folder> -w <workspace-id>   Run the folder's queries
 *   kqlrun validate -f <folder>                Check configuration, list files
 */

// ============================================================================
// CLI Types
// ============================================================================

export type {
  BaseOptions,
  RunOptions,
  RunResult,
  ValidateOptions,
  ValidateResult,
} from './types.js';

// ============================================================================
// CLI Commands
// ============================================================================

export { runCommand } from './commands/run.js';
export { validateCommand } from './commands/validate.js';
export { createProgram, type ProgramIO } from './program.js';
