/**
 * @kqlrun/cli Type Definitions
 *
 * Command options and results. Commands return results instead of exiting,
 * so the program decides the exit code in one place.
 */

import type { KqlRunError, Logger } from '@kqlrun/core';
import type { ConfigDialect, RunSettings } from '@kqlrun/config';
import type { OutputStream, QueryBackend, RunSummary } from '@kqlrun/executor';

/**
 * Options shared by every command
 */
export interface BaseOptions {
  /** Folder containing the query files, relative to `cwd` */
  folder: string;
  /** Explicit configuration document */
  configPath?: string;
  /** JSON Schema used to validate the document */
  schemaPath?: string;
  /** Working directory; also the root searched for a global document */
  cwd: string;
  /** Environment variables (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Diagnostics stream (default: process.stderr) */
  stderr?: OutputStream;
  /** Replaces the console logger built from the settings */
  logger?: Logger;
}

/**
 * Options for the run command
 */
export interface RunOptions extends BaseOptions {
  workspaceId: string;
  /** Settings given on the command line; override the environment */
  flags?: Partial<RunSettings>;
  backend: QueryBackend;
  /** Result stream (default: process.stdout) */
  stdout?: OutputStream;
}

/**
 * Result of the run command
 */
export interface RunResult {
  success: boolean;
  exitCode: number;
  summary?: RunSummary;
  error?: KqlRunError;
}

/**
 * Options for the validate command
 */
export type ValidateOptions = BaseOptions;

/**
 * Result of the validate command
 */
export interface ValidateResult {
  success: boolean;
  exitCode: number;
  /** Document that was loaded, or null when defaults apply */
  configFile: string | null;
  dialect?: ConfigDialect;
  /** Query files a run would execute, in order */
  files: string[];
  error?: KqlRunError;
}
