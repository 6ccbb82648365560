/**
 * @kqlrun/cli Run Command
 *
 * Loads the folder's configuration, runs the selected queries and reports
 * the outcome. Configuration problems end the command before any query is
 * sent; query and output failures are counted and decided by the
 * `onQueryError` policy.
 */

import {
  createConsoleLogger,
  wrapError,
  type Logger,
} from '@kqlrun/core';
import { loadConfig, resolveQueryErrorPolicy } from '@kqlrun/config';
import { countOutcomes, executeBatch, exitCodeFor } from '@kqlrun/executor';
import type { RunOptions, RunResult } from '../types.js';
import {
  checkSettings,
  createCommandLogger,
  resolveFolder,
  resolveOptionalPath,
  resolveSettings,
} from './shared.js';

// Re-export types for external use
export type { RunOptions, RunResult };

function fail(error: unknown, logger: Logger): RunResult {
  const failure = wrapError(error, 'run');
  logger.error(failure.message, failure, { errorCode: failure.code });
  return { success: false, exitCode: 1, error: failure };
}

/**
 * Run command: execute every selected query file in a folder
 */
export async function runCommand(options: RunOptions): Promise<RunResult> {
  let logger: Logger = options.logger ?? createConsoleLogger({ stream: options.stderr });

  try {
    const { settings, overrides } = resolveSettings(options, options.flags);
    logger = createCommandLogger(options, settings);
    checkSettings(settings, logger);

    const folder = await resolveFolder(options);
    const config = await loadConfig({
      folder,
      configPath: resolveOptionalPath(options.cwd, options.configPath),
      schemaPath: resolveOptionalPath(options.cwd, options.schemaPath),
      rootDir: options.cwd,
      logger,
    });
    const policy = resolveQueryErrorPolicy(overrides, config);

    const summary = await executeBatch({
      folder,
      config,
      backend: options.backend,
      workspaceId: options.workspaceId,
      outputBase: settings.outputBase,
      concurrency: settings.concurrency,
      timespan: settings.timespan,
      color: settings.color,
      stdout: options.stdout,
      logger,
    });

    const counts = countOutcomes(summary);
    logger.info('Run complete', {
      succeeded: counts.queriesSucceeded,
      failed: counts.queriesFailed,
      written: counts.outputsWritten,
      printed: counts.outputsPrinted,
      outputsFailed: counts.outputsFailed,
      durationMs: summary.durationMs,
    });

    const exitCode = exitCodeFor(summary, policy);
    return { success: exitCode === 0, exitCode, summary };
  } catch (error) {
    return fail(error, logger);
  }
}
