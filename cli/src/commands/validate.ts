/**
 * @kqlrun/cli Validate Command
 *
 * Loads and checks the configuration the way `run` would and lists the
 * files a run would execute. Never calls the backend.
 */

import {
  createConsoleLogger,
  NoFilesSelectedError,
  wrapError,
  type Logger,
} from '@kqlrun/core';
import { loadConfig } from '@kqlrun/config';
import { selectFiles } from '@kqlrun/executor';
import type { ValidateOptions, ValidateResult } from '../types.js';
import {
  checkSettings,
  createCommandLogger,
  resolveFolder,
  resolveOptionalPath,
  resolveSettings,
} from './shared.js';

// Re-export types for external use
export type { ValidateOptions, ValidateResult };

/**
 * Validate command: check configuration without running queries
 */
export async function validateCommand(options: ValidateOptions): Promise<ValidateResult> {
  let logger: Logger = options.logger ?? createConsoleLogger({ stream: options.stderr });

  try {
    const { settings } = resolveSettings(options);
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

    let files: string[];
    try {
      files = await selectFiles(folder, config);
    } catch (error) {
      if (!(error instanceof NoFilesSelectedError)) {
        throw error;
      }
      logger.warn(error.message, { errorCode: error.code });
      files = [];
    }

    return {
      success: true,
      exitCode: 0,
      configFile: config.source,
      dialect: config.dialect,
      files,
    };
  } catch (error) {
    const failure = wrapError(error, 'validate');
    logger.error(failure.message, failure, { errorCode: failure.code });
    return { success: false, exitCode: 1, configFile: null, files: [], error: failure };
  }
}
