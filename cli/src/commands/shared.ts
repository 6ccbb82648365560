/**
 * @kqlrun/cli - Steps shared by the commands
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  createConsoleLogger,
  ErrorCode,
  KqlRunError,
  type Logger,
} from '@kqlrun/core';
import {
  createSettings,
  getSettingsFromEnv,
  mergeSettings,
  validateSettings,
  type RunSettings,
} from '@kqlrun/config';
import type { BaseOptions } from '../types.js';

export interface ResolvedSettings {
  settings: RunSettings;
  /** Environment and flag layers only, without defaults */
  overrides: Partial<RunSettings>;
}

/**
 * DEFAULT_SETTINGS, then the environment, then flags.
 *
 * @throws {KqlRunError} SETTINGS_INVALID for unusable values
 */
export function resolveSettings(options: BaseOptions, flags: Partial<RunSettings> = {}): ResolvedSettings {
  const overrides = mergeSettings(getSettingsFromEnv({ env: options.env }), flags);
  const outputBase = overrides.outputBase ?? '';
  const settings = createSettings({
    ...overrides,
    outputBase: resolve(options.cwd, outputBase === '' ? '.' : outputBase),
  });
  return { settings, overrides };
}

/**
 * Check settings, logging warnings.
 *
 * @throws {KqlRunError} SETTINGS_INVALID with the first error
 */
export function checkSettings(settings: RunSettings, logger: Logger): void {
  const result = validateSettings(settings);
  for (const warning of result.warnings) {
    logger.warn(`${warning.path}: ${warning.message}`);
  }
  const [first] = result.errors;
  if (first !== undefined) {
    throw new KqlRunError(
      `${first.path}: ${first.message}`,
      ErrorCode.SETTINGS_INVALID,
      { setting: first.path },
      first.suggestion
    );
  }
}

export function createCommandLogger(options: BaseOptions, settings: RunSettings): Logger {
  return options.logger ?? createConsoleLogger({
    format: settings.logFormat,
    minLevel: settings.logLevel,
    stream: options.stderr,
  });
}

/**
 * Absolute path of the query folder.
 *
 * @throws {KqlRunError} FOLDER_NOT_FOUND if it is missing or not a directory
 */
export async function resolveFolder(options: BaseOptions): Promise<string> {
  const folder = resolve(options.cwd, options.folder);
  const isDirectory = await stat(folder).then(
    stats => stats.isDirectory(),
    () => false
  );
  if (!isDirectory) {
    throw new KqlRunError(
      `Folder "${folder}" does not exist`,
      ErrorCode.FOLDER_NOT_FOUND,
      { folder },
      'Pass the folder holding the .kql files with -f'
    );
  }
  return folder;
}

export function resolveOptionalPath(cwd: string, path: string | undefined): string | undefined {
  return path === undefined ? undefined : resolve(cwd, path);
}
