/**
 * @kqlrun/config - Validation
 *
 * Two kinds of checks live here:
 * - `validateQueryFiles`: checks on a loaded document that need the
 *   filesystem (query files exist). Violations are fatal and throw.
 * - `validateSettings`: checks on run settings, reported as a
 *   ValidationResult so the CLI can print every problem at once.
 *
 * @packageDocumentation
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigInvalidError } from '@kqlrun/core';
import { QUERY_FILE_EXTENSION } from './defaults.js';
import type {
  KqlConfig,
  RunSettings,
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from './types.js';

const WHITESPACE = /\s/;

/** ISO 8601 duration, e.g. P1D, PT12H, P1DT30M */
const ISO_DURATION = /^P(?!$)(\d+Y)?(\d+M)?(\d+W)?(\d+D)?(T(?=\d)(\d+H)?(\d+M)?(\d+(\.\d+)?S)?)?$/;

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Check the query files a configuration names against the target folder.
 *
 * @throws {ConfigInvalidError} On the first file that has whitespace in its
 * path, lacks the `.kql` extension or does not exist
 */
export async function validateQueryFiles(config: KqlConfig, folder: string): Promise<void> {
  const configFile = config.source ?? undefined;

  for (const [i, spec] of (config.queries ?? []).entries()) {
    const path = `queries[${i}].file`;

    if (WHITESPACE.test(spec.file)) {
      throw new ConfigInvalidError(`Query file "${spec.file}" contains whitespace`, path, {
        configFile,
        suggestion: 'Rename the file using dashes or underscores',
      });
    }

    if (!spec.file.endsWith(QUERY_FILE_EXTENSION)) {
      throw new ConfigInvalidError(`Query file must end in "${QUERY_FILE_EXTENSION}"`, path, { configFile });
    }

    if (!(await isFile(join(folder, spec.file)))) {
      throw new ConfigInvalidError(`Query file "${spec.file}" does not exist in "${folder}"`, path, {
        configFile,
      });
    }
  }
}

/**
 * Validate run settings.
 *
 * @example
 * ```typescript
 * const result = validateSettings(settings);
 * if (!result.valid) {
 *   for (const error of result.errors) logger.error(`${error.path}: ${error.message}`);
 * }
 * ```
 */
export function validateSettings(settings: RunSettings): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  if (!Number.isInteger(settings.concurrency) || settings.concurrency < 1) {
    errors.push({
      path: 'concurrency',
      message: 'Concurrency must be a positive integer',
      value: settings.concurrency,
      suggestion: 'Use 1 to run queries one at a time',
    });
  }

  // The backend is a remote service with its own rate limits
  if (settings.concurrency > 16) {
    warnings.push({
      path: 'concurrency',
      message: 'High concurrency may be throttled by the query service',
      value: settings.concurrency,
      recommendation: 'Consider values between 1 and 8',
    });
  }

  if (settings.timespan !== null && !ISO_DURATION.test(settings.timespan)) {
    errors.push({
      path: 'timespan',
      message: 'Timespan must be an ISO 8601 duration',
      value: settings.timespan,
      suggestion: 'For example P1D for one day or PT6H for six hours',
    });
  }

  if (WHITESPACE.test(settings.outputBase)) {
    errors.push({
      path: 'outputBase',
      message: 'Output base directory must not contain whitespace',
      value: settings.outputBase,
    });
  }

  if (settings.logLevel === 'debug' && settings.concurrency > 1) {
    warnings.push({
      path: 'logLevel',
      message: 'Debug logs from concurrent queries are interleaved',
      value: settings.logLevel,
      recommendation: 'Use concurrency 1 while debugging',
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
