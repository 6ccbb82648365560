/**
 * @kqlrun/config - Run settings
 *
 * Settings are layered: DEFAULT_SETTINGS, then environment variables, then
 * command-line flags. Later layers win; undefined values never override.
 *
 * @packageDocumentation
 */

import { resolve } from 'node:path';
import { deepFreeze, ErrorCode, KqlRunError, parseLogLevel } from '@kqlrun/core';
import { DEFAULT_SETTINGS } from './defaults.js';
import type {
  ColorMode,
  EnvSettingsOptions,
  KqlConfig,
  LogFormat,
  QueryErrorPolicy,
  RunSettings,
} from './types.js';

const SETTINGS_KEYS = [
  'logLevel',
  'logFormat',
  'outputBase',
  'concurrency',
  'timespan',
  'color',
  'onQueryError',
] as const satisfies ReadonlyArray<keyof RunSettings>;

function copyDefined<K extends keyof RunSettings>(
  target: Partial<RunSettings>,
  source: Partial<RunSettings>,
  key: K
): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Merge partial settings. Later arguments take precedence.
 *
 * @example
 * ```typescript
 * const merged = mergeSettings({ concurrency: 2 }, getSettingsFromEnv(), flags);
 * ```
 */
export function mergeSettings(
  ...layers: Array<Partial<RunSettings> | null | undefined>
): Partial<RunSettings> {
  const result: Partial<RunSettings> = {};
  for (const layer of layers) {
    if (!layer) continue;
    for (const key of SETTINGS_KEYS) {
      copyDefined(result, layer, key);
    }
  }
  return result;
}

/**
 * Create complete, frozen settings.
 *
 * `outputBase` is resolved to an absolute path; empty means the working directory.
 */
export function createSettings(
  overrides?: Partial<RunSettings>,
  base: RunSettings = DEFAULT_SETTINGS
): RunSettings {
  const merged = { ...base, ...mergeSettings(overrides) };
  return deepFreeze({
    ...merged,
    outputBase: resolve(merged.outputBase === '' ? process.cwd() : merged.outputBase),
  });
}

// =============================================================================
// Value parsers (shared with the CLI)
// =============================================================================

function invalid(name: string, value: string, expected: string): KqlRunError {
  return new KqlRunError(
    `Invalid value "${value}" for ${name}; expected ${expected}`,
    ErrorCode.SETTINGS_INVALID,
    { setting: name, value }
  );
}

export function parseLogFormat(value: string, name = 'log format'): LogFormat {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'json' || normalized === 'pretty') {
    return normalized;
  }
  throw invalid(name, value, 'json or pretty');
}

export function parseColorMode(value: string, name = 'color'): ColorMode {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'auto' || normalized === 'always' || normalized === 'never') {
    return normalized;
  }
  throw invalid(name, value, 'auto, always or never');
}

export function parseQueryErrorPolicy(value: string, name = 'onQueryError'): QueryErrorPolicy {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'continue' || normalized === 'fail') {
    return normalized;
  }
  throw invalid(name, value, 'continue or fail');
}

export function parseConcurrency(value: string, name = 'concurrency'): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 1) {
    throw invalid(name, value, 'a positive integer');
  }
  return parsed;
}

// =============================================================================
// Environment
// =============================================================================

function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): { name: string; value: string | undefined } {
  const name = [prefix, ...parts].join('_').toUpperCase();
  const value = env[name];
  return { name, value: value === '' ? undefined : value };
}

/**
 * Read settings overrides from environment variables.
 *
 * Variables follow the pattern `KQLRUN_<FIELD>`:
 * - KQLRUN_LOG_LEVEL=warning
 * - KQLRUN_LOG_FORMAT=json
 * - KQLRUN_OUTPUT_BASE=/var/reports
 * - KQLRUN_CONCURRENCY=4
 * - KQLRUN_TIMESPAN=P7D
 * - KQLRUN_COLOR=never
 * - KQLRUN_ON_QUERY_ERROR=fail
 *
 * @throws {KqlRunError} SETTINGS_INVALID when a variable has an unusable value
 */
export function getSettingsFromEnv(options: EnvSettingsOptions = {}): Partial<RunSettings> {
  const prefix = options.prefix ?? 'KQLRUN';
  const env = options.env ?? process.env;
  const overrides: Partial<RunSettings> = {};

  const logLevel = getEnvVar(env, prefix, 'LOG', 'LEVEL');
  if (logLevel.value !== undefined) {
    const level = parseLogLevel(logLevel.value);
    if (level === undefined) {
      throw invalid(logLevel.name, logLevel.value, 'DEBUG, INFO, WARNING, ERROR or CRITICAL');
    }
    overrides.logLevel = level;
  }

  const logFormat = getEnvVar(env, prefix, 'LOG', 'FORMAT');
  if (logFormat.value !== undefined) {
    overrides.logFormat = parseLogFormat(logFormat.value, logFormat.name);
  }

  const outputBase = getEnvVar(env, prefix, 'OUTPUT', 'BASE');
  if (outputBase.value !== undefined) {
    overrides.outputBase = outputBase.value;
  }

  const concurrency = getEnvVar(env, prefix, 'CONCURRENCY');
  if (concurrency.value !== undefined) {
    overrides.concurrency = parseConcurrency(concurrency.value, concurrency.name);
  }

  const timespan = getEnvVar(env, prefix, 'TIMESPAN');
  if (timespan.value !== undefined) {
    overrides.timespan = timespan.value;
  }

  const color = getEnvVar(env, prefix, 'COLOR');
  if (color.value !== undefined) {
    overrides.color = parseColorMode(color.value, color.name);
  }

  const policy = getEnvVar(env, prefix, 'ON', 'QUERY', 'ERROR');
  if (policy.value !== undefined) {
    overrides.onQueryError = parseQueryErrorPolicy(policy.value, policy.name);
  }

  return overrides;
}

/**
 * Pick the exit policy: flags and environment, then the document, then the default.
 */
export function resolveQueryErrorPolicy(
  overrides: Partial<RunSettings>,
  config: Pick<KqlConfig, 'onQueryError'>
): QueryErrorPolicy {
  return overrides.onQueryError ?? config.onQueryError ?? DEFAULT_SETTINGS.onQueryError;
}
