/**
 * @kqlrun/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import { deepFreeze } from '@kqlrun/core';
import { compileTransform } from '@kqlrun/transform';
import type { KqlConfig, OutputFormat, OutputSpec, RunSettings } from './types.js';

/**
 * Document names looked up in the target folder, then in the root directory.
 */
export const CONFIG_FILE_NAMES = ['.kql-config.yaml', '.kql-config.yml'] as const;

/** Extension of query files */
export const QUERY_FILE_EXTENSION = '.kql';

/** Legacy dialect: directory file outputs are written under */
export const DEFAULT_LEGACY_OUTPUT_PATH = 'query-results';

/** Legacy dialect: file name template when none is given */
export const DEFAULT_LEGACY_FILENAME_TEMPLATE = '{query-folder}/{query}.json';

/** Placeholders recognised in destination templates */
export const TEMPLATE_PLACEHOLDERS = ['{query}', '{query-folder}'] as const;

/**
 * Extension appended to a destination that has none.
 */
export const FORMAT_EXTENSIONS: Record<Exclude<OutputFormat, 'none'>, string> = {
  json: '.json',
  jsonc: '.json',
  yaml: '.yaml',
  yamlc: '.yaml',
  table: '.txt',
  tsv: '.tsv',
};

/**
 * Output used when nothing else is configured: the result as JSON on the console.
 */
export const DEFAULT_OUTPUT: OutputSpec = deepFreeze<OutputSpec>({
  format: 'json',
  transform: compileTransform(),
  destination: null,
  compression: 'none',
});

/**
 * Configuration used when no document is found.
 *
 * Every query file in the folder runs with a single console JSON output.
 */
export const DEFAULT_CONFIG: KqlConfig = deepFreeze<KqlConfig>({
  version: '1.0',
  files: { mode: 'all' },
  queries: null,
  defaultOutputs: [DEFAULT_OUTPUT],
  onQueryError: null,
  dialect: 'default',
  source: null,
});

/**
 * Default run settings, before environment and CLI overrides.
 *
 * `outputBase` is empty here and resolved to the working directory by
 * `createSettings`.
 */
export const DEFAULT_SETTINGS: RunSettings = deepFreeze<RunSettings>({
  logLevel: 'error',
  logFormat: 'pretty',
  outputBase: '',
  concurrency: 1,
  timespan: null,
  color: 'auto',
  onQueryError: 'continue',
});
