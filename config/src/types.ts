/**
 * @kqlrun/config - Type Definitions
 *
 * Two layers of configuration:
 * - The folder configuration document (`.kql-config.yaml`): which query
 *   files run and what their outputs look like. Parsed into `KqlConfig`.
 * - Run settings: how this invocation behaves (logging, output base
 *   directory, concurrency, exit policy). Built from defaults, environment
 *   and CLI flags into `RunSettings`.
 *
 * @packageDocumentation
 * @module @kqlrun/config
 */

import type { LogLevel, Logger } from '@kqlrun/core';
import type { CompiledTransform } from '@kqlrun/transform';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Output Configuration
// =============================================================================

/**
 * Output formats. `jsonc` and `yamlc` are the colorized variants.
 */
export type OutputFormat = 'json' | 'jsonc' | 'yaml' | 'yamlc' | 'table' | 'tsv' | 'none';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'json',
  'jsonc',
  'yaml',
  'yamlc',
  'table',
  'tsv',
  'none',
];

export type Compression = 'none' | 'gzip' | 'zip';

export const COMPRESSIONS: readonly Compression[] = ['none', 'gzip', 'zip'];

/**
 * One rendering + destination attached to a query.
 *
 * @example
 * ```typescript
 * const spec: OutputSpec = {
 *   format: 'json',
 *   transform: compileTransform('[].{device: DeviceName}'),
 *   destination: 'query-results/{query-folder}/{query}.json',
 *   compression: 'gzip',
 * };
 * ```
 */
export interface OutputSpec {
  format: OutputFormat;

  /** Compiled transform; identity when the document gives none */
  transform: CompiledTransform;

  /** Path template, or null for the console */
  destination: string | null;

  /** Ignored for console output and for format 'none' */
  compression: Compression;
}

/**
 * Per-query override.
 */
export interface QuerySpec {
  /** Path of the query file relative to the target folder (posix separators) */
  file: string;

  /** Ordered outputs; a single console JSON output when the document gives none */
  outputs: OutputSpec[];
}

// =============================================================================
// Folder Configuration
// =============================================================================

/**
 * Which query files take part in the run.
 */
export type FileSelection =
  | { mode: 'all' }
  | { mode: 'include'; names: string[] }
  | { mode: 'exclude'; names: string[] };

/**
 * What a run does when a query or output fails.
 * - `continue`: log the failure, exit 0
 * - `fail`: log the failure, finish the batch, exit non-zero
 */
export type QueryErrorPolicy = 'continue' | 'fail';

/**
 * Which document layout a configuration was read from.
 */
export type ConfigDialect = 'canonical' | 'legacy' | 'default';

/**
 * Canonical, fully defaulted folder configuration.
 *
 * Loaded once per invocation and read-only afterwards.
 */
export interface KqlConfig {
  /** Informational version string */
  version: string;

  files: FileSelection;

  /**
   * Per-query overrides. When present, only these files run.
   * Null when the document has no `queries` section.
   */
  queries: QuerySpec[] | null;

  /** Outputs for selected files without a QuerySpec */
  defaultOutputs: OutputSpec[];

  /** Exit policy from the document, or null to defer to run settings */
  onQueryError: QueryErrorPolicy | null;

  dialect: ConfigDialect;

  /** Absolute path of the document, or null for the built-in default */
  source: string | null;
}

// =============================================================================
// Raw Document Types
// =============================================================================

/** Canonical dialect: `queries[].output[]` entry */
export interface RawOutputEntry {
  format: string;
  query?: string;
  file?: string;
  compression?: string;
}

/** Canonical dialect: `queries[]` entry */
export interface RawQueryEntry {
  file: string;
  output?: RawOutputEntry[];
}

/** Legacy dialect: `output.formats[]` entry */
export interface RawLegacyFormat {
  type: string;
  query?: string;
  path?: string;
  filename_template?: string;
  compression?: string;
}

/**
 * Configuration document as written, after schema validation.
 */
export interface RawConfigDocument {
  version?: string;
  onQueryError?: string;
  files?: {
    include?: string[];
    exclude?: string[];
  };
  queries?: RawQueryEntry[];
  output?: {
    formats?: RawLegacyFormat[];
  };
}

// =============================================================================
// Loader Options
// =============================================================================

export interface LoadConfigOptions {
  /** Folder containing the query files */
  folder: string;

  /** Explicit document path; skips discovery when set */
  configPath?: string;

  /** JSON Schema document; defaults to the bundled kql-config.schema.json */
  schemaPath?: string;

  /** Directory searched for a global document when the folder has none (default: cwd) */
  rootDir?: string;

  logger?: Logger;
}

// =============================================================================
// Run Settings
// =============================================================================

export type LogFormat = 'json' | 'pretty';

/**
 * When to emit ANSI colour for jsonc/yamlc on the console.
 */
export type ColorMode = 'auto' | 'always' | 'never';

/**
 * Settings for one invocation.
 *
 * @example
 * ```typescript
 * const settings: RunSettings = {
 *   logLevel: 'info',
 *   logFormat: 'pretty',
 *   outputBase: '/work/repo',
 *   concurrency: 1,
 *   timespan: 'P1D',
 *   color: 'auto',
 *   onQueryError: 'continue',
 * };
 * ```
 */
export interface RunSettings {
  logLevel: LogLevel;

  logFormat: LogFormat;

  /** Base directory relative destinations are resolved against */
  outputBase: string;

  /** Query files executed at once */
  concurrency: number;

  /** ISO 8601 duration passed to the backend, or null for the query's own bounds */
  timespan: string | null;

  color: ColorMode;

  onQueryError: QueryErrorPolicy;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ValidationError {
  /** Path to the invalid field (e.g. 'concurrency') */
  path: string;
  message: string;
  value: unknown;
  suggestion?: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
  value: unknown;
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Options for reading settings from the environment.
 */
export interface EnvSettingsOptions {
  /** Variable prefix (default: 'KQLRUN') */
  prefix?: string;

  /** Environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
