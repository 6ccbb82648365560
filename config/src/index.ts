/**
 * @kqlrun/config - Configuration for kqlrun
 *
 * - Folder configuration documents (`.kql-config.yaml`): discovery, YAML
 *   parsing, JSON Schema validation, dialect conversion
 * - Run settings layered from defaults, environment and CLI flags
 *
 * @example
 * ```typescript
 * import { loadConfig, createSettings, getSettingsFromEnv } from '@kqlrun/config';
 *
 * const settings = createSettings(getSettingsFromEnv());
 * const config = await loadConfig({ folder: 'queries/network' });
 * ```
 *
 * @packageDocumentation
 * @module @kqlrun/config
 */

// Types
export type {
  DeepPartial,
  OutputFormat,
  Compression,
  OutputSpec,
  QuerySpec,
  FileSelection,
  QueryErrorPolicy,
  ConfigDialect,
  KqlConfig,
  RawOutputEntry,
  RawQueryEntry,
  RawLegacyFormat,
  RawConfigDocument,
  LoadConfigOptions,
  LogFormat,
  ColorMode,
  RunSettings,
  ValidationError,
  ValidationWarning,
  ValidationResult,
  EnvSettingsOptions,
} from './types.js';

export { OUTPUT_FORMATS, COMPRESSIONS } from './types.js';

// Defaults
export {
  CONFIG_FILE_NAMES,
  QUERY_FILE_EXTENSION,
  DEFAULT_LEGACY_OUTPUT_PATH,
  DEFAULT_LEGACY_FILENAME_TEMPLATE,
  TEMPLATE_PLACEHOLDERS,
  FORMAT_EXTENSIONS,
  DEFAULT_OUTPUT,
  DEFAULT_CONFIG,
  DEFAULT_SETTINGS,
} from './defaults.js';

// Loading
export { findConfigFile, loadConfig, parseConfigText } from './loader.js';
export {
  DEFAULT_SCHEMA_PATH,
  loadConfigSchema,
  createConfigSchema,
  schemaErrorToConfigError,
  toFieldPath,
  type ConfigSchema,
} from './schema.js';
export { detectDialect, adaptDocument, normalizeQueryPath, type DialectContext } from './dialects.js';

// Validation
export { validateQueryFiles, validateSettings } from './validation.js';

// Settings
export {
  createSettings,
  mergeSettings,
  getSettingsFromEnv,
  resolveQueryErrorPolicy,
  parseLogFormat,
  parseColorMode,
  parseQueryErrorPolicy,
  parseConcurrency,
} from './settings.js';
