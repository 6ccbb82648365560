/**
 * @kqlrun/config - Configuration loading
 *
 * Resolution order for the document:
 * 1. An explicit path (`--config`)
 * 2. `.kql-config.yaml` / `.kql-config.yml` in the query folder
 * 3. The same names in the root directory (global configuration)
 * 4. The built-in default: every query file, JSON on the console
 *
 * @packageDocumentation
 */

import { readFile, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse, YAMLParseError } from 'yaml';
import { ConfigInvalidError, createNoopLogger, deepFreeze, isPlainObject } from '@kqlrun/core';
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG } from './defaults.js';
import { adaptDocument } from './dialects.js';
import { loadConfigSchema } from './schema.js';
import { validateQueryFiles } from './validation.js';
import type { KqlConfig, LoadConfigOptions } from './types.js';

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function findIn(directory: string): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(directory, name);
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Locate the configuration document for a folder.
 *
 * @returns Absolute path of the document, or null when there is none
 */
export async function findConfigFile(
  folder: string,
  options: { rootDir?: string } = {}
): Promise<string | null> {
  const local = await findIn(resolve(folder));
  if (local !== null) {
    return local;
  }
  return findIn(resolve(options.rootDir ?? process.cwd()));
}

/**
 * Parse YAML text into a plain document.
 *
 * An empty document is treated as `{}`.
 *
 * @throws {ConfigInvalidError} On YAML syntax errors or a non-mapping top level
 */
export function parseConfigText(text: string, configFile?: string): unknown {
  let doc: unknown;
  try {
    doc = parse(text);
  } catch (cause) {
    const where = cause instanceof YAMLParseError && cause.linePos
      ? ` (line ${cause.linePos[0].line}, column ${cause.linePos[0].col})`
      : '';
    throw new ConfigInvalidError(`YAML syntax error${where}`, '', { configFile, cause });
  }

  if (doc === null || doc === undefined) {
    return {};
  }
  if (!isPlainObject(doc)) {
    throw new ConfigInvalidError('Top level must be a mapping', '', { configFile });
  }
  return doc;
}

/**
 * Load, validate and convert the configuration for a query folder.
 *
 * The result is frozen.
 *
 * @throws {ConfigInvalidError} If the document cannot be read, parsed or validated
 *
 * @example
 * ```typescript
 * const config = await loadConfig({ folder: 'queries/network' });
 * for (const file of await selectFiles('queries/network', config)) { ... }
 * ```
 */
export async function loadConfig(options: LoadConfigOptions): Promise<KqlConfig> {
  const logger = options.logger ?? createNoopLogger();

  let configFile: string | null;
  if (options.configPath !== undefined) {
    configFile = resolve(options.configPath);
    if (!(await isFile(configFile))) {
      throw new ConfigInvalidError(`Config file "${configFile}" does not exist`, '', { configFile });
    }
  } else {
    configFile = await findConfigFile(options.folder, { rootDir: options.rootDir });
  }

  if (configFile === null) {
    logger.info('No configuration file found, running every query with JSON console output', {
      folder: options.folder,
    });
    return DEFAULT_CONFIG;
  }

  logger.debug('Loading configuration', { configFile });

  let text: string;
  try {
    text = await readFile(configFile, 'utf8');
  } catch (cause) {
    throw new ConfigInvalidError(`Cannot read "${configFile}"`, '', { configFile, cause });
  }

  const schema = await loadConfigSchema(options.schemaPath);
  const doc = schema.validate(parseConfigText(text, configFile), configFile);
  const config = adaptDocument(doc, configFile);
  await validateQueryFiles(config, options.folder);

  logger.debug('Configuration loaded', {
    configFile,
    dialect: config.dialect,
    queries: config.queries?.length ?? null,
  });

  return deepFreeze(config);
}
