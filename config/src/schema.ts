/**
 * @kqlrun/config - JSON Schema validation
 *
 * The document layout is described by a JSON Schema (draft 07) shipped in
 * `schema/kql-config.schema.json`. Callers may point at their own copy.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { ConfigInvalidError, isPlainObject } from '@kqlrun/core';
import type { RawConfigDocument } from './types.js';

/**
 * Location of the bundled schema document.
 */
export const DEFAULT_SCHEMA_PATH = fileURLToPath(
  new URL('../schema/kql-config.schema.json', import.meta.url)
);

/**
 * A compiled schema validator.
 */
export interface ConfigSchema {
  /** Where the schema was read from */
  readonly path: string;

  /**
   * @throws {ConfigInvalidError} With the path of the first violation
   */
  validate(document: unknown, configFile?: string): RawConfigDocument;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return isPlainObject(value);
}

/**
 * Convert an Ajv instance path (`/queries/0/output/1/format`) to the
 * dotted form used in messages (`queries[0].output[1].format`).
 */
export function toFieldPath(instancePath: string): string {
  let path = '';
  for (const segment of instancePath.split('/').slice(1)) {
    const key = segment.replace(/~1/g, '/').replace(/~0/g, '~');
    if (/^\d+$/.test(key)) {
      path += `[${key}]`;
    } else {
      path += path ? `.${key}` : key;
    }
  }
  return path;
}

function joinPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key;
}

/**
 * Turn one Ajv error into a ConfigInvalidError.
 */
export function schemaErrorToConfigError(error: ErrorObject, configFile?: string): ConfigInvalidError {
  const path = toFieldPath(error.instancePath);
  const params: Record<string, unknown> = error.params;

  switch (error.keyword) {
    case 'required': {
      const missing = typeof params.missingProperty === 'string' ? params.missingProperty : '';
      return new ConfigInvalidError('Required field is missing', joinPath(path, missing), { configFile });
    }
    case 'additionalProperties': {
      const extra = typeof params.additionalProperty === 'string' ? params.additionalProperty : '';
      return new ConfigInvalidError('Unknown field', joinPath(path, extra), { configFile });
    }
    case 'enum': {
      const allowed = Array.isArray(params.allowedValues) ? params.allowedValues.map(String) : [];
      return new ConfigInvalidError(
        `Must be one of: ${allowed.join(', ')}`,
        path,
        { configFile }
      );
    }
    case 'type':
      if (path === 'version') {
        return new ConfigInvalidError('Must be a string; quote the version, e.g. "1.0"', path, { configFile });
      }
      break;
    case 'pattern':
      if (path.endsWith('.file')) {
        return new ConfigInvalidError('Query file must end in ".kql"', path, { configFile });
      }
      break;
    case 'not':
      if (path === 'files') {
        return ConfigInvalidError.mutuallyExclusive(path, ['include', 'exclude'], configFile);
      }
      break;
  }

  return new ConfigInvalidError(
    error.message ?? `Failed "${error.keyword}" check`,
    path,
    { configFile }
  );
}

/**
 * Create a validator from a parsed schema document.
 *
 * @throws {ConfigInvalidError} If the schema itself does not compile
 */
export function createConfigSchema(schema: unknown, path: string): ConfigSchema {
  if (!isSchemaObject(schema)) {
    throw new ConfigInvalidError(`Schema "${path}" is not a JSON object`);
  }

  const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
  let validator: ValidateFunction<RawConfigDocument>;
  try {
    validator = ajv.compile<RawConfigDocument>(schema);
  } catch (cause) {
    throw new ConfigInvalidError(`Schema "${path}" does not compile`, '', { cause });
  }

  return {
    path,
    validate(document: unknown, configFile?: string): RawConfigDocument {
      if (validator(document)) {
        return document;
      }
      const [first] = validator.errors ?? [];
      if (first === undefined) {
        throw new ConfigInvalidError('Document does not match the schema', '', { configFile });
      }
      throw schemaErrorToConfigError(first, configFile);
    },
  };
}

const schemaCache = new Map<string, Promise<ConfigSchema>>();

async function readSchema(path: string): Promise<ConfigSchema> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (cause) {
    throw new ConfigInvalidError(`Cannot read schema "${path}"`, '', { cause });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (cause) {
    throw new ConfigInvalidError(`Schema "${path}" is not valid JSON`, '', { cause });
  }

  return createConfigSchema(parsed, path);
}

/**
 * Load and compile a schema document. Compiled schemas are cached by path.
 *
 * @throws {ConfigInvalidError} If the file is missing, unreadable or not a valid schema
 */
export async function loadConfigSchema(path: string = DEFAULT_SCHEMA_PATH): Promise<ConfigSchema> {
  const cached = schemaCache.get(path);
  if (cached) {
    return cached;
  }

  const pending = readSchema(path);
  schemaCache.set(path, pending);
  try {
    return await pending;
  } catch (error) {
    schemaCache.delete(path);
    throw error;
  }
}
