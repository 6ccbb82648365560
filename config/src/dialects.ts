/**
 * @kqlrun/config - Document dialects
 *
 * Two document layouts are accepted and both become a `KqlConfig`:
 *
 * Canonical, one entry per query with its own outputs:
 * ```yaml
 * files:
 *   exclude: [scratch.kql]
 * queries:
 *   - file: net/conn.kql
 *     output:
 *       - format: table
 *       - format: json
 *         query: "[].{device: DeviceName}"
 *         file: out/{query-folder}/{query}.json
 *         compression: gzip
 * ```
 *
 * Legacy, a single list of outputs shared by every selected file:
 * ```yaml
 * files:
 *   include: [net/conn.kql]
 * output:
 *   formats:
 *     - type: console
 *     - type: file
 *       path: query-results
 *       filename_template: "{query-folder}/{query}.json"
 * ```
 *
 * @packageDocumentation
 */

import { posix } from 'node:path';
import { ConfigInvalidError, TransformError } from '@kqlrun/core';
import { compileTransform, type CompiledTransform } from '@kqlrun/transform';
import {
  DEFAULT_LEGACY_FILENAME_TEMPLATE,
  DEFAULT_LEGACY_OUTPUT_PATH,
  DEFAULT_OUTPUT,
  TEMPLATE_PLACEHOLDERS,
} from './defaults.js';
import {
  COMPRESSIONS,
  OUTPUT_FORMATS,
  type Compression,
  type ConfigDialect,
  type FileSelection,
  type KqlConfig,
  type OutputFormat,
  type OutputSpec,
  type QueryErrorPolicy,
  type QuerySpec,
  type RawConfigDocument,
  type RawLegacyFormat,
  type RawOutputEntry,
} from './types.js';

/**
 * Where a document came from, threaded through for error messages.
 */
export interface DialectContext {
  source: string | null;
}

function fail(message: string, path: string, ctx: DialectContext, cause?: unknown): never {
  throw new ConfigInvalidError(message, path, {
    configFile: ctx.source ?? undefined,
    cause,
  });
}

/**
 * Tell which layout a document uses.
 *
 * @throws {ConfigInvalidError} If it mixes `queries` with `output`
 */
export function detectDialect(
  doc: RawConfigDocument,
  source: string | null = null
): Exclude<ConfigDialect, 'default'> {
  if (doc.queries !== undefined && doc.output !== undefined) {
    fail('"queries" and "output" cannot be combined; move each output under its query', 'output', {
      source,
    });
  }
  return doc.output !== undefined ? 'legacy' : 'canonical';
}

/**
 * Convert a schema-valid document into a `KqlConfig`.
 *
 * Compiles every transform expression, so expression syntax errors surface here.
 *
 * @throws {ConfigInvalidError} With the path of the offending field
 */
export function adaptDocument(doc: RawConfigDocument, source: string | null = null): KqlConfig {
  const ctx: DialectContext = { source };
  const dialect = detectDialect(doc, source);

  const base = {
    version: doc.version ?? '1.0',
    files: adaptFileSelection(doc.files, ctx),
    onQueryError: adaptPolicy(doc.onQueryError, ctx),
    source,
  };

  switch (dialect) {
    case 'legacy':
      return {
        ...base,
        queries: null,
        defaultOutputs: adaptLegacyFormats(doc.output?.formats ?? [], ctx),
        dialect,
      };
    case 'canonical':
      return {
        ...base,
        // An empty list selects like an absent one: every query file
        queries: doc.queries === undefined || doc.queries.length === 0 ? null : adaptQueries(doc, ctx),
        defaultOutputs: [DEFAULT_OUTPUT],
        dialect,
      };
  }
}

// =============================================================================
// Shared sections
// =============================================================================

function adaptFileSelection(
  files: RawConfigDocument['files'],
  ctx: DialectContext
): FileSelection {
  if (files === undefined) {
    return { mode: 'all' };
  }
  if (files.include !== undefined && files.exclude !== undefined) {
    throw ConfigInvalidError.mutuallyExclusive('files', ['include', 'exclude'], ctx.source ?? undefined);
  }
  if (files.include !== undefined) {
    return {
      mode: 'include',
      names: files.include.map((name, i) => normalizeQueryPath(name, `files.include[${i}]`, ctx)),
    };
  }
  if (files.exclude !== undefined) {
    return {
      mode: 'exclude',
      names: files.exclude.map((name, i) => normalizeQueryPath(name, `files.exclude[${i}]`, ctx)),
    };
  }
  return { mode: 'all' };
}

function adaptPolicy(value: string | undefined, ctx: DialectContext): QueryErrorPolicy | null {
  switch (value) {
    case undefined:
      return null;
    case 'continue':
    case 'fail':
      return value;
    default:
      return fail('Must be one of: continue, fail', 'onQueryError', ctx);
  }
}

/**
 * Normalize a query path to the relative posix form the selector produces.
 */
export function normalizeQueryPath(file: string, path: string, ctx: DialectContext = { source: null }): string {
  const normalized = posix.normalize(file.replace(/\\/g, '/')).replace(/^(\.\/)+/, '');
  if (posix.isAbsolute(normalized) || normalized === '..' || normalized.startsWith('../')) {
    fail(`Query file "${file}" must be inside the query folder`, path, ctx);
  }
  return normalized;
}

function compileAt(expression: string | undefined, path: string, ctx: DialectContext): CompiledTransform {
  try {
    return compileTransform(expression);
  } catch (error) {
    if (error instanceof TransformError) {
      return fail(error.message, path, ctx, error);
    }
    throw error;
  }
}

function toFormat(value: string, path: string, ctx: DialectContext): OutputFormat {
  const format = OUTPUT_FORMATS.find(candidate => candidate === value);
  if (format === undefined) {
    return fail(`Must be one of: ${OUTPUT_FORMATS.join(', ')}`, path, ctx);
  }
  return format;
}

function toCompression(value: string | undefined, path: string, ctx: DialectContext): Compression {
  if (value === undefined) {
    return 'none';
  }
  const compression = COMPRESSIONS.find(candidate => candidate === value);
  if (compression === undefined) {
    return fail(`Must be one of: ${COMPRESSIONS.join(', ')}`, path, ctx);
  }
  return compression;
}

// =============================================================================
// Canonical dialect
// =============================================================================

function adaptQueries(doc: RawConfigDocument, ctx: DialectContext): QuerySpec[] {
  const seen = new Map<string, number>();

  return (doc.queries ?? []).map((entry, i): QuerySpec => {
    const file = normalizeQueryPath(entry.file, `queries[${i}].file`, ctx);
    const previous = seen.get(file);
    if (previous !== undefined) {
      fail(`Query file "${file}" is already configured by queries[${previous}]`, `queries[${i}].file`, ctx);
    }
    seen.set(file, i);

    const outputs = entry.output ?? [];
    return {
      file,
      outputs: outputs.length === 0
        ? [DEFAULT_OUTPUT]
        : outputs.map((output, j) => adaptOutput(output, `queries[${i}].output[${j}]`, ctx)),
    };
  });
}

function adaptOutput(entry: RawOutputEntry, path: string, ctx: DialectContext): OutputSpec {
  return {
    format: toFormat(entry.format, `${path}.format`, ctx),
    transform: compileAt(entry.query, `${path}.query`, ctx),
    destination: entry.file ?? null,
    compression: toCompression(entry.compression, `${path}.compression`, ctx),
  };
}

// =============================================================================
// Legacy dialect
// =============================================================================

function hasPlaceholder(template: string): boolean {
  return TEMPLATE_PLACEHOLDERS.some(placeholder => template.includes(placeholder));
}

function adaptLegacyFormats(formats: RawLegacyFormat[], ctx: DialectContext): OutputSpec[] {
  if (formats.length === 0) {
    return [DEFAULT_OUTPUT];
  }
  return formats.map((entry, i) => adaptLegacyFormat(entry, `output.formats[${i}]`, ctx));
}

function adaptLegacyFormat(entry: RawLegacyFormat, path: string, ctx: DialectContext): OutputSpec {
  const transform = compileAt(entry.query, `${path}.query`, ctx);
  const compression = toCompression(entry.compression, `${path}.compression`, ctx);

  switch (entry.type) {
    case 'console':
      return { format: 'json', transform, destination: null, compression };
    case 'file': {
      const template = entry.filename_template ?? DEFAULT_LEGACY_FILENAME_TEMPLATE;
      if (!hasPlaceholder(template)) {
        fail(
          `Template "${template}" must contain ${TEMPLATE_PLACEHOLDERS.join(' or ')}`,
          `${path}.filename_template`,
          ctx
        );
      }
      const directory = (entry.path ?? DEFAULT_LEGACY_OUTPUT_PATH).replace(/\/+$/, '');
      return {
        format: 'json',
        transform,
        destination: `${directory}/${template}`,
        compression,
      };
    }
    default:
      return fail('Must be one of: console, file', `${path}.type`, ctx);
  }
}
