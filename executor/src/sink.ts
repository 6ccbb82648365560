/**
 * @kqlrun/executor - Output sink
 *
 * Resolves destination templates and writes rendered text to the console or
 * to files, optionally compressed. File writes go to a temporary sibling
 * first and are renamed into place, so a failed write never leaves a partial
 * file at the destination.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { gzipSync } from 'node:zlib';
import { strToU8, zipSync } from 'fflate';
import {
  createNoopLogger,
  InvalidDestinationError,
  WriteError,
  type Logger,
} from '@kqlrun/core';
import { FORMAT_EXTENSIONS, QUERY_FILE_EXTENSION, type Compression } from '@kqlrun/config';
import type { DestinationContext, OutputTarget, ResolvedDestination } from './types.js';

/** Timestamp stored on zip entries; fixed so identical text gives identical archives */
const ZIP_ENTRY_MTIME = new Date(2000, 0, 1);

const WHITESPACE = /\s/;

// =============================================================================
// Destination templates
// =============================================================================

/**
 * Substitute `{query-folder}` and `{query}` for one query file.
 *
 * `{query-folder}` is the name of the directory holding the file, which is
 * the target folder's own name for files at its top level.
 */
export function expandTemplate(template: string, queryFile: string, folder: string): string {
  const fullPath = resolve(folder, queryFile);
  const queryFolder = basename(dirname(fullPath));
  const query = basename(fullPath, QUERY_FILE_EXTENSION);

  return template.split('{query-folder}').join(queryFolder).split('{query}').join(query);
}

function applyCompression(path: string, compression: Compression): ResolvedDestination {
  switch (compression) {
    case 'none':
      return { path };
    case 'gzip':
      return { path: `${path}.gz` };
    case 'zip':
      return {
        path: `${path.slice(0, path.length - extname(path).length)}.zip`,
        entryName: basename(path),
      };
  }
}

/**
 * Resolve an output template to the file that will be written.
 *
 * @example
 * ```typescript
 * resolveDestination('out/{query-folder}/{query}.json', {
 *   queryFile: 'net/conn.kql', folder: '/q', baseDir: '/work', format: 'json', compression: 'gzip',
 * });
 * // { path: '/work/out/net/conn.json.gz' }
 * ```
 *
 * @throws {InvalidDestinationError} If the resolved path contains whitespace
 */
export function resolveDestination(template: string, ctx: DestinationContext): ResolvedDestination {
  let path = resolve(ctx.baseDir, expandTemplate(template, ctx.queryFile, ctx.folder));

  if (extname(path) === '') {
    path += FORMAT_EXTENSIONS[ctx.format];
  }

  const destination = applyCompression(path, ctx.compression);

  if (WHITESPACE.test(destination.path)) {
    throw new InvalidDestinationError(destination.path, 'path contains whitespace');
  }
  return destination;
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode rendered text for a file.
 */
export function encodeOutput(text: string, compression: Compression, entryName = 'output'): Uint8Array {
  switch (compression) {
    case 'none':
      return Buffer.from(text, 'utf8');
    case 'gzip':
      return gzipSync(Buffer.from(text, 'utf8'));
    case 'zip':
      return zipSync({ [entryName]: [strToU8(text), { mtime: ZIP_ENTRY_MTIME }] });
  }
}

// =============================================================================
// Writing
// =============================================================================

export interface WriteOutputOptions {
  logger?: Logger;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

async function writeAtomically(path: string, bytes: Uint8Array, logger: Logger): Promise<void> {
  const directory = dirname(path);
  const temporary = join(directory, `.${basename(path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);

  try {
    await writeFile(temporary, bytes);
    await rename(temporary, path);
  } catch (error) {
    await rm(temporary, { force: true }).catch((cleanupError: unknown) => {
      logger.warn('Could not remove temporary file', {
        destination: temporary,
        reason: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw new WriteError(path, error);
  }
}

/**
 * Write rendered text to its target.
 *
 * Console: the text plus a newline; compression does not apply.
 * File: parent directories are created as needed and an existing file is replaced.
 *
 * @returns The path written, or null for the console
 * @throws {WriteError} If the file cannot be written
 */
export async function writeOutput(
  text: string,
  target: OutputTarget,
  options: WriteOutputOptions = {}
): Promise<string | null> {
  if (target.kind === 'console') {
    target.stream.write(`${text}\n`);
    return null;
  }

  const logger = options.logger ?? createNoopLogger();
  const directory = dirname(target.path);

  if (!(await exists(directory))) {
    logger.info('Creating output directory', { destination: directory });
    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new WriteError(target.path, error);
    }
  } else if (await exists(target.path)) {
    logger.warn('Output file exists and will be overwritten', { destination: target.path });
  }

  await writeAtomically(target.path, encodeOutput(text, target.compression, target.entryName), logger);
  logger.debug('Output written', { destination: target.path });
  return target.path;
}
