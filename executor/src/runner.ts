/**
 * @kqlrun/executor - Query runner
 *
 * Reads one query file, sends its text to the backend and returns the rows.
 * Every failure on the way comes out as a BackendError for that file.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  BackendError,
  createNoopLogger,
  deepFreeze,
  describeShape,
  isJsonValue,
  isPlainObject,
  type JsonObject,
  type Logger,
} from '@kqlrun/core';
import type { QueryBackend, ResultSet } from './types.js';

export interface RunQueryOptions {
  folder: string;
  backend: QueryBackend;
  workspaceId: string;
  timespan?: string | null;
  logger?: Logger;
}

function isRow(value: unknown): value is JsonObject {
  return isPlainObject(value) && isJsonValue(value);
}

/**
 * Check that a backend response is a list of rows and freeze it.
 *
 * @throws {BackendError} If the response has any other shape
 */
export function toResultSet(response: unknown, queryFile: string): ResultSet {
  if (!Array.isArray(response)) {
    throw new BackendError(
      `Unexpected response: expected a list of rows, got ${describeShape(response)}`,
      queryFile
    );
  }

  const rows: JsonObject[] = [];
  for (const [i, row] of response.entries()) {
    if (!isRow(row)) {
      throw new BackendError(
        `Unexpected response: row ${i} is ${describeShape(row)}, not an object of JSON values`,
        queryFile
      );
    }
    rows.push(row);
  }

  return deepFreeze(rows);
}

/**
 * Execute one query file.
 *
 * @param queryFile - Path relative to `options.folder`
 * @throws {BackendError} If the file cannot be read, the backend fails or the response is not a list of rows
 */
export async function runQuery(queryFile: string, options: RunQueryOptions): Promise<ResultSet> {
  const logger = options.logger ?? createNoopLogger();

  let query: string;
  try {
    query = await readFile(join(options.folder, queryFile), 'utf8');
  } catch (cause) {
    throw new BackendError(
      `Cannot read query file: ${cause instanceof Error ? cause.message : String(cause)}`,
      queryFile
    );
  }

  logger.debug('Executing query', { queryFile, chars: query.length });

  let response: unknown;
  try {
    response = await options.backend.execute({
      query,
      workspaceId: options.workspaceId,
      ...(options.timespan ? { timespan: options.timespan } : {}),
    });
  } catch (cause) {
    if (cause instanceof BackendError) {
      throw cause;
    }
    throw new BackendError(cause instanceof Error ? cause.message : String(cause), queryFile);
  }

  return toResultSet(response, queryFile);
}
