/**
 * @kqlrun/executor - Type Definitions
 *
 * @packageDocumentation
 */

import type { JsonObject, KqlRunError, Logger } from '@kqlrun/core';
import type { ColorMode, Compression, KqlConfig, OutputFormat } from '@kqlrun/config';

// =============================================================================
// Backend
// =============================================================================

export interface QueryRequest {
  /** Full query text, passed through unchanged */
  query: string;
  workspaceId: string;
  /** ISO 8601 duration limiting the query's time range */
  timespan?: string;
}

/**
 * The remote analytics service. Authentication is the backend's concern.
 */
export interface QueryBackend {
  /**
   * Run one query and return the decoded response.
   *
   * The caller checks the response shape.
   */
  execute(request: QueryRequest): Promise<unknown>;
}

/**
 * Rows returned by one query. Deep-frozen once received; transforms read it,
 * nothing writes to it.
 */
export type ResultSet = JsonObject[];

// =============================================================================
// Output
// =============================================================================

/**
 * Anything with a `write(text)` method; `process.stdout` in production.
 */
export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export type OutputTarget =
  | { kind: 'console'; stream: OutputStream }
  | {
      kind: 'file';
      /** Absolute path of the file written to disk */
      path: string;
      compression: Compression;
      /** Archive member name, for zip */
      entryName?: string;
    };

export interface RenderOptions {
  /** Emit ANSI colour for jsonc and yamlc */
  color?: boolean;
}

export interface ResolvedDestination {
  /** Absolute path of the file written to disk */
  path: string;
  /** Archive member name, for zip */
  entryName?: string;
}

export interface DestinationContext {
  /** Query file relative to the folder (posix separators) */
  queryFile: string;
  /** Folder the query file was selected from */
  folder: string;
  /** Base directory relative destinations resolve against */
  baseDir: string;
  format: Exclude<OutputFormat, 'none'>;
  compression: Compression;
}

// =============================================================================
// Batch
// =============================================================================

export type QueryStatus = 'succeeded' | 'failed';

export type OutputStatus = 'written' | 'printed' | 'skipped' | 'failed';

export interface OutputOutcome {
  queryFile: string;
  /** Position of the output within its query */
  index: number;
  format: OutputFormat;
  status: OutputStatus;
  /** File written, for status 'written' */
  destination?: string;
  error?: KqlRunError;
}

export interface QueryOutcome {
  queryFile: string;
  status: QueryStatus;
  rowCount?: number;
  durationMs: number;
  error?: KqlRunError;
}

/**
 * What happened during one batch. Returned to the caller, never global.
 */
export interface RunSummary {
  folder: string;
  /** Query files in selection order */
  selected: string[];
  queries: QueryOutcome[];
  outputs: OutputOutcome[];
  /** Set when selection produced nothing */
  noFilesSelected?: KqlRunError;
  durationMs: number;
}

export interface ExecuteBatchOptions {
  /** Folder containing the query files */
  folder: string;
  config: KqlConfig;
  backend: QueryBackend;
  workspaceId: string;
  /** Base directory relative destinations resolve against (default: cwd) */
  outputBase?: string;
  /** Query files run at once (default: 1) */
  concurrency?: number;
  timespan?: string | null;
  color?: ColorMode;
  /** Console stream (default: process.stdout) */
  stdout?: OutputStream;
  logger?: Logger;
}
