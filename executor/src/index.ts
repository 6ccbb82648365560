/**
 * @kqlrun/executor - Query batch execution
 *
 * Selection, backend calls, rendering and output delivery for a folder of
 * `.kql` files.
 *
 * @packageDocumentation
 * @module @kqlrun/executor
 */

// Types
export type {
  QueryRequest,
  QueryBackend,
  ResultSet,
  OutputStream,
  OutputTarget,
  RenderOptions,
  ResolvedDestination,
  DestinationContext,
  QueryStatus,
  OutputStatus,
  OutputOutcome,
  QueryOutcome,
  RunSummary,
  ExecuteBatchOptions,
} from './types.js';

// Selection
export { listQueryFiles, compareFiles, applyFileSelection, selectFiles } from './selector.js';

// Backend
export {
  AzCliBackend,
  buildAzArgs,
  parseResponseNumber,
  type AzCliBackendOptions,
  type ExecFileFn,
  type ExecResult,
} from './backend.js';
export { runQuery, toResultSet, type RunQueryOptions } from './runner.js';

// Rendering
export {
  renderOutput,
  renderJson,
  renderYaml,
  renderTable,
  renderTsv,
  collectColumns,
  formatCell,
  escapeTsvCell,
  textWidth,
  type RenderableFormat,
} from './render.js';
export { colorizeJson, colorizeYaml, shouldColorize } from './colorize.js';

// Output
export {
  expandTemplate,
  resolveDestination,
  encodeOutput,
  writeOutput,
  type WriteOutputOptions,
} from './sink.js';

// Batch
export { executeBatch, countOutcomes, exitCodeFor, type SummaryCounts } from './execute.js';
