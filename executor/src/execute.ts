/**
 * @kqlrun/executor - Batch execution
 *
 * Selected files run in selection order, `concurrency` at a time. For each
 * file: run the query, then for each configured output in order: transform,
 * render, write. A failing query or output is recorded in the summary and
 * the batch moves on.
 *
 * @example
 * ```typescript
 * const summary = await executeBatch({
 *   folder: 'queries/network',
 *   config: await loadConfig({ folder: 'queries/network' }),
 *   backend: new AzCliBackend(),
 *   workspaceId: 'test-workspace',
 *   logger,
 * });
 * process.exitCode = exitCodeFor(summary, 'fail');
 * ```
 */

import {
  createNoopLogger,
  NoFilesSelectedError,
  withContext,
  wrapError,
  type Logger,
} from '@kqlrun/core';
import type { OutputSpec, QueryErrorPolicy } from '@kqlrun/config';
import { applyTransform } from '@kqlrun/transform';
import { shouldColorize } from './colorize.js';
import { renderOutput } from './render.js';
import { runQuery } from './runner.js';
import { selectFiles } from './selector.js';
import { resolveDestination, writeOutput } from './sink.js';
import type {
  ExecuteBatchOptions,
  OutputOutcome,
  OutputStream,
  QueryOutcome,
  ResultSet,
  RunSummary,
} from './types.js';

interface QueryResult {
  query: QueryOutcome;
  outputs: OutputOutcome[];
}

interface BatchContext {
  folder: string;
  outputBase: string;
  stdout: OutputStream;
  color: boolean;
  logger: Logger;
}

async function processOutput(
  queryFile: string,
  index: number,
  output: OutputSpec,
  rows: ResultSet,
  ctx: BatchContext
): Promise<OutputOutcome> {
  const logger = withContext(ctx.logger, { output: index, format: output.format });
  const outcome = { queryFile, index, format: output.format };

  if (output.format === 'none') {
    logger.debug('Output skipped');
    return { ...outcome, status: 'skipped' };
  }

  try {
    const destination = output.destination === null
      ? null
      : resolveDestination(output.destination, {
          queryFile,
          folder: ctx.folder,
          baseDir: ctx.outputBase,
          format: output.format,
          compression: output.compression,
        });

    const value = applyTransform(rows, output.transform);
    const text = renderOutput(value, output.format, { color: destination === null && ctx.color });

    if (destination === null) {
      logger.info(`Results for ${queryFile}`);
      await writeOutput(text, { kind: 'console', stream: ctx.stdout });
      return { ...outcome, status: 'printed' };
    }

    const written = await writeOutput(
      text,
      {
        kind: 'file',
        path: destination.path,
        compression: output.compression,
        entryName: destination.entryName,
      },
      { logger }
    );
    logger.info('Results written', { destination: destination.path });
    return { ...outcome, status: 'written', destination: written ?? destination.path };
  } catch (error) {
    const failure = wrapError(error, 'output');
    logger.error(failure.message, failure, { errorCode: failure.code });
    return { ...outcome, status: 'failed', error: failure };
  }
}

async function processQuery(
  queryFile: string,
  outputs: readonly OutputSpec[],
  options: ExecuteBatchOptions,
  ctx: BatchContext
): Promise<QueryResult> {
  const logger = withContext(ctx.logger, { queryFile });
  const started = Date.now();

  let rows: ResultSet;
  try {
    rows = await runQuery(queryFile, {
      folder: options.folder,
      backend: options.backend,
      workspaceId: options.workspaceId,
      timespan: options.timespan,
      logger,
    });
  } catch (error) {
    const failure = wrapError(error, 'runQuery');
    const durationMs = Date.now() - started;
    logger.error(failure.message, failure, { errorCode: failure.code, durationMs });
    return {
      query: { queryFile, status: 'failed', durationMs, error: failure },
      outputs: outputs.map((output, index): OutputOutcome => ({
        queryFile,
        index,
        format: output.format,
        status: 'skipped',
      })),
    };
  }

  const durationMs = Date.now() - started;
  logger.info('Query executed', { rowCount: rows.length, durationMs });

  const outcomes: OutputOutcome[] = [];
  for (const [index, output] of outputs.entries()) {
    outcomes.push(await processOutput(queryFile, index, output, rows, { ...ctx, logger }));
  }

  return {
    query: { queryFile, status: 'succeeded', rowCount: rows.length, durationMs },
    outputs: outcomes,
  };
}

/**
 * Run every selected query file in a folder and deliver its outputs.
 *
 * Only configuration problems that surface during selection reject; query
 * and output failures are reported in the summary.
 */
export async function executeBatch(options: ExecuteBatchOptions): Promise<RunSummary> {
  const started = Date.now();
  const logger = options.logger ?? createNoopLogger();
  const stdout = options.stdout ?? process.stdout;
  const { folder, config } = options;

  let selected: string[];
  try {
    selected = await selectFiles(folder, config);
  } catch (error) {
    if (error instanceof NoFilesSelectedError) {
      logger.warn(error.message, { errorCode: error.code });
      return {
        folder,
        selected: [],
        queries: [],
        outputs: [],
        noFilesSelected: error,
        durationMs: Date.now() - started,
      };
    }
    throw error;
  }

  logger.info(`Selected ${selected.length} query file(s)`, { folder });

  const specs = new Map((config.queries ?? []).map(spec => [spec.file, spec.outputs]));
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const ctx: BatchContext = {
    folder,
    outputBase: options.outputBase ?? process.cwd(),
    stdout,
    color: shouldColorize(options.color ?? 'auto', stdout),
    logger,
  };

  const results: QueryResult[] = [];
  for (let i = 0; i < selected.length; i += concurrency) {
    const batch = selected.slice(i, i + concurrency);
    results.push(
      ...(await Promise.all(
        batch.map(file => processQuery(file, specs.get(file) ?? config.defaultOutputs, options, ctx))
      ))
    );
  }

  return {
    folder,
    selected,
    queries: results.map(result => result.query),
    outputs: results.flatMap(result => result.outputs),
    durationMs: Date.now() - started,
  };
}

// =============================================================================
// Reporting
// =============================================================================

export interface SummaryCounts {
  queriesSucceeded: number;
  queriesFailed: number;
  outputsWritten: number;
  outputsPrinted: number;
  outputsSkipped: number;
  outputsFailed: number;
}

export function countOutcomes(summary: RunSummary): SummaryCounts {
  const counts: SummaryCounts = {
    queriesSucceeded: 0,
    queriesFailed: 0,
    outputsWritten: 0,
    outputsPrinted: 0,
    outputsSkipped: 0,
    outputsFailed: 0,
  };

  for (const query of summary.queries) {
    if (query.status === 'succeeded') counts.queriesSucceeded++;
    else counts.queriesFailed++;
  }

  for (const output of summary.outputs) {
    switch (output.status) {
      case 'written':
        counts.outputsWritten++;
        break;
      case 'printed':
        counts.outputsPrinted++;
        break;
      case 'skipped':
        counts.outputsSkipped++;
        break;
      case 'failed':
        counts.outputsFailed++;
        break;
    }
  }

  return counts;
}

/**
 * Exit code for a finished batch.
 *
 * With `continue`, failures are only logged. With `fail`, any failed query
 * or output makes the exit code 1.
 */
export function exitCodeFor(summary: RunSummary, policy: QueryErrorPolicy): number {
  if (policy === 'continue') {
    return 0;
  }
  const counts = countOutcomes(summary);
  return counts.queriesFailed > 0 || counts.outputsFailed > 0 ? 1 : 0;
}
