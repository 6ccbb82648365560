/**
 * @kqlrun/executor - Query backends
 *
 * `AzCliBackend` runs queries through the Azure CLI:
 *
 * ```
 * az monitor log-analytics query -w <workspace> --analytics-query <text> --output json [--timespan P1D]
 * ```
 *
 * Sign-in, tokens and subscriptions are left to `az`. Output is decoded
 * without rounding large integers.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { isInteger, isSafeNumber, parse } from 'lossless-json';
import type { QueryBackend, QueryRequest } from './types.js';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs a program with arguments, no shell.
 */
export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: { maxBuffer: number }
) => Promise<ExecResult>;

export interface AzCliBackendOptions {
  /** Program to run (default: 'az') */
  command?: string;
  /** Largest response accepted on stdout, in bytes (default: 256MB) */
  maxBuffer?: number;
  /** Process runner, replaced in tests */
  exec?: ExecFileFn;
}

const defaultExec: ExecFileFn = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    maxBuffer: options.maxBuffer,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};

/**
 * Build the argument list for one query.
 */
export function buildAzArgs(request: QueryRequest): string[] {
  const args = [
    'monitor',
    'log-analytics',
    'query',
    '--workspace',
    request.workspaceId,
    '--analytics-query',
    request.query,
    '--output',
    'json',
  ];
  if (request.timespan) {
    args.push('--timespan', request.timespan);
  }
  return args;
}

/**
 * Number parser for `az` output: integers a double cannot hold exactly
 * (KQL `long` IDs and counters) become bigint, everything else a number.
 */
export function parseResponseNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : Number(text);
}

function describeExecFailure(error: unknown, command: string): string {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return `"${command}" was not found; install the Azure CLI and run "az login"`;
  }
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
    const stderr = error.stderr.trim();
    if (stderr) {
      return stderr.split('\n')[0] ?? stderr;
    }
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Backend that shells out to `az monitor log-analytics query`.
 */
export class AzCliBackend implements QueryBackend {
  private readonly command: string;
  private readonly maxBuffer: number;
  private readonly exec: ExecFileFn;

  constructor(options: AzCliBackendOptions = {}) {
    this.command = options.command ?? 'az';
    this.maxBuffer = options.maxBuffer ?? 256 * 1024 * 1024;
    this.exec = options.exec ?? defaultExec;
  }

  async execute(request: QueryRequest): Promise<unknown> {
    let stdout: string;
    try {
      ({ stdout } = await this.exec(this.command, buildAzArgs(request), { maxBuffer: this.maxBuffer }));
    } catch (error) {
      throw new Error(describeExecFailure(error, this.command), { cause: error });
    }

    try {
      return parse(stdout, null, parseResponseNumber);
    } catch (error) {
      throw new Error('Response is not valid JSON', { cause: error });
    }
  }
}
