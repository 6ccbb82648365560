/**
 * @kqlrun/test-utils
 *
 * Shared test doubles for kqlrun:
 * - FakeBackend: in-process QueryBackend with canned responses
 * - Temporary query folders on the local filesystem
 * - Capturing console streams
 */

import { mkdtemp, mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, relative, sep } from 'node:path';
import type { JsonObject } from '@kqlrun/core';
import type { OutputStream, QueryBackend, QueryRequest } from '@kqlrun/executor';

// =============================================================================
// Fake backend
// =============================================================================

/**
 * A canned response: the value to return, or an Error instance to throw.
 */
export type FakeResponse = unknown;

export interface FakeBackendOptions {
  /** Responses keyed by query text (trimmed) */
  responses?: Record<string, FakeResponse>;
  /** Returned for query text with no entry (default: []) */
  defaultResponse?: FakeResponse;
  /** Artificial latency per call, keyed by query text */
  delays?: Record<string, number>;
}

/**
 * In-process QueryBackend.
 *
 * @example
 * ```typescript
 * const backend = new FakeBackend({
 *   responses: {
 *     'Conn | take 2': [{ Device: 'web-01' }, { Device: 'web-02' }],
 *     'Broken | take 1': new Error('Syntax error near Broken'),
 *   },
 * });
 * await executeBatch({ ..., backend });
 * expect(backend.queries()).toEqual(['Broken | take 1', 'Conn | take 2']);
 * ```
 */
export class FakeBackend implements QueryBackend {
  readonly calls: QueryRequest[] = [];
  private readonly responses: Map<string, FakeResponse>;
  private readonly defaultResponse: FakeResponse;
  private readonly delays: Map<string, number>;

  constructor(options: FakeBackendOptions = {}) {
    this.responses = new Map(
      Object.entries(options.responses ?? {}).map(([query, response]) => [query.trim(), response])
    );
    this.defaultResponse = 'defaultResponse' in options ? options.defaultResponse : [];
    this.delays = new Map(
      Object.entries(options.delays ?? {}).map(([query, delay]) => [query.trim(), delay])
    );
  }

  respond(query: string, response: FakeResponse): this {
    this.responses.set(query.trim(), response);
    return this;
  }

  async execute(request: QueryRequest): Promise<unknown> {
    this.calls.push(request);
    const key = request.query.trim();

    const delay = this.delays.get(key);
    if (delay !== undefined) {
      await new Promise(resolve => setTimeout(resolve, delay));
    }

    const response = this.responses.has(key) ? this.responses.get(key) : this.defaultResponse;
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }

  /** Query texts in call order */
  queries(): string[] {
    return this.calls.map(call => call.query.trim());
  }
}

// =============================================================================
// Result generators
// =============================================================================

/**
 * Generate `count` connection-log style rows.
 */
export function generateRows(count: number, offset = 0): JsonObject[] {
  return Array.from({ length: count }, (_, i) => {
    const n = i + offset;
    return {
      TimeGenerated: new Date(Date.UTC(2024, 2, 1, n % 24)).toISOString(),
      DeviceName: `host-${String(n).padStart(2, '0')}`,
      RemoteIP: `10.0.${Math.floor(n / 250)}.${(n % 250) + 1}`,
      RemotePort: [22, 80, 443, 3389][n % 4] ?? 443,
      ActionType: n % 3 === 0 ? 'ConnectionFailed' : 'ConnectionSuccess',
    };
  });
}

// =============================================================================
// Temporary folders
// =============================================================================

export interface TempFolder {
  /** Absolute path of the folder */
  readonly path: string;
  /** Absolute path of a file inside the folder */
  resolve(...segments: string[]): string;
  /** Write a file, creating parent directories */
  write(relativePath: string, content: string): Promise<string>;
  /** Every file below the folder, relative with posix separators, sorted */
  list(): Promise<string[]>;
  cleanup(): Promise<void>;
}

async function listFiles(root: string, dir: string = root): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, full)));
    } else {
      files.push(relative(root, full).split(sep).join('/'));
    }
  }
  return files.sort();
}

/**
 * Create a folder under the OS temp directory, optionally seeded with files.
 *
 * @example
 * ```typescript
 * const folder = await createTempFolder({
 *   'x.kql': 'Conn | take 1',
 *   'net/conn.kql': 'DeviceNetworkEvents | take 5',
 * });
 * afterEach(() => folder.cleanup());
 * ```
 */
export async function createTempFolder(files: Record<string, string> = {}): Promise<TempFolder> {
  const path = await mkdtemp(join(tmpdir(), 'kqlrun-test-'));

  const folder: TempFolder = {
    path,
    resolve: (...segments: string[]) => join(path, ...segments),
    async write(relativePath: string, content: string): Promise<string> {
      const target = join(path, relativePath);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, 'utf8');
      return target;
    },
    list: () => listFiles(path),
    cleanup: () => rm(path, { recursive: true, force: true }),
  };

  for (const [name, content] of Object.entries(files)) {
    await folder.write(name, content);
  }

  return folder;
}

// =============================================================================
// Console streams
// =============================================================================

export interface CapturingStream extends OutputStream {
  readonly chunks: string[];
  /** Everything written so far */
  text(): string;
}

/**
 * Create an OutputStream that records what is written to it.
 */
export function createCapturingStream(options: { isTTY?: boolean } = {}): CapturingStream {
  const chunks: string[] = [];
  return {
    chunks,
    isTTY: options.isTTY ?? false,
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
  };
}
