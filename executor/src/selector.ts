/**
 * @kqlrun/executor - Query file selection
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { NoFilesSelectedError } from '@kqlrun/core';
import { QUERY_FILE_EXTENSION, type FileSelection, type KqlConfig } from '@kqlrun/config';

/**
 * Every `.kql` file below `folder`, as relative posix paths, sorted.
 *
 * Dot-directories are skipped.
 */
export async function listQueryFiles(folder: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string, prefix: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.')) {
          await walk(join(dir, entry.name), rel);
        }
      } else if (entry.isFile() && entry.name.endsWith(QUERY_FILE_EXTENSION)) {
        found.push(rel);
      }
    }
  }

  await walk(folder, '');
  return found.sort(compareFiles);
}

/**
 * Lexicographic order by relative path (code unit order, locale independent).
 */
export function compareFiles(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Apply an include or exclude rule to candidate files.
 */
export function applyFileSelection(candidates: readonly string[], selection: FileSelection): string[] {
  switch (selection.mode) {
    case 'all':
      return [...candidates];
    case 'include': {
      const names = new Set(selection.names);
      return candidates.filter(file => names.has(file));
    }
    case 'exclude': {
      const names = new Set(selection.names);
      return candidates.filter(file => !names.has(file));
    }
  }
}

function describeSelection(config: KqlConfig, candidates: number): string {
  if (candidates === 0) {
    return config.queries !== null
      ? 'the configuration lists no queries'
      : `no ${QUERY_FILE_EXTENSION} files found`;
  }
  return `every candidate was filtered out by files.${config.files.mode}`;
}

/**
 * Decide which query files run, in execution order.
 *
 * @returns Relative posix paths, lexicographically sorted
 * @throws {NoFilesSelectedError} If nothing is left to run
 */
export async function selectFiles(folder: string, config: KqlConfig): Promise<string[]> {
  const candidates = config.queries !== null
    ? [...new Set(config.queries.map(spec => spec.file))].sort(compareFiles)
    : await listQueryFiles(folder);

  const selected = applyFileSelection(candidates, config.files);
  if (selected.length === 0) {
    throw new NoFilesSelectedError(folder, describeSelection(config, candidates.length));
  }
  return selected;
}
