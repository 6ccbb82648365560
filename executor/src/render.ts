/**
 * @kqlrun/executor - Output rendering
 *
 * | format       | text                                                    |
 * |--------------|---------------------------------------------------------|
 * | json, jsonc  | two-space indented JSON, bigint written as plain digits |
 * | yaml, yamlc  | block-style YAML                                        |
 * | table        | aligned columns, header, dash rule, two-space gutter    |
 * | tsv          | header row, then one tab-separated line per row         |
 *
 * Rendered text never ends in a newline; the console sink adds one.
 */

import { stringify as stringifyJson } from 'lossless-json';
import { stringify as stringifyYaml } from 'yaml';
import { describeShape, isPlainObject, UnrenderableShapeError } from '@kqlrun/core';
import type { OutputFormat } from '@kqlrun/config';
import { colorizeJson, colorizeYaml } from './colorize.js';
import type { RenderOptions } from './types.js';

export type RenderableFormat = Exclude<OutputFormat, 'none'>;

type Row = Record<string, unknown>;

/**
 * Render a (transformed) query result.
 *
 * @throws {UnrenderableShapeError} For table/tsv when the value is not a mapping or a list of mappings
 */
export function renderOutput(value: unknown, format: RenderableFormat, options: RenderOptions = {}): string {
  switch (format) {
    case 'json':
      return renderJson(value);
    case 'jsonc':
      return options.color ? colorizeJson(renderJson(value)) : renderJson(value);
    case 'yaml':
      return renderYaml(value);
    case 'yamlc':
      return options.color ? colorizeYaml(renderYaml(value)) : renderYaml(value);
    case 'table':
      return renderTable(toRows(value, format));
    case 'tsv':
      return renderTsv(toRows(value, format));
  }
}

export function renderJson(value: unknown): string {
  return stringifyJson(value ?? null, undefined, 2) ?? 'null';
}

export function renderYaml(value: unknown): string {
  return stringifyYaml(value ?? null, { lineWidth: 0 }).replace(/\n$/, '');
}

// =============================================================================
// Tabular formats
// =============================================================================

/**
 * Accept a single mapping (one row) or a list of mappings.
 */
function toRows(value: unknown, format: RenderableFormat): Row[] {
  if (isPlainObject(value)) {
    return [value];
  }
  if (!Array.isArray(value)) {
    throw new UnrenderableShapeError(format, describeShape(value));
  }

  const rows: Row[] = [];
  for (const item of value) {
    if (!isPlainObject(item)) {
      throw new UnrenderableShapeError(format, `array containing ${describeShape(item)}`);
    }
    rows.push(item);
  }
  return rows;
}

/**
 * Column order: the first row's keys, then new keys as they appear.
 */
export function collectColumns(rows: readonly Row[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return [...columns];
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  return stringifyJson(value) ?? '';
}

/**
 * Width in code points, so astral characters count once.
 */
export function textWidth(text: string): number {
  return Array.from(text).length;
}

export function renderTable(rows: readonly Row[]): string {
  const columns = collectColumns(rows);
  if (columns.length === 0) {
    return '';
  }

  const body = rows.map(row => columns.map(column => formatCell(row[column]).replace(/\r?\n/g, ' ')));
  const widths = columns.map((column, i) =>
    Math.max(textWidth(column), ...body.map(cells => textWidth(cells[i] ?? '')))
  );

  const line = (cells: string[]): string =>
    cells.map((cell, i) => cell + ' '.repeat(Math.max(0, (widths[i] ?? 0) - textWidth(cell)))).join('  ').trimEnd();

  return [
    line(columns),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...body.map(line),
  ].join('\n');
}

export function escapeTsvCell(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/\t/g, '\\t')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
}

export function renderTsv(rows: readonly Row[]): string {
  const columns = collectColumns(rows);
  if (columns.length === 0) {
    return '';
  }

  return [
    columns.map(escapeTsvCell).join('\t'),
    ...rows.map(row => columns.map(column => escapeTsvCell(formatCell(row[column]))).join('\t')),
  ].join('\n');
}
