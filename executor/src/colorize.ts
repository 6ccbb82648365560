/**
 * @kqlrun/executor - ANSI colour for jsonc and yamlc
 *
 * Colours: keys blue, strings green, numbers yellow, booleans and null
 * magenta, punctuation dim.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { ColorMode } from '@kqlrun/config';
import type { OutputStream } from './types.js';

// Level 1 (16 colours): output may be captured to a terminal other than ours
const palette: ChalkInstance = new Chalk({ level: 1 });

const JSON_TOKEN =
  /("(?:\\.|[^"\\])*")(\s*:)?|\b(true|false|null)\b|(-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)|([{}[\],])/g;

/**
 * Colour pretty-printed JSON text.
 */
export function colorizeJson(text: string): string {
  return text.replace(
    JSON_TOKEN,
    (match, str: string | undefined, colon: string | undefined, literal: string | undefined, num: string | undefined, punct: string | undefined) => {
      if (str !== undefined) {
        return colon !== undefined ? palette.blue(str) + palette.dim(colon) : palette.green(str);
      }
      if (literal !== undefined) return palette.magenta(literal);
      if (num !== undefined) return palette.yellow(num);
      if (punct !== undefined) return palette.dim(punct);
      return match;
    }
  );
}

function colorizeYamlScalar(value: string): string {
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === '|' || trimmed === '>' || trimmed === '|-' || trimmed === '>-') {
    return value;
  }
  if (trimmed === '[]' || trimmed === '{}') return palette.dim(value);
  if (/^(true|false|null|~)$/.test(trimmed)) return palette.magenta(value);
  if (/^-?\d+(\.\d+)?([eE][+-]?\d+)?$/.test(trimmed)) return palette.yellow(value);
  return palette.green(value);
}

const YAML_LINE = /^(\s*(?:- )*)(?:("[^"]*"|'[^']*'|[^\s:#'"-][^:]*?|-[^\s:][^:]*?)(:)(?=\s|$))?(.*)$/;

/**
 * Colour block-style YAML text, one line at a time.
 */
export function colorizeYaml(text: string): string {
  return text
    .split('\n')
    .map((line) => {
      const match = YAML_LINE.exec(line);
      if (!match) return line;
      const [, indent = '', key, colon, rest = ''] = match;
      const bullets = indent.replace(/-/g, palette.dim('-'));
      const head = key !== undefined && colon !== undefined ? palette.blue(key) + palette.dim(colon) : '';
      return bullets + head + colorizeYamlScalar(rest);
    })
    .join('\n');
}

/**
 * Decide whether console output gets colour.
 *
 * `auto` colours only when the stream is a terminal.
 */
export function shouldColorize(mode: ColorMode, stream: OutputStream): boolean {
  switch (mode) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'auto':
      return stream.isTTY === true;
  }
}
