/**
 * @kqlrun/executor - Rendering tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ErrorCode, UnrenderableShapeError } from '@kqlrun/core';
import {
  colorizeJson,
  colorizeYaml,
  collectColumns,
  formatCell,
  renderOutput,
  shouldColorize,
  textWidth,
} from '../index.js';

const ANSI = /\u001b\[\d+m/g;

function stripAnsi(text: string): string {
  return text.replace(ANSI, '');
}

function shapeError(fn: () => unknown): UnrenderableShapeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof UnrenderableShapeError) return error;
    throw error;
  }
  throw new Error('expected an UnrenderableShapeError');
}

const rows = [
  { Device: 'web-01', Port: 443 },
  { Device: 'db-01', Port: 5432, Note: 'primary' },
];

describe('renderOutput', () => {
  describe('json', () => {
    it('should pretty-print with two-space indentation', () => {
      expect(renderOutput([{ a: 1 }], 'json')).toBe('[\n  {\n    "a": 1\n  }\n]');
    });

    it('should render scalars and null', () => {
      expect(renderOutput('web-01', 'json')).toBe('"web-01"');
      expect(renderOutput(null, 'json')).toBe('null');
    });

    it('should not colour jsonc unless asked', () => {
      expect(renderOutput({ a: true }, 'jsonc')).toBe('{\n  "a": true\n}');
      expect(renderOutput({ a: true }, 'jsonc', { color: false })).toBe('{\n  "a": true\n}');
    });

    it('should colour jsonc when asked', () => {
      expect(renderOutput({ a: true }, 'jsonc', { color: true })).toBe(
        '\u001b[2m{\u001b[22m\n  \u001b[34m"a"\u001b[39m\u001b[2m:\u001b[22m \u001b[35mtrue\u001b[39m\n\u001b[2m}\u001b[22m'
      );
    });

    it('should never colour plain json', () => {
      expect(renderOutput({ a: true }, 'json', { color: true })).toBe('{\n  "a": true\n}');
    });

    it('should write integers held as bigint as plain digits', () => {
      expect(renderOutput([{ Id: 9007199254740993n, Bytes: 12 }], 'json')).toBe(
        '[\n  {\n    "Id": 9007199254740993,\n    "Bytes": 12\n  }\n]'
      );
    });

    it('should round-trip row lists through JSON.parse', () => {
      const cell = fc.oneof(
        fc.string(),
        fc.integer(),
        fc.boolean(),
        fc.constant(null),
        fc.array(fc.integer(), { maxLength: 3 })
      );
      const row = fc.dictionary(fc.stringMatching(/^[A-Za-z][A-Za-z0-9_]{0,8}$/), cell, { maxKeys: 5 });

      fc.assert(
        fc.property(fc.array(row, { maxLength: 10 }), (value) => {
          expect(JSON.parse(renderOutput(value, 'json'))).toEqual(value);
        })
      );
    });
  });

  describe('yaml', () => {
    it('should render block-style YAML without a trailing newline', () => {
      expect(renderOutput([{ Device: 'web-01', Port: 443 }], 'yaml')).toBe('- Device: web-01\n  Port: 443');
    });

    it('should write integers held as bigint as plain digits', () => {
      expect(renderOutput([{ Id: 9007199254740993n }], 'yaml')).toBe('- Id: 9007199254740993');
    });

    it('should render an empty mapping', () => {
      expect(renderOutput({}, 'yaml')).toBe('{}');
    });

    it('should colour yamlc when asked', () => {
      const text = renderOutput([{ Device: 'web-01', Port: 443 }], 'yamlc', { color: true });
      expect(stripAnsi(text)).toBe('- Device: web-01\n  Port: 443');
      expect(text).toContain('\u001b[34mDevice\u001b[39m');
      expect(text).toContain('\u001b[33m 443\u001b[39m');
      expect(text).toContain('\u001b[32m web-01\u001b[39m');
    });
  });

  describe('table', () => {
    it('should align columns with a header, rule and two-space gutter', () => {
      expect(renderOutput(rows, 'table')).toBe(
        [
          'Device  Port  Note',
          '------  ----  -------',
          'web-01  443',
          'db-01   5432  primary',
        ].join('\n')
      );
    });

    it('should render a single mapping as one row', () => {
      expect(renderOutput({ a: 'x', b: null }, 'table')).toBe('a  b\n-  -\nx');
    });

    it('should render nested values as JSON', () => {
      expect(renderOutput([{ tags: ['a', 'b'], meta: { k: 1 } }], 'table')).toBe(
        'tags       meta\n---------  -------\n["a","b"]  {"k":1}'
      );
    });

    it('should measure cells in code points', () => {
      expect(renderOutput([{ Name: '\u{1D538}\u{1D539}\u{1D538}\u{1D539}\u{1D538}', N: 1 }, { Name: 'abc', N: 2 }], 'table')).toBe(
        [
          'Name   N',
          '-----  -',
          '\u{1D538}\u{1D539}\u{1D538}\u{1D539}\u{1D538}  1',
          'abc    2',
        ].join('\n')
      );
    });

    it('should render an empty list as empty text', () => {
      expect(renderOutput([], 'table')).toBe('');
    });

    it('should reject scalars', () => {
      const error = shapeError(() => renderOutput(42, 'table'));
      expect(error.code).toBe(ErrorCode.UNRENDERABLE_SHAPE);
      expect(error.message).toBe('Cannot render number as table');
      expect(shapeError(() => renderOutput(null, 'table')).message).toBe('Cannot render null as table');
    });
  });

  describe('tsv', () => {
    it('should write a header row and escape tabs, newlines and backslashes', () => {
      const text = renderOutput(
        [
          { name: 'a\tb', note: 'line1\nline2' },
          { name: 'c', path: 'C:\\x' },
        ],
        'tsv'
      );
      expect(text.split('\n')).toEqual([
        'name\tnote\tpath',
        'a\\tb\tline1\\nline2\t',
        'c\t\tC:\\\\x',
      ]);
    });

    it('should reject lists that contain non-mappings', () => {
      expect(shapeError(() => renderOutput(['a'], 'tsv')).message).toBe('Cannot render array containing string as tsv');
    });
  });
});

describe('collectColumns', () => {
  it('should keep the first row order, then add new keys as they appear', () => {
    expect(collectColumns([{ b: 1, a: 2 }, { c: 3, a: 4 }, { d: 5 }])).toEqual(['b', 'a', 'c', 'd']);
  });
});

describe('formatCell', () => {
  it('should format each kind of value', () => {
    expect(formatCell(null)).toBe('');
    expect(formatCell(undefined)).toBe('');
    expect(formatCell('text')).toBe('text');
    expect(formatCell(1.5)).toBe('1.5');
    expect(formatCell(false)).toBe('false');
    expect(formatCell([1, 'a'])).toBe('[1,"a"]');
    expect(formatCell(9007199254740993n)).toBe('9007199254740993');
    expect(formatCell({ ids: [9007199254740993n] })).toBe('{"ids":[9007199254740993]}');
  });
});

describe('textWidth', () => {
  it('should count astral characters once', () => {
    expect(textWidth('abc')).toBe(3);
    expect(textWidth('\u{1D538}x')).toBe(2);
    expect(textWidth('')).toBe(0);
  });
});

describe('colorize', () => {
  it('should leave the text unchanged apart from colour codes', () => {
    const json = renderOutput({ n: -1.5e3, s: 'a "q" b', list: [null, false] }, 'json');
    expect(stripAnsi(colorizeJson(json))).toBe(json);

    const yaml = renderOutput({ n: 3, s: 'text', list: [null, true] }, 'yaml');
    expect(stripAnsi(colorizeYaml(yaml))).toBe(yaml);
  });

  it('should decide colour from the mode and the stream', () => {
    expect(shouldColorize('auto', { write: () => true, isTTY: true })).toBe(true);
    expect(shouldColorize('auto', { write: () => true })).toBe(false);
    expect(shouldColorize('always', { write: () => true })).toBe(true);
    expect(shouldColorize('never', { write: () => true, isTTY: true })).toBe(false);
  });
});
