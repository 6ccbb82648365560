/**
 * @kqlrun/transform - Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as fc from 'fast-check';
import { compile, search, TreeInterpreter } from '@jmespath-community/jmespath';
import { deepFreeze, ErrorCode, TransformError, type JsonObject } from '@kqlrun/core';
import { generateRows } from '@kqlrun/test-utils';
import {
  CompiledTransform,
  applyTransform,
  compileTransform,
  normalizeExpression,
} from '../index.js';

vi.mock('@jmespath-community/jmespath', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@jmespath-community/jmespath')>();
  return { ...actual, compile: vi.fn(actual.compile), search: vi.fn(actual.search) };
});

const rows: JsonObject[] = [
  { Time: '2024-03-01T10:00:00Z', Device: 'web-01', RemoteIP: '10.0.0.5', RemotePort: 443 },
  { Time: '2024-03-01T09:00:00Z', Device: 'web-02', RemoteIP: '10.0.0.9', RemotePort: 22 },
  { Time: '2024-03-01T11:00:00Z', Device: 'db-01', RemoteIP: '10.0.1.2', RemotePort: 5432 },
];

describe('compileTransform', () => {
  it('should treat a missing expression as identity', () => {
    const transform = compileTransform();
    expect(transform.isIdentity).toBe(true);
    expect(transform.expression).toBeNull();
    expect(transform).toBe(CompiledTransform.identity());
  });

  it.each(['', '   ', '.', '@', '\n'])('should treat %j as identity', (expression) => {
    expect(compileTransform(expression).isIdentity).toBe(true);
  });

  it('should keep the normalized expression text', () => {
    const transform = compileTransform('[].{\n  name: Device\n}');
    expect(transform.isIdentity).toBe(false);
    expect(transform.expression).toBe('[].{   name: Device }');
  });

  it('should reject a malformed expression with a TransformError', () => {
    expect(() => compileTransform('[].{name: ')).toThrow(TransformError);

    try {
      compileTransform('[].{name: ');
    } catch (error) {
      expect(error).toBeInstanceOf(TransformError);
      if (error instanceof TransformError) {
        expect(error.code).toBe(ErrorCode.TRANSFORM_ERROR);
        expect(error.expression).toBe('[].{name:');
      }
    }
  });
});

describe('normalizeExpression', () => {
  it('should join lines with spaces and trim the ends', () => {
    expect(normalizeExpression('  [].{\r\n  a: A\n}  ')).toBe('[].{   a: A }');
  });
});

describe('applyTransform', () => {
  it('should return the input itself for identity', () => {
    expect(applyTransform(rows, compileTransform())).toBe(rows);
  });

  it('should project rows into new mappings', () => {
    const result = applyTransform(rows, compileTransform('[].{device: Device, port: RemotePort}'));
    expect(result).toEqual([
      { device: 'web-01', port: 443 },
      { device: 'web-02', port: 22 },
      { device: 'db-01', port: 5432 },
    ]);
  });

  it('should slice arrays', () => {
    const result = applyTransform(rows, compileTransform('[:2].Device'));
    expect(result).toEqual(['web-01', 'web-02']);
  });

  it('should sort ascending with sort_by and descending with reverse', () => {
    expect(applyTransform(rows, compileTransform('sort_by(@, &Time)[].Device'))).toEqual([
      'web-02',
      'web-01',
      'db-01',
    ]);
    expect(applyTransform(rows, compileTransform('reverse(sort_by(@, &Time))[].Device'))).toEqual([
      'db-01',
      'web-01',
      'web-02',
    ]);
  });

  it('should coerce to strings and join', () => {
    const transform = compileTransform(
      "[].join(':', [to_string(RemoteIP), to_string(RemotePort)])"
    );
    expect(applyTransform(rows, transform)).toEqual(['10.0.0.5:443', '10.0.0.9:22', '10.0.1.2:5432']);
  });

  it('should return null when nothing matches', () => {
    expect(applyTransform(rows, compileTransform('missing'))).toBeNull();
  });

  it('should not modify a frozen input', () => {
    const input = deepFreeze(rows.map(row => ({ ...row })));
    const result = applyTransform(input, compileTransform('reverse(sort_by(@, &RemotePort))'));

    expect(input.map(row => row.Device)).toEqual(['web-01', 'web-02', 'db-01']);
    expect(result).toEqual([input[2], input[0], input[1]]);
  });

  it('should wrap evaluation failures in a TransformError', () => {
    expect(() => applyTransform('not a number', compileTransform('abs(@)'))).toThrow(TransformError);
  });
});

describe('compiled evaluation', () => {
  beforeEach(() => {
    vi.mocked(compile).mockClear();
    vi.mocked(search).mockClear();
  });

  it('should parse once and evaluate the stored tree on every apply', () => {
    const transform = compileTransform('[].Device');
    expect(compile).toHaveBeenCalledTimes(1);

    const evaluate = vi.spyOn(TreeInterpreter, 'search');
    try {
      for (let i = 0; i < 3; i++) {
        expect(transform.apply(rows)).toEqual(['web-01', 'web-02', 'db-01']);
      }
      expect(evaluate).toHaveBeenCalledTimes(3);
    } finally {
      evaluate.mockRestore();
    }

    expect(compile).toHaveBeenCalledTimes(1);
    expect(search).not.toHaveBeenCalled();
  });

  it('should match array sort and slice on generated rows', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 40 }),
        fc.integer({ min: 0, max: 50 }),
        fc.integer({ min: 0, max: 12 }),
        (count, offset, take) => {
          const input = deepFreeze(generateRows(count, offset));
          const transform = compileTransform(`reverse(sort_by(@, &DeviceName))[:${take}].RemotePort`);
          const expected = [...input]
            .sort((a, b) => (String(a.DeviceName) < String(b.DeviceName) ? 1 : -1))
            .slice(0, take)
            .map(row => row.RemotePort);

          expect(applyTransform(input, transform)).toEqual(expected);
        }
      )
    );
  });
});

describe('integers held as bigint', () => {
  const events: JsonObject[] = [
    { Id: 9007199254740993n, Port: 443 },
    { Id: 9007199254740995n, Port: 22 },
  ];

  it('should pass them through projections, filters and sorts unchanged', () => {
    expect(applyTransform(events, compileTransform('[].{id: Id}'))).toEqual([
      { id: 9007199254740993n },
      { id: 9007199254740995n },
    ]);
    expect(applyTransform(events, compileTransform('[?Port > `100`].Id'))).toEqual([9007199254740993n]);
    expect(applyTransform(events, compileTransform('sort_by(@, &Port)[0].Id'))).toBe(9007199254740995n);
  });

  it('should leave ordinary strings alone', () => {
    expect(applyTransform([{ Id: 1n, Name: 'web-01' }], compileTransform('[0].Name'))).toBe('web-01');
  });
});
