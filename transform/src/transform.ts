/**
 * @kqlrun/transform - JMESPath transform expressions
 *
 * Expressions are compiled once when the configuration loads, so syntax
 * errors stop the run before any backend call. The compiled object is then
 * applied to each query result, once per output that uses it.
 *
 * @example
 * ```typescript
 * const transform = compileTransform(`
 *   reverse(sort_by([].{Time: TimeGenerated, Action: ActionType}, &Time))[:5]
 * `);
 * const rows = applyTransform(resultSet, transform);
 * ```
 */

import { compile, TreeInterpreter } from '@jmespath-community/jmespath';
import { TransformError, type JsonObject, type JsonValue } from '@kqlrun/core';

type ExpressionTree = ReturnType<typeof compile>;

type SearchValue = Parameters<typeof TreeInterpreter.search>[1];

/**
 * Expressions that mean "pass the input through unchanged".
 *
 * `.` is the identity of the jq-based legacy dialect; `@` is JMESPath's.
 */
const IDENTITY_EXPRESSIONS = new Set(['', '.', '@']);

/**
 * Collapse the line breaks YAML block scalars leave in multi-line expressions.
 */
export function normalizeExpression(expression: string): string {
  return expression.replace(/\r?\n/g, ' ').trim();
}

/**
 * JMESPath values have no bigint. Integers outside the safe range cross the
 * interpreter as marker strings and are restored in the result, so
 * projections, slices and filters keep them exact. Functions see the marker.
 */
const UNSAFE_INTEGER_MARKER = '\u0000int:';

function toSearchValue(value: JsonValue, integers: Map<string, bigint>): SearchValue {
  if (typeof value === 'bigint') {
    const marker = `${UNSAFE_INTEGER_MARKER}${value}`;
    integers.set(marker, value);
    return marker;
  }
  if (Array.isArray(value)) {
    return value.map(item => toSearchValue(item, integers));
  }
  if (value !== null && typeof value === 'object') {
    const object: { [key: string]: SearchValue } = {};
    for (const [key, item] of Object.entries(value)) {
      object[key] = toSearchValue(item, integers);
    }
    return object;
  }
  return value;
}

function fromSearchValue(value: SearchValue, integers: ReadonlyMap<string, bigint>): JsonValue {
  if (typeof value === 'string') {
    return integers.get(value) ?? value;
  }
  if (Array.isArray(value)) {
    return value.map(item => fromSearchValue(item, integers));
  }
  if (value !== null && typeof value === 'object') {
    const object: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      object[key] = fromSearchValue(item, integers);
    }
    return object;
  }
  return value;
}

/**
 * A parsed, validated transform expression.
 *
 * Instances are immutable and safe to share across queries.
 */
export class CompiledTransform {
  private constructor(
    /** Normalized expression text, or null for identity */
    readonly expression: string | null,
    private readonly tree: ExpressionTree | null
  ) {}

  private static readonly IDENTITY = new CompiledTransform(null, null);

  static identity(): CompiledTransform {
    return CompiledTransform.IDENTITY;
  }

  /**
   * @throws {TransformError} If the expression does not parse
   */
  static compile(expression: string | null | undefined): CompiledTransform {
    if (expression === null || expression === undefined) {
      return CompiledTransform.IDENTITY;
    }

    const normalized = normalizeExpression(expression);
    if (IDENTITY_EXPRESSIONS.has(normalized)) {
      return CompiledTransform.IDENTITY;
    }

    try {
      return new CompiledTransform(normalized, compile(normalized));
    } catch (cause) {
      throw new TransformError(
        `Invalid transform expression: ${cause instanceof Error ? cause.message : String(cause)}`,
        normalized,
        cause
      );
    }
  }

  get isIdentity(): boolean {
    return this.tree === null;
  }

  /**
   * Evaluate against `input`. The input is never modified.
   *
   * @throws {TransformError} If evaluation fails (e.g. a function receives the wrong type)
   */
  apply(input: JsonValue): JsonValue {
    if (this.expression === null || this.tree === null) {
      return input;
    }

    const integers = new Map<string, bigint>();
    let result: SearchValue;
    try {
      result = TreeInterpreter.search(this.tree, toSearchValue(input, integers));
    } catch (cause) {
      throw new TransformError(
        `Transform failed: ${cause instanceof Error ? cause.message : String(cause)}`,
        this.expression,
        cause
      );
    }
    return fromSearchValue(result, integers);
  }

  toString(): string {
    return this.expression ?? '@';
  }
}

/**
 * Compile an optional expression; absent or blank means identity.
 */
export function compileTransform(expression?: string | null): CompiledTransform {
  return CompiledTransform.compile(expression);
}

export function applyTransform(input: JsonValue, transform: CompiledTransform): JsonValue {
  return transform.apply(input);
}
