/**
 * Stack trace capture for kqlrun error classes.
 *
 * Wraps V8's `Error.captureStackTrace` so subclasses can drop their own
 * constructor frames from `stack`.
 */

/**
 * Captures a stack trace on `error`, omitting frames above `constructorOpt`.
 *
 * A no-op outside V8; the `Error` constructor has already filled in `stack`.
 *
 * @example
 * ```typescript
 * class SinkError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     this.name = 'SinkError';
 *     captureStackTrace(this, SinkError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: Function
): void {
  if (typeof Error.captureStackTrace === 'function') {
    Error.captureStackTrace(error, constructorOpt);
  }
}
