/**
 * @kqlrun/core - Shared building blocks for kqlrun
 *
 * - Typed error hierarchy with error codes
 * - Structured logging with injectable loggers
 * - JSON value types and helpers
 *
 * @packageDocumentation
 * @module @kqlrun/core
 */

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  KqlRunError,
  ConfigInvalidError,
  NoFilesSelectedError,
  BackendError,
  TransformError,
  UnrenderableShapeError,
  InvalidDestinationError,
  WriteError,
  isKqlRunError,
  wrapError,
  hasErrorCode,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export type {
  LogLevel,
  LogContext,
  LogContextValue,
  LogEntry,
  Logger,
  LoggerConfig,
  LogStream,
  ConsoleLoggerConfig,
  TestLogger,
} from './logging.js';

export {
  LogLevels,
  isLogContextValue,
  parseLogLevel,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
} from './logging.js';

// =============================================================================
// JSON
// =============================================================================

export type { JsonPrimitive, JsonValue, JsonObject } from './json.js';
export { isPlainObject, isJsonValue, deepFreeze, describeShape } from './json.js';
