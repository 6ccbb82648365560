/**
 * Typed exception classes for kqlrun
 *
 * Error hierarchy:
 * - KqlRunError: Base error class for all kqlrun errors
 *   - ConfigInvalidError: Config document unreadable, malformed or invalid (fatal)
 *   - NoFilesSelectedError: Selection produced no query files (non-fatal)
 *   - BackendError: The analytics backend rejected or failed a query (per query)
 *   - TransformError: A transform expression failed to compile or evaluate
 *   - UnrenderableShapeError: A value cannot be rendered in the requested format
 *   - InvalidDestinationError: A resolved output path is not acceptable
 *   - WriteError: Writing an output file failed
 *
 * Use error codes for programmatic handling:
 *
 * @example
 * ```typescript
 * import { KqlRunError, ErrorCode } from '@kqlrun/core';
 *
 * try {
 *   await loadConfig({ folder });
 * } catch (error) {
 *   if (error instanceof KqlRunError && error.code === ErrorCode.CONFIG_INVALID) {
 *     logger.error(error.toDetailedString());
 *     process.exitCode = 1;
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',
  SETTINGS_INVALID = 'SETTINGS_INVALID',

  // Selection
  NO_FILES_SELECTED = 'NO_FILES_SELECTED',
  FOLDER_NOT_FOUND = 'FOLDER_NOT_FOUND',

  // Execution
  BACKEND_ERROR = 'BACKEND_ERROR',
  TRANSFORM_ERROR = 'TRANSFORM_ERROR',

  // Output
  UNRENDERABLE_SHAPE = 'UNRENDERABLE_SHAPE',
  INVALID_DESTINATION = 'INVALID_DESTINATION',
  WRITE_ERROR = 'WRITE_ERROR',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.values<string>(ErrorCode).includes(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all kqlrun errors.
 *
 * Carries a machine-readable `code`, optional structured `details` and an
 * optional `suggestion` for the person running the batch.
 */
export class KqlRunError extends Error {
  /** Error code for programmatic identification */
  public readonly code: string;

  /** Structured details for debugging */
  public readonly details?: Record<string, unknown>;

  /** Hint for resolving the error, when there is one */
  public readonly suggestion?: string;

  /** Creation time (milliseconds since epoch) */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'KqlRunError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, KqlRunError);
  }

  /**
   * Structured form for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Multi-line form for CLI output.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when the configuration document cannot be used.
 *
 * Always fatal: the run stops before any backend call. `path` names the
 * offending field (`queries[0].output[1].format`), or is empty when the
 * whole document is at fault.
 *
 * @example
 * ```typescript
 * throw new ConfigInvalidError('Unknown output format "csv"', 'queries[0].output[0].format');
 * throw ConfigInvalidError.mutuallyExclusive('files', ['include', 'exclude']);
 * ```
 */
export class ConfigInvalidError extends KqlRunError {
  public readonly path: string;
  public readonly configFile?: string;

  constructor(
    message: string,
    path: string = '',
    options: { configFile?: string; suggestion?: string; cause?: unknown } = {}
  ) {
    super(
      path ? `Invalid configuration at "${path}": ${message}` : `Invalid configuration: ${message}`,
      ErrorCode.CONFIG_INVALID,
      {
        path,
        ...(options.configFile !== undefined && { configFile: options.configFile }),
        ...(options.cause !== undefined && { cause: describeCause(options.cause) }),
      },
      options.suggestion
    );
    this.name = 'ConfigInvalidError';
    this.path = path;
    this.configFile = options.configFile;
    captureStackTrace(this, ConfigInvalidError);
  }

  static mutuallyExclusive(path: string, fields: string[], configFile?: string): ConfigInvalidError {
    return new ConfigInvalidError(
      `${fields.map(f => `"${f}"`).join(' and ')} cannot both be set`,
      path,
      { configFile, suggestion: `Keep only one of ${fields.join(', ')}` }
    );
  }
}

// =============================================================================
// Selection Errors
// =============================================================================

/**
 * Error raised when selection leaves nothing to run.
 *
 * Non-fatal: the batch logs it and completes with zero queries.
 */
export class NoFilesSelectedError extends KqlRunError {
  public readonly folder: string;

  constructor(folder: string, reason: string) {
    super(
      `No query files selected in "${folder}": ${reason}`,
      ErrorCode.NO_FILES_SELECTED,
      { folder, reason }
    );
    this.name = 'NoFilesSelectedError';
    this.folder = folder;
    captureStackTrace(this, NoFilesSelectedError);
  }
}

// =============================================================================
// Execution Errors
// =============================================================================

/**
 * Error thrown when running a query against the backend fails.
 *
 * Covers unreadable query files, transport failures, authentication and
 * syntax errors reported by the backend, and unexpected response shapes.
 * Reported per query; the batch continues with the next file.
 */
export class BackendError extends KqlRunError {
  public readonly queryFile: string;

  constructor(message: string, queryFile: string, details?: Record<string, unknown>) {
    super(
      `Query "${queryFile}" failed: ${message}`,
      ErrorCode.BACKEND_ERROR,
      { queryFile, ...details }
    );
    this.name = 'BackendError';
    this.queryFile = queryFile;
    captureStackTrace(this, BackendError);
  }
}

/**
 * Error thrown when a transform expression cannot be compiled or evaluated.
 *
 * Compile failures surface during config loading (as ConfigInvalidError);
 * evaluation failures are reported per output.
 */
export class TransformError extends KqlRunError {
  public readonly expression: string;

  constructor(message: string, expression: string, cause?: unknown) {
    super(
      message,
      ErrorCode.TRANSFORM_ERROR,
      {
        expression,
        ...(cause !== undefined && { cause: describeCause(cause) }),
      },
      'Check the expression against the JMESPath specification'
    );
    this.name = 'TransformError';
    this.expression = expression;
    captureStackTrace(this, TransformError);
  }
}

// =============================================================================
// Output Errors
// =============================================================================

/**
 * Error thrown when a value does not fit the requested output format,
 * e.g. a scalar rendered as `table`.
 */
export class UnrenderableShapeError extends KqlRunError {
  public readonly format: string;

  constructor(format: string, shape: string) {
    super(
      `Cannot render ${shape} as ${format}`,
      ErrorCode.UNRENDERABLE_SHAPE,
      { format, shape },
      `Use a transform that yields a list of objects, or choose json or yaml`
    );
    this.name = 'UnrenderableShapeError';
    this.format = format;
    captureStackTrace(this, UnrenderableShapeError);
  }
}

/**
 * Error thrown when a resolved destination path is rejected.
 */
export class InvalidDestinationError extends KqlRunError {
  public readonly destination: string;

  constructor(destination: string, reason: string) {
    super(
      `Invalid destination "${destination}": ${reason}`,
      ErrorCode.INVALID_DESTINATION,
      { destination, reason },
      'Use underscores or dashes instead of whitespace'
    );
    this.name = 'InvalidDestinationError';
    this.destination = destination;
    captureStackTrace(this, InvalidDestinationError);
  }
}

/**
 * Error thrown when an output file cannot be written.
 *
 * No partial file is left at `destination` when this is raised.
 */
export class WriteError extends KqlRunError {
  public readonly destination: string;

  constructor(destination: string, cause: unknown) {
    super(
      `Failed to write "${destination}": ${describeCause(cause)}`,
      ErrorCode.WRITE_ERROR,
      { destination }
    );
    this.name = 'WriteError';
    this.destination = destination;
    captureStackTrace(this, WriteError);
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Type guard for any kqlrun error.
 */
export function isKqlRunError(error: unknown): error is KqlRunError {
  return error instanceof KqlRunError;
}

/**
 * Wrap an unknown thrown value in a KqlRunError.
 *
 * KqlRunErrors pass through unchanged.
 */
export function wrapError(error: unknown, operation?: string): KqlRunError {
  if (error instanceof KqlRunError) {
    return error;
  }

  if (error instanceof Error) {
    return new KqlRunError(
      error.message,
      ErrorCode.INTERNAL_ERROR,
      { operation, originalError: error.name }
    );
  }

  return new KqlRunError(
    String(error),
    ErrorCode.INTERNAL_ERROR,
    { operation }
  );
}

/**
 * Check if an error is a KqlRunError with a specific code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode | string): boolean {
  return error instanceof KqlRunError && error.code === code;
}
