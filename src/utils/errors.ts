/**
 * Error types for chatstrata.
 *
 * All errors extend from StrataError, providing:
 * - `code`: programmatic identifier (e.g. 'INPUT_TOO_LARGE')
 * - `cause`: the error that caused this one
 * - `category`: whether the caller, an external service, or the process itself is at fault
 * - `status`: the HTTP status the API answers with
 *
 * ## Usage
 *
 * ```typescript
 * import { ExternalServiceError, MalformedInputError } from './errors.js';
 *
 * try {
 *   JSON.parse(text);
 * } catch (err) {
 *   throw new MalformedInputError(`Export is not valid JSON: ${path}`, 'MALFORMED_INPUT', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/** Who is responsible for a failure. */
export type ErrorCategory = 'user' | 'service' | 'internal';

/**
 * Base error class for all chatstrata errors.
 */
export class StrataError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  readonly category: ErrorCategory;

  /** HTTP status used by the search API */
  readonly status: number;

  constructor(
    message: string,
    code: string,
    cause?: unknown,
    category: ErrorCategory = 'internal',
    status = 500,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.status = status;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof StrataError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * No registered normalizer accepted an export.
 *
 * Codes:
 * - `NO_SUITABLE_FORMAT`
 */
export class FormatDetectionError extends StrataError {
  readonly source: string;

  constructor(message: string, source: string, cause?: unknown) {
    super(message, 'NO_SUITABLE_FORMAT', cause, 'user', 422);
    this.source = source;
  }
}

/**
 * An input file exceeds the configured size ceiling.
 */
export class InputSizeError extends StrataError {
  readonly sizeBytes: number;
  readonly limitBytes: number;

  constructor(message: string, sizeBytes: number, limitBytes: number) {
    super(message, 'INPUT_TOO_LARGE', undefined, 'user', 413);
    this.sizeBytes = sizeBytes;
    this.limitBytes = limitBytes;
  }
}

/**
 * Input that cannot be read as the expected structure.
 *
 * Common codes:
 * - `MALFORMED_INPUT`: not valid JSON, or the wrong top-level shape
 * - `INPUT_NOT_FOUND`: the file does not exist
 * - `UNKNOWN_INTERPRETATION_REF`: a saved chunk points at a missing interpretation
 */
export class MalformedInputError extends StrataError {
  constructor(message: string, code = 'MALFORMED_INPUT', cause?: unknown) {
    super(message, code, cause, 'user', 400);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Search Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A date filter is neither epoch seconds nor ISO-8601.
 */
export class DateParseError extends StrataError {
  readonly value: string;

  constructor(value: unknown) {
    super(`Invalid date format: ${String(value)}`, 'INVALID_DATE', undefined, 'user', 400);
    this.value = String(value);
  }
}

/**
 * A search mode was requested without the filter it needs.
 *
 * Codes:
 * - `MISSING_POSITIVE_EXAMPLE`: recommend without positive ids
 * - `MISSING_GROUP_BY`: groups without a group field
 */
export class MissingRequiredFilterError extends StrataError {
  readonly field: string;

  constructor(message: string, code: string, field: string) {
    super(message, code, undefined, 'user', 400);
    this.field = field;
  }
}

/**
 * A filter value is out of range or badly formed.
 */
export class InvalidFilterError extends StrataError {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message, 'INVALID_FILTER', undefined, 'user', 400);
    this.field = field;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Service Errors
// ─────────────────────────────────────────────────────────────────────────────

export type ExternalServiceName = 'index' | 'embedding';

/**
 * The Index Service or the Embedding Service failed or timed out.
 *
 * Common codes:
 * - `INDEX_REQUEST_FAILED`
 * - `EMBEDDING_REQUEST_FAILED`
 * - `SERVICE_TIMEOUT`
 */
export class ExternalServiceError extends StrataError {
  readonly service: ExternalServiceName;

  constructor(message: string, code: string, service: ExternalServiceName, cause?: unknown) {
    super(message, code, cause, 'service', 502);
    this.service = service;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: validation failed
 * - `CONFIG_PARSE_FAILED`: a config file is not valid JSON
 */
export class ConfigError extends StrataError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause, 'internal', 500);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/** True for failures caused by the request or the input. */
export function isUserError(error: unknown): error is StrataError & { readonly category: 'user' } {
  return error instanceof StrataError && error.category === 'user';
}

export function isServiceError(error: unknown): error is ExternalServiceError {
  return error instanceof ExternalServiceError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
