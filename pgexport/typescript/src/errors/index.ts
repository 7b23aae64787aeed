/**
 * Export error types.
 *
 * Configuration problems surface before any row is read; sink, row and
 * cursor failures abort the export that raised them. Nothing here is
 * retried: every error is final for the call that produced it.
 */

/**
 * Export error codes.
 */
export enum ExportErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  UnsupportedFormat = 'UNSUPPORTED_FORMAT',
  DuplicateFormat = 'DUPLICATE_FORMAT',
  UnsupportedCompression = 'UNSUPPORTED_COMPRESSION',
  InvalidQuery = 'INVALID_QUERY',

  // Output errors
  SinkFailed = 'SINK_FAILED',

  // Row errors
  RowFailed = 'ROW_FAILED',
  EncodeFailed = 'ENCODE_FAILED',
  CursorFailed = 'CURSOR_FAILED',

  // Format-specific errors
  TemplateFailed = 'TEMPLATE_FAILED',
  CopyFailed = 'COPY_FAILED',

  // Database errors
  ConnectionFailed = 'CONNECTION_FAILED',
  QueryFailed = 'QUERY_FAILED',

  // Result policy
  EmptyResult = 'EMPTY_RESULT',
}

/**
 * Base export error class.
 */
export class ExportError extends Error {
  /** Error code */
  readonly code: ExportErrorCode;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: ExportErrorCode;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ExportError';
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExportError);
    }
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid or incomplete export options.
 */
export class ConfigurationError extends ExportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ExportErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Format name not present in the registry.
 */
export class UnsupportedFormatError extends ExportError {
  constructor(format: string, available: readonly string[]) {
    super({
      code: ExportErrorCode.UnsupportedFormat,
      message: `unsupported format: "${format}" (available: ${available.join(', ')})`,
      details: { format, available: [...available] },
    });
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Format name registered twice.
 */
export class DuplicateFormatError extends ExportError {
  constructor(format: string) {
    super({
      code: ExportErrorCode.DuplicateFormat,
      message: `format "${format}" already registered`,
      details: { format },
    });
    this.name = 'DuplicateFormatError';
  }
}

/**
 * Compression mode outside none, gzip, zip, zstd, lz4.
 */
export class UnsupportedCompressionError extends ExportError {
  constructor(compression: string) {
    super({
      code: ExportErrorCode.UnsupportedCompression,
      message: `unsupported compression type "${compression}"`,
      details: { compression },
    });
    this.name = 'UnsupportedCompressionError';
  }
}

/**
 * Query rejected by the read-only safety check.
 */
export class InvalidQueryError extends ExportError {
  constructor(reason: string) {
    super({
      code: ExportErrorCode.InvalidQuery,
      message: reason,
    });
    this.name = 'InvalidQueryError';
  }
}

// ============================================================================
// Output Errors
// ============================================================================

/**
 * Sink operation that failed.
 */
export type SinkOperation = 'create' | 'write' | 'close';

/**
 * Output sink failure.
 */
export class SinkError extends ExportError {
  /** Failed operation */
  readonly operation: SinkOperation;

  constructor(operation: SinkOperation, path: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super({
      code: ExportErrorCode.SinkFailed,
      message: `failed to ${operation} output "${path}"${reason}`,
      details: { operation, path },
      cause,
    });
    this.name = 'SinkError';
    this.operation = operation;
  }
}

// ============================================================================
// Row Errors
// ============================================================================

/**
 * Failure while reading, formatting or writing one row.
 */
export class RowExportError extends ExportError {
  /** 1-based index of the failing row */
  readonly rowIndex: number;

  constructor(rowIndex: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: ExportErrorCode.RowFailed,
      message: `error writing row ${rowIndex}: ${reason}`,
      details: { rowIndex },
      cause,
    });
    this.name = 'RowExportError';
    this.rowIndex = rowIndex;
  }
}

/**
 * A value could not be encoded in the target format.
 */
export class EncodeError extends ExportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ExportErrorCode.EncodeFailed,
      message,
      details,
    });
    this.name = 'EncodeError';
  }
}

/**
 * Cursor reported a fault, either mid-iteration or after exhaustion.
 */
export class CursorError extends ExportError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: ExportErrorCode.CursorFailed,
      message: `error iterating rows: ${reason}`,
      cause,
    });
    this.name = 'CursorError';
  }
}

// ============================================================================
// Format Errors
// ============================================================================

/**
 * Template could not be read, parsed or rendered.
 */
export class TemplateError extends ExportError {
  constructor(message: string, cause?: unknown) {
    super({
      code: ExportErrorCode.TemplateFailed,
      message,
      cause,
    });
    this.name = 'TemplateError';
  }
}

/**
 * COPY TO STDOUT failed.
 */
export class CopyError extends ExportError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: ExportErrorCode.CopyFailed,
      message: `COPY TO STDOUT failed: ${reason}`,
      cause,
    });
    this.name = 'CopyError';
  }
}

// ============================================================================
// Database Errors
// ============================================================================

/**
 * Could not reach the database.
 */
export class ConnectionFailedError extends ExportError {
  constructor(host: string, port: number, cause?: unknown) {
    super({
      code: ExportErrorCode.ConnectionFailed,
      message: `Failed to connect to PostgreSQL at ${host}:${port}`,
      details: { host, port },
      cause,
    });
    this.name = 'ConnectionFailedError';
  }
}

/**
 * Query execution failed on the server.
 */
export class QueryFailedError extends ExportError {
  /** SQLSTATE code (if reported by PostgreSQL) */
  readonly sqlState?: string;

  constructor(message: string, sqlState?: string, cause?: unknown) {
    super({
      code: ExportErrorCode.QueryFailed,
      message: `Query execution failed: ${message}`,
      details: sqlState ? { sqlState } : undefined,
      cause,
    });
    this.name = 'QueryFailedError';
    this.sqlState = sqlState;
  }
}

/**
 * Query returned no rows while empty results are not allowed.
 */
export class EmptyResultError extends ExportError {
  constructor() {
    super({
      code: ExportErrorCode.EmptyResult,
      message: 'export failed: query returned 0 rows',
    });
    this.name = 'EmptyResultError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Checks if an error is an export error.
 */
export function isExportError(error: unknown): error is ExportError {
  return error instanceof ExportError;
}

/**
 * Normalizes a thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Wraps a driver error, keeping its SQLSTATE when present.
 */
export function parseDriverError(error: unknown): ExportError {
  if (isExportError(error)) {
    return error;
  }
  const err = toError(error);
  const sqlState = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  return new QueryFailedError(err.message, sqlState, err);
}
