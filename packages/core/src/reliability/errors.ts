/**
 * Error Taxonomy
 *
 * Standard error types for the recorder statistics toolkit.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error maps to a CLI exit code
 * - Row-level import problems are NOT errors; they are collected as
 *   validation records (see import/types.ts) and never thrown
 *
 * @module @recstat/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes
 */
export type RecorderErrorCode =
  // Input errors
  | 'UNKNOWN_TABLE'
  | 'CSV_STRUCTURE'
  | 'INVALID_OPTION'

  // Execution errors
  | 'EXECUTION_FAILED'
  | 'DATABASE_UNAVAILABLE'

  // Internal errors
  | 'CONFIGURATION_ERROR'
  | 'UNHANDLED_ERROR';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Recorder error options
 */
export interface RecorderErrorOptions {
  /** Error code */
  code: RecorderErrorCode;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base error class
 *
 * All toolkit errors extend this for consistent handling.
 */
export class RecorderError extends Error {
  readonly code: RecorderErrorCode;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;

  constructor(message: string, options: RecorderErrorOptions) {
    super(message);
    this.name = 'RecorderError';
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause?.message,
    };
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * Unknown table - a table name outside the schema catalog was requested
 */
export class UnknownTableError extends RecorderError {
  readonly tableName: string;

  constructor(tableName: string) {
    super(`Unknown table: ${tableName}`, {
      code: 'UNKNOWN_TABLE',
      context: { tableName },
    });
    this.name = 'UnknownTableError';
    this.tableName = tableName;
  }
}

/**
 * CSV structure error - the file cannot be read as a header plus
 * equally-sized records, so no row of it is imported
 */
export class CsvStructureError extends RecorderError {
  readonly line?: number;

  constructor(message: string, options?: { line?: number; cause?: Error }) {
    super(message, {
      code: 'CSV_STRUCTURE',
      context: options?.line !== undefined ? { line: options.line } : undefined,
      cause: options?.cause,
    });
    this.name = 'CsvStructureError';
    this.line = options?.line;
  }
}

/**
 * Execution failure - a mutation failed while applying an import.
 * The surrounding transaction has been rolled back.
 */
export class ExecutionFailedError extends RecorderError {
  /** Position of the failing intent in the execution order */
  readonly intentIndex: number;
  /** CSV line the intent came from */
  readonly line: number;
  /** Underlying database error text */
  readonly databaseError: string;

  constructor(
    intentIndex: number,
    line: number,
    databaseError: string,
    options?: { statement?: string; cause?: Error }
  ) {
    super(
      `Import aborted at intent #${intentIndex} (line ${line}): ${databaseError}. No changes were committed.`,
      {
        code: 'EXECUTION_FAILED',
        context: { intentIndex, line, statement: options?.statement },
        cause: options?.cause,
      }
    );
    this.name = 'ExecutionFailedError';
    this.intentIndex = intentIndex;
    this.line = line;
    this.databaseError = databaseError;
  }
}

/**
 * Database unavailable - the recorder database could not be opened
 */
export class DatabaseUnavailableError extends RecorderError {
  readonly path: string;

  constructor(path: string, cause?: Error) {
    super(`Database connection failed for ${path}: ${cause?.message ?? 'unknown error'}`, {
      code: 'DATABASE_UNAVAILABLE',
      context: { path },
      cause,
    });
    this.name = 'DatabaseUnavailableError';
    this.path = path;
  }
}

/**
 * Configuration error - bad config file, URL or option value
 */
export class ConfigurationError extends RecorderError {
  readonly issues?: string[];

  constructor(message: string, options?: { issues?: string[]; code?: RecorderErrorCode }) {
    super(message, {
      code: options?.code ?? 'CONFIGURATION_ERROR',
      context: options?.issues ? { issues: options.issues } : undefined,
    });
    this.name = 'ConfigurationError';
    this.issues = options?.issues;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Map error to CLI exit code
 */
export function toExitCode(error: unknown): number {
  if (!(error instanceof RecorderError)) {
    return 1;
  }

  switch (error.code) {
    // Input errors (20-29)
    case 'UNKNOWN_TABLE':
      return 20;
    case 'CSV_STRUCTURE':
      return 21;
    case 'INVALID_OPTION':
      return 22;

    // Execution errors (30-39)
    case 'EXECUTION_FAILED':
      return 30;
    case 'DATABASE_UNAVAILABLE':
      return 31;

    // Internal errors (40-49)
    case 'CONFIGURATION_ERROR':
      return 40;
    case 'UNHANDLED_ERROR':
      return 41;

    default:
      return 1;
  }
}

/**
 * Wrap any error as a RecorderError
 */
export function wrapError(error: unknown, code: RecorderErrorCode = 'UNHANDLED_ERROR'): RecorderError {
  if (error instanceof RecorderError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new RecorderError(message, { code, cause });
}
