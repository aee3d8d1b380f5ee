/**
 * Error Classes for sheet-join
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Reconciliation errors (2xxx)
  RECONCILE_MISSING_COLUMN = "E2001",
  RECONCILE_KEY_COLUMN_CONFLICT = "E2002",
  RECONCILE_EMPTY_RESULT = "E2003",

  // Spreadsheet errors (3xxx)
  SPREADSHEET_UNREADABLE = "E3000",
  SPREADSHEET_NO_WORKSHEET = "E3001",
  SPREADSHEET_WRITE_FAILED = "E3002",

  // Request errors (4xxx)
  REQUEST_INVALID = "E4000",
  REQUEST_MISSING_FIELD = "E4001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  FILE_SYSTEM_ERROR = "E9002",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all sheet-join errors
 */
export class SheetJoinError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SheetJoinError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * A join key column named by the caller is not a column of its row-set
 */
export class MissingColumnError extends SheetJoinError {
  public readonly column: string;
  public readonly available: string[];

  constructor(column: string, available: string[], context?: Record<string, unknown>) {
    super(
      `Column "${column}" does not exist. Available columns: ${available.join(", ") || "(none)"}`,
      ErrorCode.RECONCILE_MISSING_COLUMN,
      { ...context, column, available }
    );
    this.name = "MissingColumnError";
    this.column = column;
    this.available = available;
  }
}

/**
 * The reserved key column name is already taken by another column
 */
export class KeyColumnConflictError extends SheetJoinError {
  public readonly keyColumnName: string;

  constructor(keyColumnName: string, sourceColumn: string, context?: Record<string, unknown>) {
    super(
      `Cannot rename "${sourceColumn}" to "${keyColumnName}": a column named "${keyColumnName}" already exists`,
      ErrorCode.RECONCILE_KEY_COLUMN_CONFLICT,
      { ...context, keyColumnName, sourceColumn }
    );
    this.name = "KeyColumnConflictError";
    this.keyColumnName = keyColumnName;
  }
}

/**
 * No primary row survived the common-key filter
 */
export class EmptyResultError extends SheetJoinError {
  constructor(message: string = "No matching records found in the first file", context?: Record<string, unknown>) {
    super(message, ErrorCode.RECONCILE_EMPTY_RESULT, context);
    this.name = "EmptyResultError";
  }
}

/**
 * Spreadsheet payload errors
 */
export class SpreadsheetError extends SheetJoinError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SPREADSHEET_UNREADABLE,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "SpreadsheetError";
  }
}

/**
 * Malformed HTTP requests
 */
export class RequestError extends SheetJoinError {
  public readonly field?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.REQUEST_INVALID,
    context?: Record<string, unknown> & { field?: string }
  ) {
    super(message, code, context);
    this.name = "RequestError";
    this.field = context?.field;
  }
}

/**
 * Invalid configuration values
 */
export class ConfigurationError extends SheetJoinError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, { ...context, issues });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Errors that stem from the caller's input and are reported to them as-is
 */
export function isReconciliationError(
  error: unknown
): error is MissingColumnError | KeyColumnConflictError | EmptyResultError {
  return (
    error instanceof MissingColumnError ||
    error instanceof KeyColumnConflictError ||
    error instanceof EmptyResultError
  );
}

/**
 * Check if an error is a SheetJoinError
 */
export function isSheetJoinError(error: unknown): error is SheetJoinError {
  return error instanceof SheetJoinError;
}

/**
 * Wrap an unknown error in a SheetJoinError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): SheetJoinError {
  if (isSheetJoinError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SheetJoinError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new SheetJoinError(typeof error === "string" ? error : defaultMessage, code);
}
