/**
 * Application error types
 * Each error type maps to an HTTP status code and a stable machine-readable code
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Malformed ledger or catalog input (400 Bad Request)
 * Nothing has been written when this is raised
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly issues: FieldIssue[] = []
  ) {
    super(message, 'VALIDATION_ERROR', 400, issues.length > 0 ? { issues } : undefined);
  }
}

/**
 * CSV import could not locate its required columns, or the upload was not tabular
 * (422 Unprocessable Entity). The whole import is aborted before any row is read.
 */
export class ImportHeaderError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'IMPORT_HEADER_ERROR', 422, details);
  }
}

/**
 * Configuration errors - fail fast on startup
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly issues: FieldIssue[] = []
  ) {
    super(message, 'CONFIG_ERROR', 500, issues.length > 0 ? { issues } : undefined);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
