/**
 * Error taxonomy for the measurement store.
 *
 * Lookups that find nothing return `undefined`; absence is not an error.
 */

export type StoreErrorCode =
  | 'VALIDATION'
  | 'REFERENTIAL_INTEGRITY'
  | 'PARSE'
  | 'CONFIGURATION';

export class MeasurementStoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MeasurementStoreError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * A required field was missing or malformed
 */
export class ValidationError extends MeasurementStoreError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, 'VALIDATION', options);
    this.name = 'ValidationError';
  }
}

/**
 * A write referenced a parent row that does not exist
 */
export class ReferentialIntegrityError extends MeasurementStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'REFERENTIAL_INTEGRITY', options);
    this.name = 'ReferentialIntegrityError';
  }
}

/**
 * A filename or file did not match the expected convention
 */
export class ParseError extends MeasurementStoreError {
  constructor(
    message: string,
    public readonly file: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'PARSE', options);
    this.name = 'ParseError';
  }
}

/**
 * The store could not be opened or configured
 */
export class ConfigurationError extends MeasurementStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

interface SqliteErrorLike {
  code: string;
  message?: unknown;
}

// Matched by shape: the native driver may raise its error class from another realm
function isSqliteError(error: unknown): error is SqliteErrorLike {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_')
  );
}

/**
 * Translate SQLite constraint failures into the store's error types.
 * Anything else is returned untouched.
 */
export function translateSqliteError(error: unknown, context: string): unknown {
  if (!isSqliteError(error)) {
    return error;
  }

  if (error.code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
    return new ReferentialIntegrityError(
      `${context}: referenced parent row does not exist`,
      { cause: error },
    );
  }

  if (error.code === 'SQLITE_CONSTRAINT_NOTNULL') {
    const detail = typeof error.message === 'string' ? error.message : error.code;
    return new ValidationError(`${context}: ${detail}`, [], { cause: error });
  }

  return error;
}
