import {
  AccessDeniedError,
  ConnectionFailureError,
  DatabaseNotFoundError,
  IncorrectCredentialsError,
} from './dictionary.errors';

/**
 * The fields of a mysql2 `QueryError` the classifier reads.
 */
export interface DriverError extends Error {
  code: string;
  errno?: number;
  sqlMessage?: string;
}

export function isDriverError(error: unknown): error is DriverError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Maps a failed connection attempt to a ConnectionFailureError, or returns
 * null when the error is not one the CLI can explain; the caller rethrows
 * those untouched.
 */
export function classifyConnectionError(error: unknown): ConnectionFailureError | null {
  if (!isDriverError(error)) {
    return null;
  }

  const message = error.sqlMessage ?? error.message;

  switch (error.code) {
    case 'ER_ACCESS_DENIED_ERROR':
      return new IncorrectCredentialsError(error);
    case 'ER_DBACCESS_DENIED_ERROR':
      return new AccessDeniedError(message, error);
    case 'ER_BAD_DB_ERROR':
      return new DatabaseNotFoundError(message, error);
    default:
      return null;
  }
}
