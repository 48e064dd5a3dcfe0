export class DictionaryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Configuration

export class ConfigParseError extends DictionaryError {}

export class MalformedConfigLineError extends ConfigParseError {
  constructor(
    public readonly fileName: string,
    public readonly lineNumber: number,
    public readonly line: string,
  ) {
    super(
      `${fileName}:${lineNumber}: expected exactly one '=' in KEY=VALUE line, got "${line}"`,
      'MALFORMED_CONFIG_LINE',
    );
  }
}

export class MissingConfigKeyError extends ConfigParseError {
  constructor(
    public readonly fileName: string,
    public readonly key: string,
  ) {
    super(`${fileName}: missing required key ${key}`, 'MISSING_CONFIG_KEY');
  }
}

export class InvalidPortError extends ConfigParseError {
  constructor(public readonly value: string | number) {
    super(`Invalid port "${value}": must be an integer between 1 and 65535`, 'INVALID_PORT');
  }
}

export class EmptyParameterError extends ConfigParseError {
  constructor(public readonly field: string) {
    super(`Connection parameter "${field}" must not be empty`, 'EMPTY_PARAMETER');
  }
}

export class ConfigFileError extends ConfigParseError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Could not read environment file ${path}`, 'CONFIG_FILE_UNREADABLE', { cause });
  }
}

// Connection

export type ConnectionFailureKind = 'incorrect-credentials' | 'access-denied' | 'database-not-found';

export abstract class ConnectionFailureError extends DictionaryError {
  abstract readonly kind: ConnectionFailureKind;
}

export class IncorrectCredentialsError extends ConnectionFailureError {
  readonly kind = 'incorrect-credentials';

  constructor(cause?: unknown) {
    super('Could not log in to host with user/password provided.', 'INCORRECT_CREDENTIALS', {
      cause,
    });
  }
}

export class AccessDeniedError extends ConnectionFailureError {
  readonly kind = 'access-denied';

  constructor(message: string, cause?: unknown) {
    super(message, 'ACCESS_DENIED', { cause });
  }
}

export class DatabaseNotFoundError extends ConnectionFailureError {
  readonly kind = 'database-not-found';

  constructor(message: string, cause?: unknown) {
    super(message, 'DATABASE_NOT_FOUND', { cause });
  }
}

// Queries

export class QueryError extends DictionaryError {}

export class ConnectionUnverifiedError extends QueryError {
  constructor(cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Connection opened but the server version check failed${reason}`, 'CONNECTION_UNVERIFIED', {
      cause,
    });
  }
}

export type GatewayOperation = 'select' | 'insert' | 'update' | 'delete';

export class QueryExecutionError extends QueryError {
  constructor(
    public readonly operation: GatewayOperation,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} word: ${reason}`, 'QUERY_FAILED', { cause });
  }
}

// Session

export class UserCancellationError extends DictionaryError {
  constructor() {
    super('', 'USER_CANCELLED');
  }
}

export class InputClosedError extends DictionaryError {
  constructor() {
    super('Input stream closed', 'INPUT_CLOSED');
  }
}

/**
 * Cancellation and a rejected login are expected ways for a session to end.
 */
export function exitCodeFor(error: unknown): 0 | 1 {
  if (error instanceof UserCancellationError || error instanceof IncorrectCredentialsError) {
    return 0;
  }
  return 1;
}
