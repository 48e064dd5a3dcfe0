import { driverError } from '../../../test/fakes/in-memory-connection';
import { classifyConnectionError } from './connection-failure';
import {
  AccessDeniedError,
  DatabaseNotFoundError,
  exitCodeFor,
  IncorrectCredentialsError,
  InvalidPortError,
  QueryExecutionError,
  UserCancellationError,
} from './dictionary.errors';

describe('classifyConnectionError', () => {
  it('maps rejected credentials to IncorrectCredentialsError', () => {
    const raw = driverError(
      'ER_ACCESS_DENIED_ERROR',
      1045,
      "Access denied for user 'root'@'localhost' (using password: YES)",
    );

    const failure = classifyConnectionError(raw);

    expect(failure).toBeInstanceOf(IncorrectCredentialsError);
    expect(failure?.message).toBe('Could not log in to host with user/password provided.');
    expect(failure?.cause).toBe(raw);
  });

  it('keeps the driver message for a database privilege failure', () => {
    const failure = classifyConnectionError(
      driverError('ER_DBACCESS_DENIED_ERROR', 1044, "Access denied for user 'editor'@'%' to database 'lexicon'"),
    );

    expect(failure).toBeInstanceOf(AccessDeniedError);
    expect(failure?.kind).toBe('access-denied');
    expect(failure?.message).toBe("Access denied for user 'editor'@'%' to database 'lexicon'");
  });

  it('maps an unknown database to DatabaseNotFoundError', () => {
    const failure = classifyConnectionError(
      driverError('ER_BAD_DB_ERROR', 1049, "Unknown database 'lexicon'"),
    );

    expect(failure).toBeInstanceOf(DatabaseNotFoundError);
    expect(failure?.message).toBe("Unknown database 'lexicon'");
  });

  it.each([
    ['another driver code', driverError('ECONNREFUSED', -111, 'connect ECONNREFUSED 127.0.0.1:3306')],
    ['an error without a code', new Error('socket hang up')],
    ['a non-error value', 'boom'],
  ])('leaves %s unclassified', (_label, error) => {
    expect(classifyConnectionError(error)).toBeNull();
  });
});

describe('exitCodeFor', () => {
  it('treats cancellation and rejected credentials as expected exits', () => {
    expect(exitCodeFor(new UserCancellationError())).toBe(0);
    expect(exitCodeFor(new IncorrectCredentialsError())).toBe(0);
  });

  it('fails every other error', () => {
    expect(exitCodeFor(new DatabaseNotFoundError("Unknown database 'x'"))).toBe(1);
    expect(exitCodeFor(new AccessDeniedError('denied'))).toBe(1);
    expect(exitCodeFor(new InvalidPortError('abc'))).toBe(1);
    expect(exitCodeFor(new QueryExecutionError('insert', new Error('gone')))).toBe(1);
    expect(exitCodeFor(new Error('unexpected'))).toBe(1);
  });
});
