import { ConnectionParameters } from './config.interface';

export type SqlValue = string | number | null;

export type SqlRow = Record<string, unknown>;

export interface WriteResult {
  affectedRows: number;
}

export interface WordRecord {
  word: string;
}

/**
 * One open database session. Statements run one at a time; writes are not
 * visible to other sessions until `commit` is called.
 */
export interface SqlConnection {
  select(sql: string, params?: SqlValue[]): Promise<SqlRow[]>;
  run(sql: string, params: SqlValue[]): Promise<WriteResult>;
  commit(): Promise<void>;
  close(): Promise<void>;
}

export abstract class SqlConnector {
  abstract connect(params: Readonly<ConnectionParameters>): Promise<SqlConnection>;
}
