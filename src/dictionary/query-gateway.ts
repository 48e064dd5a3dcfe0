import { Logger } from '@nestjs/common';

import { QUERIES } from './constants/query-templates';
import {
  ConnectionUnverifiedError,
  GatewayOperation,
  QueryExecutionError,
} from './errors/dictionary.errors';
import { SqlConnection, SqlRow, SqlValue, WordRecord } from './interfaces/database.interface';
import { Terminal } from './services/terminal.service';

/**
 * Bound-parameter statements over one open connection. Every write commits
 * on its own; nothing spans two calls.
 */
export class QueryGateway {
  private readonly logger = new Logger(QueryGateway.name);

  private constructor(private readonly connection: SqlConnection) {}

  static async open(connection: SqlConnection, terminal: Terminal): Promise<QueryGateway> {
    const gateway = new QueryGateway(connection);
    const version = await gateway.serverVersion();
    terminal.print(`MySQL v${version}`);
    return gateway;
  }

  async select(word: string): Promise<WordRecord | null> {
    const rows = await this.attempt('select', () =>
      this.connection.select(QUERIES.SELECT_WORD, [word]),
    );
    return rows.map(toWordRecord).find((record) => record !== null) ?? null;
  }

  async insert(newWord: string): Promise<void> {
    await this.write('insert', QUERIES.INSERT_WORD, [newWord]);
  }

  async update(word: string, newWord: string): Promise<void> {
    await this.write('update', QUERIES.UPDATE_WORD, [newWord, word]);
  }

  async delete(word: string): Promise<void> {
    await this.write('delete', QUERIES.DELETE_WORD, [word]);
  }

  private async serverVersion(): Promise<string> {
    let rows: SqlRow[];
    try {
      rows = await this.connection.select(QUERIES.VERSION);
    } catch (error) {
      throw new ConnectionUnverifiedError(error);
    }

    const value = rows[0]?.Value;
    if (typeof value !== 'string' || value === '') {
      throw new ConnectionUnverifiedError();
    }
    return value;
  }

  private async write(operation: GatewayOperation, sql: string, params: SqlValue[]): Promise<void> {
    await this.attempt(operation, async () => {
      const { affectedRows } = await this.connection.run(sql, params);
      await this.connection.commit();
      this.logger.debug(`${operation} committed (${affectedRows} row(s))`);
    });
  }

  private async attempt<T>(operation: GatewayOperation, statement: () => Promise<T>): Promise<T> {
    try {
      return await statement();
    } catch (error) {
      throw new QueryExecutionError(operation, error);
    }
  }
}

function toWordRecord(row: SqlRow): WordRecord | null {
  return typeof row.word === 'string' ? { word: row.word } : null;
}
