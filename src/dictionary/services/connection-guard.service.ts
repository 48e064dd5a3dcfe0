import { Injectable, Logger } from '@nestjs/common';

import { classifyConnectionError } from '../errors/connection-failure';
import { ConnectionParameters } from '../interfaces/config.interface';
import { SqlConnection, SqlConnector } from '../interfaces/database.interface';
import { Terminal } from './terminal.service';

@Injectable()
export class ConnectionGuardService {
  private readonly logger = new Logger(ConnectionGuardService.name);

  constructor(
    private readonly connector: SqlConnector,
    private readonly terminal: Terminal,
  ) {}

  async acquire(params: Readonly<ConnectionParameters>): Promise<SqlConnection> {
    let connection: SqlConnection;
    try {
      connection = await this.connector.connect(params);
    } catch (error) {
      const failure = classifyConnectionError(error);
      if (failure) {
        this.logger.debug(`Connection refused: ${failure.kind}`);
        throw failure;
      }
      throw error;
    }

    this.terminal.print('Connected successfully.');
    return connection;
  }

  async release(connection: SqlConnection): Promise<void> {
    try {
      await connection.close();
    } finally {
      this.terminal.print('\nConnection closed.');
    }
  }

  /**
   * Runs `work` against a freshly opened connection and closes it exactly
   * once however `work` ends, including on user cancellation.
   */
  async withConnection<T>(
    params: Readonly<ConnectionParameters>,
    work: (connection: SqlConnection) => Promise<T>,
  ): Promise<T> {
    const connection = await this.acquire(params);
    let result: T;
    try {
      result = await work(connection);
    } catch (error) {
      await this.release(connection).catch((closeError: unknown) => {
        this.logger.warn(
          `Closing the connection failed: ${closeError instanceof Error ? closeError.message : String(closeError)}`,
        );
      });
      throw error;
    }
    await this.release(connection);
    return result;
  }
}
