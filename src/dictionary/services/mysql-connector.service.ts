import { Injectable, Logger } from '@nestjs/common';
import { ConnectionOptions, ResultSetHeader, RowDataPacket } from 'mysql2';
import { Connection, createConnection } from 'mysql2/promise';

import { ConnectionParameters } from '../interfaces/config.interface';
import {
  SqlConnection,
  SqlConnector,
  SqlRow,
  SqlValue,
  WriteResult,
} from '../interfaces/database.interface';

export const BUILT_IN_AUTH_PLUGINS = [
  'caching_sha2_password',
  'mysql_native_password',
  'sha256_password',
  'mysql_clear_password',
] as const;

type AuthPlugins = NonNullable<ConnectionOptions['authPlugins']>;

/**
 * mysql2 negotiates whichever plugin the server asks for. Replacing every
 * other built-in plugin with one that refuses pins the session to the
 * configured auth mode.
 */
export function restrictAuthPlugins(authMode: string): AuthPlugins {
  return Object.fromEntries(
    BUILT_IN_AUTH_PLUGINS.filter((plugin) => plugin !== authMode).map(
      (plugin): [string, AuthPlugins[string]] => [
        plugin,
        () => () => {
          throw new Error(`Server requested ${plugin} authentication but ${authMode} is configured`);
        },
      ],
    ),
  );
}

export function toConnectionOptions(params: Readonly<ConnectionParameters>): ConnectionOptions {
  return {
    host: params.host,
    port: params.port,
    user: params.user,
    password: params.password,
    database: params.database,
    authPlugins: restrictAuthPlugins(params.authMode),
  };
}

export class MysqlConnection implements SqlConnection {
  constructor(private readonly connection: Connection) {}

  async select(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    if (params.length === 0) {
      const [rows] = await this.connection.query<RowDataPacket[]>(sql);
      return rows;
    }
    const [rows] = await this.connection.execute<RowDataPacket[]>(sql, params);
    return rows;
  }

  async run(sql: string, params: SqlValue[]): Promise<WriteResult> {
    const [result] = await this.connection.execute<ResultSetHeader>(sql, params);
    return { affectedRows: result.affectedRows };
  }

  async commit(): Promise<void> {
    await this.connection.commit();
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}

@Injectable()
export class MysqlConnectorService extends SqlConnector {
  private readonly logger = new Logger(MysqlConnectorService.name);

  async connect(params: Readonly<ConnectionParameters>): Promise<SqlConnection> {
    this.logger.debug(
      `Connecting to ${params.user}@${params.host}:${params.port}/${params.database} (${params.authMode})`,
    );
    const connection = await createConnection(toConnectionOptions(params));
    return new MysqlConnection(connection);
  }
}
