import { ConnectionField, ConnectionParameters } from '../interfaces/config.interface';

export const CONNECTION_DEFAULTS = Symbol('CONNECTION_DEFAULTS');

export const DEFAULT_CONNECTION_PARAMETERS: Readonly<ConnectionParameters> = Object.freeze({
  host: 'localhost',
  port: 3306,
  user: 'root',
  password: 'password',
  database: 'dictionary',
  authMode: 'caching_sha2_password',
});

// Environment variable names double as the keys of a config file.
export const CONFIG_KEY_MAP: Readonly<Record<ConnectionField, string>> = Object.freeze({
  host: 'MYSQL_HOST',
  port: 'MYSQL_PORT',
  user: 'MYSQL_USER',
  password: 'MYSQL_PASSWORD',
  database: 'MYSQL_DATABASE',
  authMode: 'MYSQL_AUTH',
});

export const CONNECTION_FIELDS: readonly ConnectionField[] = [
  'host',
  'port',
  'user',
  'password',
  'database',
  'authMode',
];

export const DEFAULT_ENV_FILE = 'default.env';
