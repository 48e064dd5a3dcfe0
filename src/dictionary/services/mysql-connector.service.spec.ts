import { DEFAULT_CONNECTION_PARAMETERS } from '../constants/connection-defaults';
import { restrictAuthPlugins, toConnectionOptions } from './mysql-connector.service';

describe('restrictAuthPlugins', () => {
  it('replaces every built-in plugin except the configured one', () => {
    expect(Object.keys(restrictAuthPlugins('caching_sha2_password')).sort()).toEqual([
      'mysql_clear_password',
      'mysql_native_password',
      'sha256_password',
    ]);
  });

  it('refuses every built-in plugin for an unknown auth mode', () => {
    expect(Object.keys(restrictAuthPlugins('kerberos'))).toHaveLength(4);
  });
});

describe('toConnectionOptions', () => {
  it('passes the connection parameters through to mysql2', () => {
    expect(toConnectionOptions(DEFAULT_CONNECTION_PARAMETERS)).toMatchObject({
      host: 'localhost',
      port: 3306,
      user: 'root',
      password: 'password',
      database: 'dictionary',
    });
  });
});
