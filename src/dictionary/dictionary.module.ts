import { Module } from '@nestjs/common';

import { CONNECTION_DEFAULTS, DEFAULT_CONNECTION_PARAMETERS } from './constants/connection-defaults';
import { DictionaryCommand } from './dictionary.command';
import { DictionaryShellService } from './dictionary-shell.service';
import { SqlConnector } from './interfaces/database.interface';
import { ConfigResolverService } from './services/config-resolver.service';
import { ConnectionGuardService } from './services/connection-guard.service';
import { LoginService } from './services/login.service';
import { MysqlConnectorService } from './services/mysql-connector.service';
import { ReadlineTerminal, Terminal } from './services/terminal.service';

@Module({
  providers: [
    DictionaryCommand,
    DictionaryShellService,
    ConfigResolverService,
    LoginService,
    ConnectionGuardService,
    { provide: CONNECTION_DEFAULTS, useValue: DEFAULT_CONNECTION_PARAMETERS },
    { provide: SqlConnector, useClass: MysqlConnectorService },
    { provide: Terminal, useClass: ReadlineTerminal },
  ],
})
export class DictionaryModule {}
