import { Command, CommandRunner, Option } from 'nest-commander';

import { DictionaryShellService } from './dictionary-shell.service';
import { DictionaryCommandOptions, isLoginMode, LOGIN_MODES, LoginMode } from './types/dictionary.types';

@Command({
  name: 'dictionary',
  description: 'Look up a word in the dictionary database, then add it or correct its spelling',
  options: { isDefault: true },
})
export class DictionaryCommand extends CommandRunner {
  constructor(private readonly shell: DictionaryShellService) {
    super();
  }

  async run(
    passedParams: string[],
    options: DictionaryCommandOptions = {},
  ): Promise<void> {
    process.exitCode = await this.shell.run({
      file: options.file,
      login: options.login ?? 'prompt',
    });
  }

  @Option({
    flags: '-f, --file <path>',
    description: 'Environment file of MYSQL_* KEY=value pairs (default: ./default.env)',
  })
  parseFile(val: string): string {
    return val;
  }

  @Option({
    flags: '-l, --login <mode>',
    description: `How to ask for credentials: ${LOGIN_MODES.join(', ')} (default: prompt)`,
  })
  parseLogin(val: string): LoginMode {
    if (!isLoginMode(val)) {
      throw new Error(`Unknown login mode "${val}", expected one of: ${LOGIN_MODES.join(', ')}`);
    }
    return val;
  }
}
