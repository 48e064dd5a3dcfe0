import { Injectable, Logger } from '@nestjs/common';

import { exitCodeFor, UserCancellationError } from './errors/dictionary.errors';
import { QueryGateway } from './query-gateway';
import { ConfigResolverService } from './services/config-resolver.service';
import { ConnectionGuardService } from './services/connection-guard.service';
import { LoginService } from './services/login.service';
import { Terminal } from './services/terminal.service';
import { ShellOptions } from './types/dictionary.types';

const TITLE = '# ========== Dictionary ========== #';
const INSTRUCTIONS = '# Press CTRL+C to quit.';

const YES = ['y', 'yes'];
const NO = ['n', 'no'];

@Injectable()
export class DictionaryShellService {
  private readonly logger = new Logger(DictionaryShellService.name);

  constructor(
    private readonly resolver: ConfigResolverService,
    private readonly loginService: LoginService,
    private readonly guard: ConnectionGuardService,
    private readonly terminal: Terminal,
  ) {}

  /**
   * Runs the session until the user cancels or something fails, and returns
   * the process exit code. The connection is released before anything is
   * reported.
   */
  async run(options: ShellOptions): Promise<number> {
    this.terminal.open();
    try {
      this.terminal.print(TITLE);
      this.terminal.print(INSTRUCTIONS);

      const resolved = await this.resolver.load(options.file, options.cwd);
      const credentials = await this.loginService.login(resolved, options.login);

      await this.guard.withConnection(credentials, async (connection) => {
        const gateway = await QueryGateway.open(connection, this.terminal);
        for (;;) {
          this.terminal.throwIfCancelled();
          await this.step(gateway);
        }
      });
      return 0;
    } catch (error) {
      return this.exit(error);
    } finally {
      this.terminal.close();
    }
  }

  async step(gateway: QueryGateway): Promise<void> {
    const term = (await this.terminal.ask('What word do you want to add/change: ')).trim();
    if (term === '') {
      return;
    }

    const found = await gateway.select(term);

    if (found === null) {
      const addNew = await this.confirm(
        `'${term}' not found. Would you like to add it to the dictionary?\n[y/n] `,
      );
      if (addNew) {
        await gateway.insert(term);
        this.terminal.print(`${term} added to the dictionary.`);
      }
      return;
    }

    const update = await this.confirm(
      `Found: ${found.word}. Would you like to update this word?\n[y/n] `,
    );
    if (update) {
      const newWord = await this.askReplacement(found.word);
      await gateway.update(found.word, newWord);
      this.terminal.print(`Updated ${found.word} to ${newWord}`);
    }
  }

  async confirm(prompt: string): Promise<boolean> {
    for (;;) {
      const answer = (await this.terminal.ask(prompt)).trim().toLowerCase();
      if (YES.includes(answer)) {
        return true;
      }
      if (NO.includes(answer)) {
        return false;
      }
      this.terminal.print("Please answer 'y' or 'yes' for yes, or 'n' or 'no' for no.");
    }
  }

  private async askReplacement(word: string): Promise<string> {
    for (;;) {
      const answer = (await this.terminal.ask(`Update ${word} as: `)).trim();
      if (answer !== '') {
        return answer;
      }
      this.terminal.print('Word cannot be empty.');
    }
  }

  private exit(error: unknown): number {
    const code = exitCodeFor(error);

    if (error instanceof UserCancellationError) {
      this.terminal.print('\nExiting.');
      return code;
    }

    if (error instanceof Error) {
      this.logger.debug(error.stack ?? error.message);
    }
    const message = error instanceof Error ? error.message : String(error);
    this.terminal.print(`${message}\nExiting.`);
    return code;
  }
}
