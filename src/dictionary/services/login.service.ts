import { Injectable } from '@nestjs/common';

import { ConnectionParameters, RawConnectionParameters } from '../interfaces/config.interface';
import { LoginMode } from '../types/dictionary.types';
import { ConfigResolverService } from './config-resolver.service';
import { Terminal } from './terminal.service';

const PROMPTS = {
  host: 'What host to connect to',
  port: 'What port to connect to',
  user: 'What user to connect to',
  password: 'What password to connect with: ',
} as const;

@Injectable()
export class LoginService {
  constructor(
    private readonly resolver: ConfigResolverService,
    private readonly terminal: Terminal,
  ) {}

  /**
   * Lets the user override the resolved host, port, user and password. A
   * blank answer keeps the resolved value.
   */
  async login(
    resolved: Readonly<ConnectionParameters>,
    mode: LoginMode,
  ): Promise<Readonly<ConnectionParameters>> {
    switch (mode) {
      case 'none':
        return resolved;
      case 'auto':
        return this.autoLogin(resolved);
      case 'prompt':
        return this.promptLogin(resolved);
    }
  }

  private async promptLogin(
    resolved: Readonly<ConnectionParameters>,
  ): Promise<Readonly<ConnectionParameters>> {
    const raw: RawConnectionParameters = { ...resolved };

    raw.host = await this.askOr(`${PROMPTS.host} (${resolved.host}): `, resolved.host);
    raw.port = await this.askOr(`${PROMPTS.port} (${resolved.port}): `, String(resolved.port));
    raw.user = await this.askOr(`${PROMPTS.user} (${resolved.user}): `, resolved.user);
    raw.password = await this.askPassword(resolved.password);

    return this.resolver.validate(raw);
  }

  private async autoLogin(
    resolved: Readonly<ConnectionParameters>,
  ): Promise<Readonly<ConnectionParameters>> {
    this.terminal.print(`${PROMPTS.host}: ${resolved.host}`);
    this.terminal.print(`${PROMPTS.port}: ${resolved.port}`);
    this.terminal.print(`${PROMPTS.user}: ${resolved.user}`);
    const password = await this.askPassword(resolved.password);

    return this.resolver.validate({ ...resolved, password });
  }

  private async askOr(question: string, fallback: string): Promise<string> {
    const answer = (await this.terminal.ask(question)).trim();
    return answer === '' ? fallback : answer;
  }

  private async askPassword(fallback: string): Promise<string> {
    const answer = await this.terminal.askHidden(PROMPTS.password);
    return answer === '' ? fallback : answer;
  }
}
