import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import {
  CONFIG_KEY_MAP,
  CONNECTION_DEFAULTS,
  CONNECTION_FIELDS,
  DEFAULT_ENV_FILE,
} from '../constants/connection-defaults';
import {
  ConfigFileError,
  EmptyParameterError,
  InvalidPortError,
  MalformedConfigLineError,
  MissingConfigKeyError,
} from '../errors/dictionary.errors';
import {
  ConfigFile,
  ConnectionParameters,
  EnvironmentSource,
  RawConnectionParameters,
} from '../interfaces/config.interface';
import { Terminal } from './terminal.service';

const portSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().min(1).max(65535));

const requiredText = z.string().min(1);

const connectionParametersSchema = z.object({
  host: requiredText,
  port: portSchema,
  user: requiredText,
  password: requiredText,
  database: requiredText,
  authMode: requiredText,
});

@Injectable()
export class ConfigResolverService {
  private readonly logger = new Logger(ConfigResolverService.name);

  constructor(
    @Inject(CONNECTION_DEFAULTS) private readonly defaults: Readonly<ConnectionParameters>,
    private readonly terminal: Terminal,
  ) {}

  /**
   * Picks the config source the way the CLI advertises it: an explicit file,
   * then `default.env` in the working directory, then the environment.
   */
  async load(filePath?: string, cwd: string = process.cwd()): Promise<Readonly<ConnectionParameters>> {
    if (filePath) {
      this.terminal.print(`Loading env from ${filePath}`);
      return this.resolve(await this.readConfigFile(filePath));
    }

    const defaultPath = path.join(cwd, DEFAULT_ENV_FILE);
    if (fs.existsSync(defaultPath)) {
      this.terminal.print('Loading default env from file.');
      return this.resolve(await this.readConfigFile(defaultPath));
    }

    this.terminal.print('Loading environment variables.');
    return this.resolve();
  }

  resolve(
    file?: ConfigFile,
    env: NodeJS.ProcessEnv = process.env,
  ): Readonly<ConnectionParameters> {
    const { source, raw } = file ? this.fromFile(file) : this.fromEnvironment(env);
    this.logger.debug(`Resolved connection parameters from ${source}`);
    return this.validate(raw);
  }

  validate(raw: RawConnectionParameters): Readonly<ConnectionParameters> {
    const result = connectionParametersSchema.safeParse(raw);

    if (!result.success) {
      const issue = result.error.issues[0];
      const field = String(issue?.path[0] ?? 'unknown');
      if (field === 'port') {
        throw new InvalidPortError(raw.port);
      }
      throw new EmptyParameterError(field);
    }

    return Object.freeze(result.data);
  }

  parseEnvFile(file: ConfigFile): Map<string, string> {
    const entries = new Map<string, string>();

    file.contents.split(/\r?\n/).forEach((line, index) => {
      const trimmed = line.trim();
      if (trimmed === '' || trimmed.startsWith('#')) {
        return;
      }

      const parts = trimmed.split('=');
      if (parts.length !== 2) {
        throw new MalformedConfigLineError(file.name, index + 1, trimmed);
      }

      const [key, value] = parts;
      entries.set(key.trim(), value.trim());
    });

    return entries;
  }

  private fromFile(file: ConfigFile): { source: EnvironmentSource; raw: RawConnectionParameters } {
    const entries = this.parseEnvFile(file);

    const lookup = (field: keyof RawConnectionParameters): string => {
      const key = CONFIG_KEY_MAP[field];
      const value = entries.get(key);
      if (value === undefined) {
        throw new MissingConfigKeyError(file.name, key);
      }
      return value;
    };

    return {
      source: 'explicit-file',
      raw: {
        host: lookup('host'),
        port: lookup('port'),
        user: lookup('user'),
        password: lookup('password'),
        database: lookup('database'),
        authMode: lookup('authMode'),
      },
    };
  }

  // All six variables or none: a partial environment falls back to the
  // defaults wholesale.
  private fromEnvironment(env: NodeJS.ProcessEnv): {
    source: EnvironmentSource;
    raw: RawConnectionParameters;
  } {
    const complete = CONNECTION_FIELDS.every((field) => Boolean(env[CONFIG_KEY_MAP[field]]));

    if (!complete) {
      return { source: 'defaults', raw: { ...this.defaults } };
    }

    const read = (field: keyof RawConnectionParameters): string => env[CONFIG_KEY_MAP[field]] ?? '';

    return {
      source: 'implicit-environment',
      raw: {
        host: read('host'),
        port: read('port'),
        user: read('user'),
        password: read('password'),
        database: read('database'),
        authMode: read('authMode'),
      },
    };
  }

  private async readConfigFile(filePath: string): Promise<ConfigFile> {
    try {
      const contents = await fs.promises.readFile(filePath, 'utf8');
      return { name: filePath, contents };
    } catch (error) {
      throw new ConfigFileError(filePath, error);
    }
  }
}
