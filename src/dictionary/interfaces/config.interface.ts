export interface ConnectionParameters {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  authMode: string;
}

export type ConnectionField = keyof ConnectionParameters;

/**
 * Connection values as read from a file, the environment or a prompt,
 * before port coercion and emptiness checks.
 */
export type RawConnectionParameters = Record<Exclude<ConnectionField, 'port'>, string> & {
  port: string | number;
};

export interface ConfigFile {
  name: string;
  contents: string;
}

export type EnvironmentSource = 'explicit-file' | 'implicit-environment' | 'defaults';
