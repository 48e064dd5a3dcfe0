export const LOGIN_MODES = ['prompt', 'auto', 'none'] as const;

export type LoginMode = (typeof LOGIN_MODES)[number];

export function isLoginMode(value: string): value is LoginMode {
  return LOGIN_MODES.some((mode) => mode === value);
}

export interface DictionaryCommandOptions {
  file?: string;
  login?: LoginMode;
}

export interface ShellOptions {
  file?: string;
  login: LoginMode;
  cwd?: string;
}
