import { LogLevel } from '@nestjs/common';

const SEVERITY: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Expands a LOG_LEVEL threshold into the list of levels Nest should print.
 * Unknown values fall back to `warn` so the prompt transcript stays clean.
 */
export function resolveLogLevels(threshold: string | undefined): LogLevel[] {
  const normalized = threshold?.trim().toLowerCase();
  const index = SEVERITY.findIndex((level) => level === normalized);
  return SEVERITY.slice(0, index === -1 ? 2 : index + 1);
}
