/**
 * Logging for the relay.
 *
 * One pino root logger per process; modules take a named child. Level comes
 * from LOG_LEVEL (default "info").
 */

import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

let root: Logger | null = null;

function getRootLogger(): Logger {
  if (!root) {
    root = pino({ level: process.env.LOG_LEVEL || 'info' });
  }
  return root;
}

export function createLogger(name: string): Logger {
  return getRootLogger().child({ module: name });
}

/**
 * Short masked form of a secret, safe to log: first and last four characters.
 */
export function maskSecret(value?: string | null): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}…`;
  }
  return `${trimmed.slice(0, 4)}…${trimmed.slice(-4)}`;
}
