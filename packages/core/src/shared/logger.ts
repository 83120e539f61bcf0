import { pino, destination, type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  name?: string;
  /** Write to stderr instead of stdout. */
  stderr?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', name = 'cohort-match', stderr = false } = options;
  if (stderr) {
    return pino({ name, level }, destination(2));
  }
  return pino({ name, level });
}

/**
 * Logger that drops everything. Used where callers pass none.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
