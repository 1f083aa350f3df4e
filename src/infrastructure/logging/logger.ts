import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export interface CreateLoggerOptions {
  level?: string;
  name?: string;
}

/**
 * Root pino logger for a bus instance.
 *
 * Level comes from the options, then `LOG_LEVEL`, then `info`.
 * Components take a child of this logger with a `component` binding.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions: LoggerOptions = {
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
  };

  if (options.name) {
    pinoOptions.name = options.name;
  }

  return pino(pinoOptions);
}
