/**
 * Logger
 *
 * Pino-based structured logger shared by every tiersync package. The daemon
 * builds its own root with `createRootLogger`; library code logs through
 * children of the default root.
 */

import { pino, type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

export interface RootLoggerOptions {
  service: string;
  level?: string;
  env?: string;

  // JSON lines go here instead of stdout or pino-pretty
  destination?: DestinationStream;
}

// Renter credentials can reach a log line through config or request objects
const REDACT_PATHS = ['password', '*.password', 'headers.authorization', '*.headers.authorization'];

export function createRootLogger(options: RootLoggerOptions): PinoLogger {
  const env = options.env ?? 'development';
  const base: LoggerOptions = {
    level: options.level ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: options.service,
      env,
    },
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  };

  if (options.destination) {
    return pino(base, options.destination);
  }

  return pino({
    ...base,
    transport: env === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname,service,env',
      },
    } : undefined,
  });
}

export const logger = createRootLogger({
  service: 'tiersync',
  level: process.env['LOG_LEVEL'],
  env: process.env['NODE_ENV'],
});

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
