/**
 * Structured Logger
 *
 * JSON-formatted logging built on pino. The engine creates one root logger at
 * start-up and hands child loggers to each component; nothing here is a
 * module-level singleton.
 */

import pino from 'pino';

// -----------------------------------------------------------------------------
// Logger Configuration
// -----------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LoggerConfig {
  /** Log level */
  level: LogLevel;
  /** Pretty print for development */
  pretty: boolean;
  /** Base context to include in all logs */
  base?: Record<string, unknown>;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

export type Logger = pino.Logger;

// -----------------------------------------------------------------------------
// Logger Factory
// -----------------------------------------------------------------------------

/**
 * Create the process-wide root logger.
 */
export function createRootLogger(config: Partial<LoggerConfig> = {}): Logger {
  const finalConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  const options: pino.LoggerOptions = {
    level: finalConfig.level,
    base: {
      service: 'rf-source-sync',
      ...finalConfig.base,
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (finalConfig.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

/**
 * A logger that discards everything. Used where a component is built without
 * an engine around it.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

// -----------------------------------------------------------------------------
// Call Logging
// -----------------------------------------------------------------------------

/**
 * Wrap a function so every call is logged at debug level with its arguments.
 */
export function withCallLogging<A extends unknown[], R>(
  logger: Logger,
  name: string,
  fn: (...args: A) => R
): (...args: A) => R {
  return (...args: A): R => {
    logger.debug({ call: name, args }, `Calling ${name}`);
    return fn(...args);
  };
}
