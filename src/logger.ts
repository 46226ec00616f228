/**
 * Structured Logging Module
 *
 * pino root logger with one child per module. JSON lines by default,
 * pino-pretty when asked for (config `logging.pretty` or LOG_PRETTY=1).
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;

function levelFromEnv(): LogLevel | undefined {
  const value = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === value);
}

/**
 * Initialize the root logger. Called by the CLI once config is loaded;
 * library users get an `info` logger on first use.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? levelFromEnv() ?? 'info';
  const pretty = config.pretty ?? process.env.LOG_PRETTY === '1';

  if (pretty) {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = pino({ level });
  }
  return rootLogger;
}

export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/** Scoped logger for one module, e.g. getLogger('Hub') */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
