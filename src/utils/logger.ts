/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Redaction of captured request headers (cookies, authorization)
 * - Output to stderr, leaving stdout to the embedding application
 */

import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';
import type { LogLevel } from './config-schemas.js';

export type { LogLevel } from './config-schemas.js';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  taskId?: string | null;
  jobId?: string;
  url?: string;
  operation?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function envLogLevel(): LogLevel {
  const value = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: envLogLevel(),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths to redact from logs. Media records carry the request headers a
 * page sent, which routinely include session cookies.
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  '*.set-cookie',
  '*.Set-Cookie',
  'headers.authorization',
  'headers.Authorization',
  'headers.cookie',
  'headers.Cookie',
  'requestHeaders.authorization',
  'requestHeaders.Authorization',
  'requestHeaders.cookie',
  'requestHeaders.Cookie',
  'record.headers.authorization',
  'record.headers.Authorization',
  'record.headers.cookie',
  'record.headers.Cookie',

  '*.password',
  '*.secret',
  '*.token',
  '*.accessToken',
  '*.access_token',
];

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'tabstream',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, destination);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Component-specific logger wrapper
 *
 * Uses a getter to always access the current baseLogger, allowing
 * reconfiguration at runtime via configureLogger().
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Accepts unknown for error since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error({ ...context, err }, message);
    } else {
      this.logger.error(context || {}, message);
    }
  }

  /**
   * Log with timing information
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  engine: new Logger('EngineSingleton'),
  pool: new Logger('ResourcePool'),
  tabs: new Logger('TabManager'),
  interceptor: new Logger('Interceptor'),
  dispatcher: new Logger('DownloadDispatcher'),
  transfer: new Logger('Transfer'),
  controller: new Logger('Controller'),

  create: (component: string) => new Logger(component),
};

export default logger;
