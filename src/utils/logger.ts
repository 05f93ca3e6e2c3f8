/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Output to stderr so stdout stays free for report output
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { booleanStringSchema, logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  operation?: string;
  pageIndex?: number;
  pageCount?: number;
  requestId?: string;
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

/**
 * Logger settings from LOG_LEVEL and LOG_PRETTY, read with the same schemas
 * the server validates them with. An unknown level falls back to info.
 */
export function loggerConfigFromEnv(env: Record<string, string | undefined> = process.env): LoggerConfig {
  const level = logLevelSchema.safeParse(env.LOG_LEVEL);
  return {
    level: level.success ? level.data : 'info',
    prettyPrint: booleanStringSchema.parse(env.LOG_PRETTY),
    destination: 'stderr',
  };
}

const DEFAULT_CONFIG: LoggerConfig = loggerConfigFromEnv();

/**
 * Paths to redact from logs. Uploaded documents are never logged, but request
 * headers are, and they may carry credentials.
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  'headers.authorization',
  'headers.Authorization',
  'headers.cookie',
  'headers.Cookie',
  '*.password',
  '*.secret',
  '*.apiKey',
  '*.api_key',
  '*.token',
  '*.accessToken',
  '*.access_token',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'pdf-form-inspector',
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
 * Get the base logger
 */
export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper
 *
 * Uses a getter to always access the current baseLogger, so
 * configureLogger() takes effect for loggers created at import time.
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
   * Accepts unknown for `error` since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err =
        context.error instanceof Error
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
  loader: new Logger('DocumentLoader'),
  widgetScanner: new Logger('WidgetScanner'),
  pageContent: new Logger('PageContent'),
  layoutInferencer: new Logger('LayoutInferencer'),
  merger: new Logger('FieldMerger'),
  analyzer: new Logger('FormAnalyzer'),
  server: new Logger('ApiServer'),

  create: (component: string) => new Logger(component),
};

export function logServerStart(port: number, host: string): void {
  logger.server.info('Server starting', {
    port,
    host,
    nodeVersion: process.version,
  });
}

export function logServerShutdown(reason?: string): void {
  logger.server.info('Server shutting down', { reason });
}

export default logger;
