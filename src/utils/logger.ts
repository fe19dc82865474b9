/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Output to stderr so test runners keep stdout for their own reporting
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  page?: string;
  locator?: string;
  goldenId?: string;
  state?: string;
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

function levelFromEnv(): LogLevel {
  const parsed = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: levelFromEnv(),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths to redact from logs. Values typed into fields may be credentials.
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  '*.password',
  '*.secret',
  '*.token',
  '*.apiKey',
  '*.value',
  'value',
  'credentials',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'self-healing-locators',
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

export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper
 *
 * Resolves the current base logger on every call, so configureLogger()
 * also applies to loggers created at module load.
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

  warn(message: string, context?: LogContext & { error?: unknown }): void {
    this.logger.warn(serializeError(context), message);
  }

  /**
   * Accepts unknown for `error` since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    this.logger.error(serializeError(context), message);
  }

  /**
   * Log with timing information
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

function serializeError(context?: LogContext & { error?: unknown }): LogContext {
  if (!context?.error) {
    return context || {};
  }
  const { error, ...rest } = context;
  const err = error instanceof Error
    ? { message: error.message, name: error.name, stack: error.stack }
    : { message: String(error) };
  return { ...rest, err };
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  agent: new Logger('SelfHealingAgent'),
  resolver: new Logger('SelfHealingResolver'),
  golden: new Logger('GoldenReferenceStore'),
  corpus: new Logger('TrainingCorpus'),
  ranker: new Logger('LearnedRanker'),
  store: new Logger('PersistentStore'),
  driver: new Logger('PageDriver'),

  create: (component: string) => new Logger(component),
};

export default logger;
