/**
 * Logger Module
 *
 * Pino-based structured logging for instance-metadata.
 * Provides a Logger class with support for:
 * - Level from LOG_LEVEL, or debug under NODE_ENV=development
 * - Structured logging with context
 * - Child loggers with bound context
 * - Pretty printing in development mode
 */

import pino, { type Logger as PinoLogger } from 'pino';

// ============================================================================
// Types
// ============================================================================

/**
 * Log context that can be bound to a logger or passed per-call.
 */
export interface LogContext {
  /** Role being expanded */
  role?: string;
  /** Environment the role is expanded for */
  environment?: string;
  /** File a provider read from */
  path?: string;
  /** Additional arbitrary context */
  [key: string]: unknown;
}

/**
 * Options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Logger name (appears in logs) */
  name?: string;
  /** Log level (default: info, or debug in development) */
  level?: LogLevel;
  /** Context to bind to all log entries */
  context?: LogContext;
  /** Whether to enable pretty printing (default: auto-detect from NODE_ENV) */
  pretty?: boolean;
  /** Destination stream (default: stdout) */
  destination?: pino.DestinationStream;
}

/**
 * Supported log levels.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * The logging surface the library depends on. Logger implements it;
 * tests pass stand-ins built from vi.fn().
 */
export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext & { error?: Error }): void;
  child(context: LogContext): StructuredLogger;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ============================================================================
// Logger Class
// ============================================================================

/**
 * Logger class wrapping pino with structured logging support.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'instance-metadata' });
 * logger.info('Expanded role', { role: 'web', environment: 'production' });
 *
 * const roleLogger = logger.child({ role: 'web' });
 * roleLogger.debug('Reading role file', { path: 'roles/web.json' });
 * ```
 */
export class Logger implements StructuredLogger {
  private readonly pino: PinoLogger;
  private readonly boundContext: LogContext;

  constructor(
    options: LoggerOptions = {},
    parent?: { pino: PinoLogger; bindings: LogContext }
  ) {
    this.boundContext = options.context ?? {};

    if (parent) {
      this.pino = parent.pino.child(parent.bindings);
      return;
    }

    const isDevelopment = process.env['NODE_ENV'] === 'development';
    const usePretty = (options.pretty ?? isDevelopment) && !options.destination;
    const envLevel = process.env['LOG_LEVEL'];
    const defaultLevel: LogLevel = isDevelopment ? 'debug' : 'info';

    const pinoOptions: pino.LoggerOptions = {
      level: options.level ?? (isLogLevel(envLevel) ? envLevel : defaultLevel),
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    };

    if (options.context) {
      pinoOptions.base = { ...options.context };
    }

    if (options.name) {
      pinoOptions.name = options.name;
    }

    // pino-pretty is a dev dependency; use it when asked for
    if (usePretty) {
      pinoOptions.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      };
    }

    this.pino = options.destination
      ? pino(pinoOptions, options.destination)
      : pino(pinoOptions);
  }

  /**
   * Create a child logger with additional bound context.
   */
  child(context: LogContext): Logger {
    return new Logger(
      { context: { ...this.boundContext, ...context } },
      { pino: this.pino, bindings: context }
    );
  }

  debug(message: string, context?: LogContext): void {
    if (context) {
      this.pino.debug(context, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, context?: LogContext): void {
    if (context) {
      this.pino.info(context, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (context) {
      this.pino.warn(context, message);
    } else {
      this.pino.warn(message);
    }
  }

  /**
   * Log at error level. An `error` in the context is serialized as `err`.
   */
  error(message: string, context?: LogContext & { error?: Error }): void {
    if (context) {
      const { error, ...rest } = context;
      if (error) {
        this.pino.error({ ...rest, err: error }, message);
      } else {
        this.pino.error(rest, message);
      }
    } else {
      this.pino.error(message);
    }
  }

  get level(): string {
    return this.pino.level;
  }

  set level(level: LogLevel) {
    this.pino.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger instance, writing JSON lines to stderr so the CLI can
 * keep stdout for the expansion itself.
 */
export const logger = new Logger({
  name: 'instance-metadata',
  destination: process.stderr,
});

export default logger;
