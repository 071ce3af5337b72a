/**
 * Structured Logger
 * JSON lines on stderr, so table output on stdout stays clean.
 *   - level filtering per component
 *   - operation timing (duration)
 *   - error name, code and stack
 */

import { formatDuration } from './time-utils.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** Operation name, e.g. "searchPlaces" */
  operation?: string;
  /** Request URL or file path */
  url?: string;
  /** Elapsed time in milliseconds */
  duration?: number;
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Lowest level written (default: 'warn') */
  minLevel?: LogLevel;
  /** Where formatted lines go (default: stderr) */
  write?: (line: string) => void;
  /** Include stack traces for errors (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

export class StructuredLogger {
  private component: string;
  private minLevel: LogLevel;
  private write: (line: string) => void;
  private includeStack: boolean;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.minLevel = config.minLevel ?? 'warn';
    this.write = config.write ?? ((line) => process.stderr.write(`${line}\n`));
    this.includeStack = config.includeStack !== false;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private output(entry: LogEntry): void {
    this.write(JSON.stringify(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    });
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Run an async operation and log its outcome with timing. Failures are
   * logged at warn (the caller decides whether they are fatal) and rethrown.
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      const duration = Date.now() - startTime;
      this.debug(`${operation} done in ${formatDuration(duration)}`, { ...context, operation, duration });
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      this.warn(`${operation} failed after ${formatDuration(duration)}`, {
        ...context,
        operation,
        duration,
        reason: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

/**
 * Shared loggers, one per component
 */
export const loggers = {
  api: new StructuredLogger('API'),
  cache: new StructuredLogger('Cache'),
  cli: new StructuredLogger('CLI'),
};

export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}
