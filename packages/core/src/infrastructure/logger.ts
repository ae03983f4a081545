/**
 * Logger - Centralized leveled logging
 *
 * Single responsibility: format log lines with a timestamp, level and
 * scope, and hand them to a sink (the console unless one is supplied).
 */

/**
 * Log levels for filtering
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Receives fully formatted log lines.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level that is written (default: info) */
  minLevel?: LogLevel;
  /** Where formatted lines go (default: console) */
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

/**
 * Check whether a string names a known log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * Logger implementation writing to a pluggable sink
 */
export class Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(
    private readonly scope: string,
    options: LoggerOptions = {}
  ) {
    this.minLevel = options.minLevel ?? 'info';
    this.sink = options.sink ?? consoleSink;
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  /**
   * Create a logger for a sub-component sharing this logger's level and sink
   */
  child(scope: string): Logger {
    return new Logger(`${this.scope}.${scope}`, {
      minLevel: this.minLevel,
      sink: this.sink,
    });
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVEL_PRIORITY[level] > LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${this.scope}]`;

    let formattedMessage = `${prefix} ${message}`;

    if (args.length > 0) {
      const argsStr = args
        .map(arg => {
          if (arg instanceof Error) {
            return `${arg.message}\n${arg.stack ?? ''}`;
          }
          if (typeof arg === 'object') {
            try {
              return JSON.stringify(arg);
            } catch {
              return String(arg);
            }
          }
          return String(arg);
        })
        .join(' ');
      formattedMessage += ` ${argsStr}`;
    }

    this.sink(level, formattedMessage);
  }
}

/**
 * Factory function for creating loggers.
 *
 * The level falls back to GRADEKIT_LOG_LEVEL, then to 'info'.
 */
export function createLogger(scope: string = 'gradekit', options: LoggerOptions = {}): Logger {
  const envLevel = process.env['GRADEKIT_LOG_LEVEL']?.toLowerCase();
  const minLevel = options.minLevel ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info');
  return new Logger(scope, { ...options, minLevel });
}

/**
 * A logger that discards everything, for tests and library callers that
 * want silence.
 */
export function createSilentLogger(): Logger {
  return new Logger('silent', { minLevel: 'error', sink: () => undefined });
}
