/**
 * Leveled logging for client diagnostics.
 */

/**
 * Log levels for filtering output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output.
   * @default 'warn'
   */
  level?: LogLevel;

  /** Prepended to every line, e.g. `[shortstack]` */
  prefix?: string;

  /**
   * Custom output function for info/debug messages.
   * @default console.log
   */
  stdout?: (...args: unknown[]) => void;

  /**
   * Custom output function for error/warning messages.
   * @default console.error
   */
  stderr?: (...args: unknown[]) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  readonly level: LogLevel;
  private readonly prefix: string;
  private readonly stdout: (...args: unknown[]) => void;
  private readonly stderr: (...args: unknown[]) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.prefix = options.prefix ?? '[shortstack]';
    this.stdout = options.stdout ?? console.log;
    this.stderr = options.stderr ?? console.error;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      this.stdout(`${this.prefix} DEBUG ${message}`);
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      this.stdout(`${this.prefix} INFO ${message}`);
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      this.stderr(`${this.prefix} WARN ${message}`);
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      this.stderr(`${this.prefix} ERROR ${message}`);
    }
  }
}

/**
 * Creates a new logger instance with custom options.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
