/**
 * Structured JSON logger
 *
 * Entries go to stderr so that command results on stdout stay machine-readable.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
};

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: Record<string, unknown>;
  readonly error?: {
    readonly name: string;
    readonly message: string;
    readonly stack?: string;
  };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toUpperCase();
  return normalized === 'DEBUG' || normalized === 'WARN' || normalized === 'ERROR'
    ? normalized
    : 'INFO';
}

export class Logger {
  private readonly environment: string;
  private minLevel: LogLevel;

  constructor(environment: string = process.env.ENVIRONMENT || 'development', level?: LogLevel) {
    this.environment = environment;
    this.minLevel = level ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('WARN', message, context);
  }

  /**
   * Log an error. A non-Error value is folded into the context as `error`.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log('ERROR', message, context, {
        name: error.name,
        message: error.message,
        stack: error.stack
      });
      return;
    }

    const merged = error === undefined ? context : { ...context, error: String(error) };
    this.log('ERROR', message, merged);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: { name: string; message: string; stack?: string }
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && { context: { ...context, environment: this.environment } }),
      ...(error && { error })
    };

    console.error(JSON.stringify(entry));
  }
}

export const logger = new Logger();
