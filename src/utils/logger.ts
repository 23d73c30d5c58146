/**
 * Structured console logger. One JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  constructor(
    private minLevel: LogLevel = 'info',
    private readonly service: string = 'ride-dispatch'
  ) {}

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.emit({ level: 'debug', message, timestamp: new Date().toISOString(), metadata: meta });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.emit({ level: 'info', message, timestamp: new Date().toISOString(), metadata: meta });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.emit({ level: 'warn', message, timestamp: new Date().toISOString(), metadata: meta });
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    this.emit({
      level: 'error',
      message,
      timestamp: new Date().toISOString(),
      metadata: meta,
      error: describeError(error)
    });
  }

  private emit(entry: LogEntry): void {
    if (LOG_LEVELS[entry.level] < LOG_LEVELS[this.minLevel]) return;

    const output = JSON.stringify({ ...entry, service: this.service });

    switch (entry.level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }
}

function describeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack?.slice(0, 500) };
  }
  if (error === undefined) return undefined;
  return { name: 'NonError', message: String(error) };
}

function defaultLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (configured && isLogLevel(configured)) return configured;
  if (process.env.NODE_ENV === 'test') return 'warn';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export const logger = new Logger(defaultLevel());
