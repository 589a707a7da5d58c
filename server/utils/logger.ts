type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.toLowerCase() ?? '';
  if (isLogLevel(normalized)) {
    return normalized;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

class ServerLogger {
  private readonly prefix: string;

  constructor(scope?: string) {
    this.prefix = scope ? `[${scope}] ` : '';
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLevel(process.env.LOG_LEVEL)];
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled('debug')) {
      console.log(`[DEBUG] ${this.prefix}${message}`, context ?? '');
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled('info')) {
      console.log(`[INFO] ${this.prefix}${message}`, context ?? '');
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled('warn')) {
      console.warn(`[WARN] ${this.prefix}${message}`, context ?? '');
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    const errorContext = error instanceof Error
      ? { ...context, error: { message: error.message, stack: error.stack } }
      : { ...context, error };
    console.error(`[ERROR] ${this.prefix}${message}`, errorContext);
  }
}

export type Logger = ServerLogger;

export const logger = new ServerLogger();

export function createLogger(scope: string): Logger {
  return new ServerLogger(scope);
}
