type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

class ExtractorLogger {
  private prefix: string;
  private enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '[Cloakscope]';
    this.enabled = options.enabled ?? process.env.NODE_ENV !== 'test';
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}`;
  }

  private shouldLog(level: LogLevel): boolean {
    if (!this.enabled) return false;
    const configured = process.env.LOG_LEVEL;
    const threshold: LogLevel = isLogLevel(configured) ? configured : 'info';
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message));
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message));
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message));
    }
  }

  error(message: string, error?: unknown): void {
    if (this.shouldLog('error')) {
      const stack = error instanceof Error ? error.stack : undefined;
      console.error(this.formatMessage('error', message), stack || '');
    }
  }
}

export const engineLogger = new ExtractorLogger({ prefix: '[Acquisition]' });
export const browserLogger = new ExtractorLogger({ prefix: '[Browser]' });
export const cacheLogger = new ExtractorLogger({ prefix: '[Cache]' });

export function createLogger(prefix: string): ExtractorLogger {
  return new ExtractorLogger({ prefix });
}

export { ExtractorLogger };
export type { LogLevel };
