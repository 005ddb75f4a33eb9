/**
 * Logging utilities
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export type LogDetails = Record<string, unknown>;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class AppLogger {
  constructor(private readonly scope: string) {}

  /**
   * Threshold is read on every call so LOG_LEVEL can change at runtime (tests silence it)
   */
  private static threshold(): number {
    const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return LEVEL_ORDER[isLogLevel(configured) ? configured : 'info'];
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= AppLogger.threshold();
  }

  private formatMessage(message: string): string {
    return `[${this.scope}] ${message}`;
  }

  debug(message: string, details?: LogDetails): void {
    if (!this.enabled('debug')) return;
    if (details) console.debug(this.formatMessage(message), details);
    else console.debug(this.formatMessage(message));
  }

  info(message: string, details?: LogDetails): void {
    if (!this.enabled('info')) return;
    if (details) console.log(this.formatMessage(message), details);
    else console.log(this.formatMessage(message));
  }

  warn(message: string, details?: LogDetails): void {
    if (!this.enabled('warn')) return;
    if (details) console.warn(this.formatMessage(message), details);
    else console.warn(this.formatMessage(message));
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled('error')) return;
    if (error === undefined) {
      console.error(this.formatMessage(message));
      return;
    }
    const errorDetails = error instanceof Error ? error.stack || error.message : String(error);
    console.error(this.formatMessage(message), errorDetails);
  }
}

export function createLogger(scope: string): AppLogger {
  return new AppLogger(scope);
}
