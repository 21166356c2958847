/**
 * Structured Logging Utility
 * Colorized console logger with JSON metadata
 */

import { isProduction } from '@/shared/config';

// Log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  
  // Foreground colors
  black: '\x1b[30m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
};

// Log level colors
const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.gray,
  [LogLevel.INFO]: colors.blue,
  [LogLevel.WARN]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
};

// Log level priority
const levelPriority: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export type LogMeta = Record<string, unknown>;

// Logger configuration
interface LoggerConfig {
  level: LogLevel;
  enableColors: boolean;
  enableTimestamp: boolean;
}

/**
 * Resolve a LOG_LEVEL string, falling back to INFO for unknown values
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? LogLevel.INFO;
}

class Logger {
  private config: LoggerConfig;
  private readonly context: LogMeta;

  constructor(config?: Partial<LoggerConfig>, context: LogMeta = {}) {
    this.config = {
      level: parseLogLevel(process.env.LOG_LEVEL),
      enableColors: !isProduction,
      enableTimestamp: true,
      ...config,
    };
    this.context = context;
  }

  /**
   * Create a logger that stamps every entry with the given metadata
   * (e.g. `{ sessionId, userId }`). Shares the parent's level settings.
   */
  child(context: LogMeta): Logger {
    const child = new Logger(this.config, { ...this.context, ...context });
    // Level/colour changes on the parent propagate
    child.config = this.config;
    return child;
  }

  private colorize(text: string, color: string): string {
    if (!this.config.enableColors) {
      return text;
    }
    return `${color}${text}${colors.reset}`;
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const parts: string[] = [];

    if (this.config.enableTimestamp) {
      parts.push(this.colorize(new Date().toISOString(), colors.gray));
    }

    parts.push(this.colorize(level.toUpperCase().padEnd(5), levelColors[level]));
    parts.push(message);

    const merged = { ...this.context, ...meta };
    if (Object.keys(merged).length > 0) {
      parts.push(this.colorize(JSON.stringify(merged, serializeErrors, 0), colors.gray));
    }

    return parts.join(' ');
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formattedMessage = this.formatMessage(level, message, meta);

    switch (level) {
      case LogLevel.ERROR:
        console.error(formattedMessage);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage);
        break;
      case LogLevel.DEBUG:
        console.debug(formattedMessage);
        break;
      default:
        console.log(formattedMessage);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /**
   * Error level logging. An Error is expanded under `error` (with stack);
   * a metadata object is logged as-is.
   */
  error(message: string, error?: Error | LogMeta): void {
    if (error instanceof Error) {
      this.log(LogLevel.ERROR, message, {
        error: { name: error.name, message: error.message, stack: error.stack },
      });
      return;
    }
    this.log(LogLevel.ERROR, message, error);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setColors(enabled: boolean): void {
    this.config.enableColors = enabled;
  }
}

/**
 * JSON replacer that keeps Error details nested inside metadata
 */
function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

// Export singleton instance
export const logger = new Logger();

// Export for testing
export { Logger };
