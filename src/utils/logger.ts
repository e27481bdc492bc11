/**
 * Logger utility
 * Provides structured logging with levels
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
  instanceId?: string;
}

class Logger {
  private minLevel: LogLevel = LogLevel.INFO;
  private logEntries: LogEntry[] = [];
  private maxEntries: number = 1000; // Keep last 1000 entries in memory
  private silent: boolean = false;

  /**
   * Set minimum log level
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Keep recording entries but stop writing them to the console
   */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  debug(message: string, context?: LogContext, instanceId?: string): void {
    this.log(LogLevel.DEBUG, message, context, instanceId);
  }

  info(message: string, context?: LogContext, instanceId?: string): void {
    this.log(LogLevel.INFO, message, context, instanceId);
  }

  warn(message: string, context?: LogContext, instanceId?: string): void {
    this.log(LogLevel.WARN, message, context, instanceId);
  }

  error(message: string, context?: LogContext, instanceId?: string): void {
    this.log(LogLevel.ERROR, message, context, instanceId);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    instanceId?: string
  ): void {
    if (level < this.minLevel) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context,
      instanceId,
    };

    this.logEntries.push(entry);
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    if (this.silent) {
      return;
    }

    const prefix = instanceId ? `[${instanceId}]` : '';
    const levelStr = LogLevel[level];
    const timestamp = entry.timestamp.toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';

    const logMessage = `${timestamp} ${levelStr} ${prefix} ${message}${contextStr}`;

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.log(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
        console.error(logMessage);
        break;
    }
  }

  /**
   * Get recent log entries
   */
  getRecentEntries(count: number = 100): LogEntry[] {
    return this.logEntries.slice(-count);
  }

  clear(): void {
    this.logEntries = [];
  }
}

/**
 * Map a CLI level name ("debug", "info", ...) to a LogLevel
 */
export function parseLogLevel(name: string): LogLevel {
  switch (name.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      throw new Error(`Unknown log level: ${name}`);
  }
}

// Export singleton instance
export const logger = new Logger();

// Export convenience functions
export const logDebug = (message: string, context?: LogContext, instanceId?: string) =>
  logger.debug(message, context, instanceId);
export const logInfo = (message: string, context?: LogContext, instanceId?: string) =>
  logger.info(message, context, instanceId);
export const logWarn = (message: string, context?: LogContext, instanceId?: string) =>
  logger.warn(message, context, instanceId);
export const logError = (message: string, context?: LogContext, instanceId?: string) =>
  logger.error(message, context, instanceId);
