/**
 * Structured Logger for Lambda Functions
 * Provides consistent logging across all services
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVELS: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export interface LogContext {
  requestId?: string;
  userId?: number;
  role?: string;
  orderId?: number;
  [key: string]: unknown;
}

function parseLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return LEVELS.find((level) => level === upper) ?? LogLevel.INFO;
}

class Logger {
  private context: LogContext = {};
  private logLevel: LogLevel;

  constructor(level: LogLevel = parseLevel(process.env.LOG_LEVEL)) {
    this.logLevel = level;
  }

  /**
   * Set persistent context for all subsequent logs
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Clear all context
   */
  clearContext(): void {
    this.context = {};
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.log(LogLevel.DEBUG, message, data);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.log(LogLevel.INFO, message, data);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.log(LogLevel.WARN, message, data);
    }
  }

  /**
   * Error level logging; unpacks Error instances
   */
  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorData = error instanceof Error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...data,
          }
        : { error, ...data };

      this.log(LogLevel.ERROR, message, errorData);
    }
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const logEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...(data && { data }),
    };

    // Use console methods for CloudWatch integration
    switch (level) {
      case LogLevel.DEBUG:
      case LogLevel.INFO:
        console.log(JSON.stringify(logEntry));
        break;
      case LogLevel.WARN:
        console.warn(JSON.stringify(logEntry));
        break;
      case LogLevel.ERROR:
        console.error(JSON.stringify(logEntry));
        break;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.logLevel);
    childLogger.context = { ...this.context, ...context };
    return childLogger;
  }
}

// Export singleton instance
export const logger = new Logger();

// Export class for testing
export { Logger };

/**
 * Usage Examples:
 *
 * // Set context for request
 * logger.setContext({ requestId: event.requestContext.requestId, userId: principal.id });
 * logger.info('Processing request');
 *
 * // Error logging
 * logger.error('Failed to cancel order', error, { orderId: 42 });
 *
 * // Child logger
 * const orderLogger = logger.child({ orderId: 42 });
 * orderLogger.info('Stock restored');
 */
