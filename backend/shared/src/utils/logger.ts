/**
 * Structured Logger for Lambda Functions
 * Provides consistent logging across all handlers and scheduled tasks
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export interface LogContext {
  requestId?: string;
  task?: string;
  customerId?: string;
  orderId?: string;
  [key: string]: unknown;
}

export type LogData = Record<string, unknown>;

function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return LEVEL_ORDER.find((level) => level === upper) ?? LogLevel.INFO;
}

class Logger {
  private context: LogContext = {};
  private logLevel: LogLevel;

  constructor(level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
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

  debug(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.log(LogLevel.DEBUG, message, data);
    }
  }

  info(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.log(LogLevel.INFO, message, data);
    }
  }

  warn(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.log(LogLevel.WARN, message, data);
    }
  }

  /**
   * Error level logging; Error instances are expanded to name, message and stack
   */
  error(message: string, error?: unknown, data?: LogData): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorData: LogData = error instanceof Error
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

  private log(level: LogLevel, message: string, data?: LogData): void {
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
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
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
 * logger.setContext({ requestId: event.requestContext.requestId });
 * logger.info('Customer created', { customerId: 'cus-123' });
 *
 * const taskLogger = logger.child({ task: 'generate-crm-report' });
 * taskLogger.error('Report generation failed', error);
 */
