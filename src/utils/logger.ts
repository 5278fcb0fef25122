import { randomUUID } from 'crypto';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Structured logger with correlation ID support.
 *
 * stdout carries the MCP message stream, so every entry is written to stderr.
 */
export class Logger {
  private correlationId: string;
  private context: string;

  constructor(context: string, correlationId?: string) {
    this.context = context;
    this.correlationId = correlationId || randomUUID();
  }

  /**
   * Creates a child logger with the same correlation ID
   */
  child(context: string): Logger {
    return new Logger(context, this.correlationId);
  }

  getCorrelationId(): string {
    return this.correlationId;
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('INFO', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('WARN', message, metadata);
  }

  /**
   * Logs error level message, expanding the error into name, message and stack
   */
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    const errorMetadata = error ? {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
      ...metadata
    } : metadata;

    this.log('ERROR', message, errorMetadata);
  }

  /**
   * Logs debug level message when LOG_LEVEL=DEBUG or NODE_ENV=development
   */
  debug(message: string, metadata?: Record<string, unknown>): void {
    if (process.env.LOG_LEVEL === 'DEBUG' || process.env.NODE_ENV === 'development') {
      this.log('DEBUG', message, metadata);
    }
  }

  /**
   * Logs execution duration for performance monitoring
   */
  logDuration(operation: string, startTime: number, metadata?: Record<string, unknown>): void {
    const duration = Date.now() - startTime;
    this.info(`${operation} completed`, {
      operation,
      durationMs: duration,
      ...metadata
    });
  }

  /**
   * Logs the outcome of a tool invocation
   */
  logToolCall(tool: string, success: boolean, metadata?: Record<string, unknown>): void {
    if (success) {
      this.info('Tool call succeeded', { tool, ...metadata });
    } else {
      this.warn('Tool call failed', { tool, ...metadata });
    }
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      correlationId: this.correlationId,
      context: this.context,
      ...metadata
    };

    if (level === 'WARN') {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.error(JSON.stringify(logEntry));
    }
  }
}

/**
 * Creates a logger instance for the given context
 */
export function createLogger(context: string, correlationId?: string): Logger {
  return new Logger(context, correlationId);
}
