import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

export enum LogSeverity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  NOTICE = 'NOTICE',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  CRITICAL = 'CRITICAL'
}

const SEVERITY_RANK: Record<LogSeverity, number> = {
  [LogSeverity.DEBUG]: 0,
  [LogSeverity.INFO]: 1,
  [LogSeverity.NOTICE]: 2,
  [LogSeverity.WARNING]: 3,
  [LogSeverity.ERROR]: 4,
  [LogSeverity.CRITICAL]: 5
};

interface LogContext {
  requestId?: string;
  userAgent?: string;
  method?: string;
  path?: string;
  [key: string]: string | undefined;
}

interface StructuredLogEntry {
  severity: LogSeverity;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

/**
 * Parses a LOG_LEVEL value ("debug", "warning", ...) into a severity.
 * Returns undefined for unknown levels.
 */
export function parseLogSeverity(level: string): LogSeverity | undefined {
  const upper = level.trim().toUpperCase();
  return Object.values(LogSeverity).find(severity => severity === upper);
}

class StructuredLogger {
  private asyncLocalStorage = new AsyncLocalStorage<LogContext>();
  private minimumSeverity: LogSeverity = LogSeverity.INFO;

  setMinimumSeverity(severity: LogSeverity) {
    this.minimumSeverity = severity;
  }

  /**
   * Run a function with a specific logging context
   */
  runWithContext<T>(context: LogContext, fn: () => T): T {
    return this.asyncLocalStorage.run(context, fn);
  }

  extractRequestContext(req: Request): LogContext {
    return {
      requestId: req.header('X-Request-Id') || randomUUID(),
      userAgent: req.header('User-Agent'),
      method: req.method,
      path: req.path
    };
  }

  /**
   * Express middleware that opens a logging context for the request.
   * Everything logged while handling it, including introspection callbacks,
   * carries the request id.
   */
  middleware() {
    return (req: Request, res: Response, next: NextFunction) => {
      const context = this.extractRequestContext(req);
      this.runWithContext(context, () => {
        next();
      });
    };
  }

  /**
   * The request id of the current logging context, if any.
   */
  currentRequestId(): string | undefined {
    return this.asyncLocalStorage.getStore()?.requestId;
  }

  private log(severity: LogSeverity, message: string, metadata?: Record<string, unknown>) {
    if (SEVERITY_RANK[severity] < SEVERITY_RANK[this.minimumSeverity]) {
      return;
    }

    const context = this.asyncLocalStorage.getStore() || {};

    const entry: StructuredLogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      ...metadata
    };

    Object.keys(context).forEach(key => {
      if (context[key] !== undefined) {
        entry[`context.${key}`] = context[key];
      }
    });

    console.log(JSON.stringify(entry));
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.INFO, message, metadata);
  }

  notice(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.NOTICE, message, metadata);
  }

  warning(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.WARNING, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>) {
    const errorMetadata = {
      ...metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : undefined
    };
    this.log(LogSeverity.ERROR, message, errorMetadata);
  }

  critical(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.CRITICAL, message, metadata);
  }
}

// Export singleton instance
export const logger = new StructuredLogger();

/**
 * Shortens a token for log output.
 */
export function redactToken(token: string): string {
  return token.length <= 8 ? '***' : `${token.substring(0, 8)}...`;
}

export type { LogContext, StructuredLogEntry };
