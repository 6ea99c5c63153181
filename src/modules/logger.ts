import type { LogLevel } from '../types/index.js';

/**
 * Event types for key points of a stack operation
 */
export type EventType = 'SUBMIT' | 'POLL' | 'FAILURE' | 'COMPLETE';

/**
 * Structured log entry format
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  stackName?: string;
  event?: EventType;
  [key: string]: unknown;
}

/**
 * Metadata keys whose values never reach the log output
 */
const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'apiKey', 'credentials'];

/**
 * Fields attached to every entry a logger writes
 */
export interface LoggerContext {
  stackName?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Logger class for structured JSON logging
 *
 * Writes one JSON object per line to stdout, filtered by level. A context set
 * with `setContext` (or given to `child`) is merged into every entry, and
 * metadata keys that look like secrets are replaced with `[REDACTED]`.
 *
 * ```typescript
 * const logger = new Logger('INFO');
 * const stackLogger = logger.child({ stackName: 'demo' });
 * stackLogger.info('Stack reached terminal state', { event: 'COMPLETE', status: 'CREATE_COMPLETE' });
 * ```
 */
export class Logger {
  private logLevel: LogLevel;
  private context: LoggerContext;
  private readonly levelPriority: Record<LogLevel, number> = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
  };

  constructor(logLevel: LogLevel = 'INFO', context: LoggerContext = {}) {
    this.logLevel = logLevel;
    this.context = { ...context };
  }

  /**
   * Replaces the context merged into every subsequent entry
   */
  setContext(context: LoggerContext): void {
    this.context = { ...context };
  }

  /**
   * Clears the logger context
   */
  clearContext(): void {
    this.context = {};
  }

  /**
   * Gets a copy of the current context
   */
  getContext(): LoggerContext {
    return { ...this.context };
  }

  /**
   * Updates the log level
   */
  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Returns a logger with the same level whose context extends this one's.
   * Used to scope a logger to one tracked stack.
   */
  child(context: LoggerContext): Logger {
    return new Logger(this.logLevel, { ...this.context, ...context });
  }

  /**
   * Logs a DEBUG message
   */
  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('DEBUG', message, metadata);
  }

  /**
   * Logs an INFO message
   */
  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('INFO', message, metadata);
  }

  /**
   * Logs a WARN message
   */
  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('WARN', message, metadata);
  }

  /**
   * Logs an ERROR message
   */
  error(message: string, metadata?: Record<string, unknown>): void {
    this.log('ERROR', message, metadata);
  }

  /**
   * Writes one entry as a JSON line if the level passes the filter
   */
  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (this.levelPriority[level] < this.levelPriority[this.logLevel]) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...this.redactSensitiveData(metadata || {}),
    };

    // eslint-disable-next-line no-console
    console.log(JSON.stringify(logEntry));
  }

  /**
   * Replaces values of sensitive-looking keys, recursing into nested objects
   */
  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const isSensitive = SENSITIVE_FIELDS.some((field) =>
        key.toLowerCase().includes(field.toLowerCase())
      );

      if (isSensitive) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainObject(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Error)
  );
}

let loggerInstance: Logger | null = null;

/**
 * Gets the logger singleton, creating it with the specified log level on first access
 */
export function getLogger(logLevel?: LogLevel): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(logLevel);
  }
  return loggerInstance;
}

/**
 * Resets the logger singleton (primarily for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
