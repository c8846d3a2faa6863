/**
 * Logger for the metadata mapper
 *
 * Supports log levels, a prefix per concern and timing of async actions.
 */

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  prefix?: string;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  action?: string | undefined;
  filePath?: string | undefined;
  fileSize?: number | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Internal Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      prefix: options.prefix || 'Metro'
    };
  }

  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().slice(11, 23);
  }

  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m';
      case LogLevel.INFO:
        return '\x1b[36m';
      case LogLevel.WARN:
        return '\x1b[33m';
      case LogLevel.ERROR:
        return '\x1b[31m';
      default:
        return '\x1b[90m';
    }
  }

  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return 'DEBUG';
      case LogLevel.INFO:
        return 'INFO';
      case LogLevel.WARN:
        return 'WARN';
      case LogLevel.ERROR:
        return 'ERROR';
      default:
        return 'LOG';
    }
  }

  /**
   * Check if should log based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext, data?: unknown): void {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const color = this.getColor(level);
    const reset = '\x1b[0m';
    const prefix = `${this.options.prefix} [${this.getLevelPrefix(level)}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';

    const logMessage = `${color}${prefix}${timeStr} ${message}${reset}`;
    const write = level === LogLevel.ERROR ? console.error : level === LogLevel.WARN ? console.warn : console.log;

    if (context) {
      write(logMessage, context);
    } else if (data !== undefined) {
      write(logMessage, data);
    } else {
      write(logMessage);
    }
  }

  debug(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  info(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.INFO, message, context, data);
  }

  warn(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.WARN, message, context, data);
  }

  error(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.ERROR, message, context, data);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime !== undefined) {
      const duration = Date.now() - startTime;
      this.startTimes.delete(operation);
      this.debug(`Completed operation: ${operation}`, {
        operation,
        duration,
        ...context
      });
    }
  }

  /**
   * Run an async operation with timing
   */
  async withTiming<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LoggerContext
  ): Promise<T> {
    this.startTiming(operation);
    try {
      const result = await fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  /**
   * Log file operation
   */
  logFileOperation(operation: string, filePath: string, fileSize?: number, context?: LoggerContext): void {
    this.info(`File operation: ${operation}`, {
      operation,
      filePath,
      fileSize,
      ...context
    });
  }

  /**
   * Log error with context
   */
  logError(error: Error, context?: LoggerContext): void {
    this.error(`Error occurred: ${error.message}`, {
      error: error.message,
      stack: error.stack,
      ...context
    });
  }
}

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger factory for specific concerns
 */
export const LoggerFactory = {
  /**
   * Logger for record actions (extract, inject, read, clear)
   */
  forMetadata(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      prefix: 'Metro'
    });
  },

  /**
   * Logger for the mapper internals (coercion skips, fallbacks)
   */
  forMapper(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      prefix: 'Metro-Mapper'
    });
  },

  /**
   * Logger for sidecar and glTF file operations
   */
  forFileOperations(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      prefix: 'Metro-File'
    });
  }
};

/**
 * Map a configured level name onto the enum
 */
export function toLogLevel(level: 'debug' | 'info' | 'warn' | 'error'): LogLevel {
  switch (level) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}
