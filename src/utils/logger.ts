/**
 * Logger abstraction for the wirecraft compiler
 * Provides consistent logging interface across the codebase
 */

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  VERBOSE = 4
}

/**
 * Where formatted log lines go. Defaults to stderr so that anything a
 * command prints on stdout stays machine readable.
 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`);
};

/**
 * Context accepted by the *WithContext helpers
 */
export interface LogContext {
  uri?: string;
  position?: { line: number; character: number };
  operation?: string;
  duration?: number;
  error?: Error | unknown;
}

/**
 * Logger class for consistent logging
 */
export class Logger {
  private sink: LogSink = stderrSink;
  private level: LogLevel = LogLevel.INFO;
  private verboseLogging: boolean = false;

  /**
   * Initialize the logger
   * @param level - The log level to use
   * @param verboseLogging - Enable super verbose logging for debugging
   * @param sink - Replacement output, mostly for tests
   */
  initialize(level: LogLevel = LogLevel.INFO, verboseLogging: boolean = false, sink?: LogSink): void {
    this.level = level;
    this.verboseLogging = verboseLogging;
    this.sink = sink ?? stderrSink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Enable or disable verbose logging
   */
  setVerboseLogging(enabled: boolean): void {
    this.verboseLogging = enabled;
    if (enabled) {
      this.info('Verbose logging enabled - all compiler phases will be logged');
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      this.sink(`[error] ${this.format(message, args)}`);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      this.sink(`[warn] ${this.format(message, args)}`);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      this.sink(`[info] ${this.format(message, args)}`);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      this.sink(`[debug] ${this.format(message, args)}`);
    }
  }

  /**
   * Log a verbose message
   * Verbose messages are only shown when verbose logging is enabled
   */
  verbose(message: string, ...args: unknown[]): void {
    if (this.verboseLogging || this.level >= LogLevel.VERBOSE) {
      this.sink(`[verbose] ${this.format(message, args)}`);
    }
  }

  /**
   * Log a verbose message with automatic context
   */
  verboseWithContext(message: string, context: LogContext & Record<string, unknown>): void {
    if (!this.verboseLogging && this.level < LogLevel.VERBOSE) {
      return;
    }

    const parts = this.describeContext(message, context);

    // Include any other context properties
    for (const [key, value] of Object.entries(context)) {
      if (!['uri', 'position', 'operation', 'duration', 'error'].includes(key)) {
        try {
          parts.push(`${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
        } catch {
          parts.push(`${key}: [unserializable]`);
        }
      }
    }

    this.sink(`[verbose] ${parts.join(' | ')}`);
  }

  /**
   * Log an error with context, including the stack when there is one
   */
  errorWithContext(message: string, context: LogContext): void {
    const parts = this.describeContext(message, context);
    if (context.error instanceof Error && context.error.stack && this.level >= LogLevel.DEBUG) {
      parts.push(`Stack: ${context.error.stack}`);
    }
    this.error(parts.join(' | '));
  }

  private describeContext(message: string, context: LogContext): string[] {
    const parts: string[] = [message];

    if (context.uri) {
      parts.push(`URI: ${context.uri}`);
    }

    if (context.position) {
      parts.push(`Position: ${context.position.line}:${context.position.character}`);
    }

    if (context.operation) {
      parts.push(`Operation: ${context.operation}`);
    }

    if (context.duration !== undefined) {
      parts.push(`Duration: ${context.duration}ms`);
    }

    if (context.error) {
      const errorMessage = context.error instanceof Error
        ? context.error.message
        : String(context.error);
      parts.push(`Error: ${errorMessage}`);
    }

    return parts;
  }

  /**
   * Format a message with arguments
   */
  private format(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }
    try {
      return `${message} ${args.map(arg =>
        typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
      ).join(' ')}`;
    } catch {
      return `${message} [Error formatting arguments]`;
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
