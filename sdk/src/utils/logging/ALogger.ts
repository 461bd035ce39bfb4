/**
 * Abstract Logger
 *
 * Base class for the structured logger. Components depend on this type so a
 * host application can hand the SDK its own logger implementation.
 *
 * @see Logger for the concrete implementation
 */

/**
 * Context metadata attached to log entries.
 */
export interface LogContext {
  /** Component name (e.g., 'TokenAuthenticator', 'RefreshScheduler') */
  component?: string;
  /** Account identifier the entry concerns */
  accountId?: string;
  /** Additional context fields */
  [key: string]: unknown;
}

/**
 * Abstract logger.
 *
 * Provides leveled logging with structured context.
 */
export abstract class ALogger {
  /**
   * Log a debug message.
   */
  abstract debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   */
  abstract info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   */
  abstract warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   */
  abstract error(message: string, error?: Error | unknown, context?: LogContext): void;
}
