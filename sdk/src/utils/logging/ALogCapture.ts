/**
 * Abstract Log Capture
 *
 * In-memory record of what the SDK logged, kept so a host application can
 * attach the recent history of a session to a bug report, and so tests can
 * assert on log output without scraping the console.
 *
 * @see LogCapture for the concrete implementation
 */

import type { LogContext } from './ALogger.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface CapturedLog {
  /** Increases by one per captured entry and is never reused after eviction */
  seq: number;
  timestamp: Date;
  level: LogLevel;
  message: string;
  component?: string;
  accountId?: string;
  correlationId?: string;
  /** Context fields other than the three above */
  fields: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    /** SDK error code, for errors raised by the SDK */
    code?: string;
  };
}

export interface LogQuery {
  /** Lowest level returned: `warn` returns warnings and errors */
  minLevel?: LogLevel;
  component?: string;
  accountId?: string;
  correlationId?: string;
  /** Only entries captured after this sequence number */
  after?: number;
  /** Newest N matches */
  limit?: number;
}

export abstract class ALogCapture {
  abstract capture(level: LogLevel, message: string, context?: LogContext, error?: unknown): void;

  /**
   * Matching entries, oldest first.
   */
  abstract query(query?: LogQuery): CapturedLog[];

  abstract clear(): void;

  /**
   * Change how many entries are retained, dropping the oldest if needed.
   */
  abstract resize(capacity: number): void;

  abstract setEnabled(enabled: boolean): void;

  abstract get size(): number;

  abstract get capacity(): number;
}
