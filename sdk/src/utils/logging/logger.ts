import { logCapture } from './logCapture.js';
import { ALogger } from './ALogger.js';
import { isVerbose, isDebugLevel } from '../../config/env.js';
import { getCorrelationId } from './correlationContext.js';
import type { LogLevel } from './ALogCapture.js';
import type { LogContext } from './ALogger.js';

export type { LogContext } from './ALogger.js';

const STANDARD_FIELDS = ['component', 'accountId', 'requestId'];

class Logger extends ALogger {
  /**
   * Add the async correlation ID as `requestId` when the caller did not set one.
   * Returns the original reference when there is nothing to add.
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const asyncCorrelationId = getCorrelationId();

    if (!asyncCorrelationId) {
      return context;
    }

    if (!context) {
      return { requestId: asyncCorrelationId };
    }

    if (context.requestId) {
      return context;
    }

    return {
      ...context,
      requestId: asyncCorrelationId,
    };
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);

    const enrichedContext = this.enrichContext(context);

    let contextStr = '';
    if (enrichedContext) {
      const parts: string[] = [];

      if (enrichedContext.component) parts.push(`component=${enrichedContext.component}`);
      if (enrichedContext.accountId) parts.push(`account=${String(enrichedContext.accountId)}`);
      if (typeof enrichedContext.requestId === 'string') {
        parts.push(`reqId=${enrichedContext.requestId.substring(0, 8)}`);
      }

      Object.keys(enrichedContext).forEach(key => {
        if (!STANDARD_FIELDS.includes(key)) {
          parts.push(`${key}=${String(enrichedContext[key])}`);
        }
      });

      if (parts.length > 0) {
        contextStr = ` [${parts.join(', ')}]`;
      }
    }

    return `${timestamp} ${levelStr}${contextStr} ${message}`;
  }

  debug(message: string, context?: LogContext): void {
    logCapture.capture('debug', message, context);
    if (isDebugLevel()) {
      console.log(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    logCapture.capture('info', message, context);
    console.log(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    logCapture.capture('warn', message, context);
    console.warn(this.formatMessage('warn', message, context));
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    logCapture.capture('error', message, context, error);
    console.error(this.formatMessage('error', message, context));
    if (error) {
      if (error instanceof Error) {
        console.error(`  Error: ${error.message}`);
        if (error.stack && (isVerbose() || isDebugLevel())) {
          console.error(`  Stack: ${error.stack}`);
        }
        if (isVerbose() && error.cause !== undefined) {
          console.error(`  Cause: ${String(error.cause)}`);
        }
      } else {
        console.error(`  Details: ${JSON.stringify(error, null, 2)}`);
      }
    }
  }
}

export const logger: ALogger = new Logger();
