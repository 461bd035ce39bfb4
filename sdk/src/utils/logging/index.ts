/**
 * Logging utilities
 * @module utils/logging
 */

export { ALogger, type LogContext } from './ALogger.js';
export { ALogCapture, type CapturedLog, type LogLevel, type LogQuery } from './ALogCapture.js';

export { logger } from './logger.js';
export { logCapture } from './logCapture.js';

export {
  getCorrelationContext,
  getCorrelationId,
  runWithCorrelation,
  runWithCorrelationContext,
  type CorrelationContext,
} from './correlationContext.js';
