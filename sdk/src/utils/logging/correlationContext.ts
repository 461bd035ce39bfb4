/**
 * Correlation Context
 *
 * Async-safe correlation ID propagation using AsyncLocalStorage. A caller that
 * wraps a unit of work in `runWithCorrelation` gets the ID appended to every log
 * line written inside it, including lines written by rotation and transport code
 * that runs after an await.
 */

import { AsyncLocalStorage } from 'async_hooks';

/**
 * Correlation context data
 */
export interface CorrelationContext {
  /**
   * Unique correlation ID
   */
  correlationId: string;

  /**
   * Optional account ID associated with the work
   */
  accountId?: string;

  /**
   * Additional context fields
   */
  [key: string]: unknown;
}

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * Get the current correlation context, or undefined outside of one.
 */
export function getCorrelationContext(): CorrelationContext | undefined {
  return correlationStorage.getStore();
}

/**
 * Get the current correlation ID, or undefined outside of a correlation context.
 */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore()?.correlationId;
}

/**
 * Run a function within a correlation context.
 *
 * @example
 * ```typescript
 * await runWithCorrelation(randomUUID(), () => session.accounts.findByDisplayName('someone'));
 * ```
 */
export function runWithCorrelation<T>(
  correlationId: string,
  fn: () => T
): T {
  return correlationStorage.run({ correlationId }, fn);
}

/**
 * Run a function within a full correlation context.
 */
export function runWithCorrelationContext<T>(
  context: CorrelationContext,
  fn: () => T
): T {
  return correlationStorage.run(context, fn);
}
