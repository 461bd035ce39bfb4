/**
 * Lifecycle Event Bus
 *
 * Notifies subsystems around credential rotation and shutdown so they can drop
 * cached connections or reconnect. Handlers run synchronously in registration
 * order; a handler that throws (or returns a promise that rejects) is logged
 * and does not stop the handlers after it.
 *
 * @example
 * ```typescript
 * bus.register(LifecycleEvent.AfterRotation, (session) => {
 *   presenceCache.reset(session.accountId);
 * });
 * bus.invoke(LifecycleEvent.AfterRotation, newSession);
 * ```
 */

import { logger } from '../utils/logging/logger.js';
import type { Session } from '../session/types.js';

export enum LifecycleEvent {
  BeforeRotation = 'beforeRotation',
  AfterRotation = 'afterRotation',
  Shutdown = 'shutdown',
}

/**
 * Arguments passed to handlers of each event kind.
 * BeforeRotation receives the session being replaced, AfterRotation the new one.
 */
export interface LifecycleEventArgs {
  [LifecycleEvent.BeforeRotation]: [session: Session];
  [LifecycleEvent.AfterRotation]: [session: Session];
  [LifecycleEvent.Shutdown]: [];
}

export type LifecycleHandler<K extends LifecycleEvent> = (
  ...args: LifecycleEventArgs[K]
) => void | Promise<void>;

type HandlerTable = {
  [K in LifecycleEvent]: LifecycleHandler<K>[];
};

function emptyTable(): HandlerTable {
  return {
    [LifecycleEvent.BeforeRotation]: [],
    [LifecycleEvent.AfterRotation]: [],
    [LifecycleEvent.Shutdown]: [],
  };
}

export class LifecycleEventBus {
  private handlers: HandlerTable = emptyTable();
  private disposed = false;

  /**
   * @throws Error if the bus has been disposed
   */
  register<K extends LifecycleEvent>(kind: K, handler: LifecycleHandler<K>): void {
    if (this.disposed) {
      throw new Error('LifecycleEventBus has been disposed');
    }
    // Copy on write so an invoke in progress keeps iterating its own snapshot
    const table: { [P in K]: LifecycleHandler<P>[] } = this.handlers;
    table[kind] = [...table[kind], handler];
  }

  /**
   * Remove a handler. Returns false if it was not registered for that kind.
   */
  unregister<K extends LifecycleEvent>(kind: K, handler: LifecycleHandler<K>): boolean {
    const table: { [P in K]: LifecycleHandler<P>[] } = this.handlers;
    const current = table[kind];
    const index = current.indexOf(handler);
    if (index === -1) {
      return false;
    }
    table[kind] = [...current.slice(0, index), ...current.slice(index + 1)];
    return true;
  }

  invoke<K extends LifecycleEvent>(kind: K, ...args: LifecycleEventArgs[K]): void {
    if (this.disposed) {
      return;
    }

    for (const handler of this.handlers[kind]) {
      try {
        const result = handler(...args);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            logger.error(`Lifecycle handler for ${kind} rejected`, error, {
              component: 'LifecycleEventBus',
            });
          });
        }
      } catch (error) {
        logger.error(`Lifecycle handler for ${kind} threw`, error, {
          component: 'LifecycleEventBus',
        });
      }
    }
  }

  listenerCount(kind?: LifecycleEvent): number {
    if (kind) {
      return this.handlers[kind].length;
    }
    return Object.values(this.handlers).reduce((total, list) => total + list.length, 0);
  }

  dispose(): void {
    this.handlers = emptyTable();
    this.disposed = true;
  }

  isDisposed(): boolean {
    return this.disposed;
  }
}
