/**
 * ListenerManager - tracks listeners added to EventEmitters so they can be
 * removed together.
 *
 * The session uses it for process signal handlers and the chat transport uses
 * it for socket listeners; both detach everything in one call on close.
 *
 * Usage:
 * ```typescript
 * const listeners = new ListenerManager();
 * listeners.once(process, 'SIGTERM', onSignal);
 * listeners.dispose();
 * ```
 */

import type { EventEmitter } from 'events';

type Listener = (...args: unknown[]) => void;

interface TrackedListener {
  target: EventEmitter;
  event: string | symbol;
  handler: Listener;
}

export class ListenerManager {
  private listeners: TrackedListener[] = [];
  private disposed = false;

  on(emitter: EventEmitter, event: string | symbol, handler: Listener): void {
    this.assertUsable();
    emitter.on(event, handler);
    this.listeners.push({ target: emitter, event, handler });
  }

  once(emitter: EventEmitter, event: string | symbol, handler: Listener): void {
    this.assertUsable();

    // Stop tracking the wrapper once it has fired
    const wrappedHandler: Listener = (...args) => {
      this.removeFromTracking(emitter, event, wrappedHandler);
      handler(...args);
    };

    emitter.once(event, wrappedHandler);
    this.listeners.push({ target: emitter, event, handler: wrappedHandler });
  }

  off(emitter: EventEmitter, event: string | symbol, handler: Listener): void {
    emitter.off(event, handler);
    this.removeFromTracking(emitter, event, handler);
  }

  removeAll(): void {
    const tracked = this.listeners;
    this.listeners = [];
    for (const listener of tracked) {
      listener.target.off(listener.event, listener.handler);
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.removeAll();
    this.disposed = true;
  }

  getListenerCount(): number {
    return this.listeners.length;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new Error('ListenerManager has been disposed');
    }
  }

  private removeFromTracking(target: EventEmitter, event: string | symbol, handler: Listener): void {
    const index = this.listeners.findIndex(
      (l) => l.target === target && l.event === event && l.handler === handler
    );
    if (index !== -1) {
      this.listeners.splice(index, 1);
    }
  }
}
