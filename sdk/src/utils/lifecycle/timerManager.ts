/**
 * TimerManager - tracks timeouts so an owner can cancel all of them at once
 *
 * - Delays longer than Node's 2^31-1 ms ceiling are split into chained timeouts,
 *   so a job can be scheduled against a far-away expiry.
 * - Timers can be unref'd so that they never keep the process alive on their own.
 *
 * Usage:
 * ```typescript
 * const timers = new TimerManager();
 * const handle = timers.setTimeout(() => rotate(), delayMs, true);
 * timers.clearTimeout(handle);
 * timers.dispose();
 * ```
 */

/** Largest delay setTimeout accepts without firing immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Opaque handle for a tracked timeout. */
export type TimerHandle = number;

export class TimerManager {
  private timers = new Map<TimerHandle, ReturnType<typeof setTimeout>>();
  private nextHandle: TimerHandle = 1;
  private disposed = false;

  /**
   * Create a tracked timeout
   * @param callback - Function to call after the delay
   * @param ms - Delay in milliseconds; negative delays fire on the next tick
   * @param unref - If true, allows the process to exit if this is the only timer
   */
  setTimeout(callback: () => void, ms: number, unref = false): TimerHandle {
    if (this.disposed) {
      throw new Error('TimerManager has been disposed');
    }

    const handle = this.nextHandle++;
    this.arm(handle, callback, Math.max(0, ms), unref);
    return handle;
  }

  private arm(handle: TimerHandle, callback: () => void, remainingMs: number, unref: boolean): void {
    const chunk = Math.min(remainingMs, MAX_TIMEOUT_MS);
    const id = setTimeout(() => {
      const left = remainingMs - chunk;
      if (left > 0) {
        this.arm(handle, callback, left, unref);
        return;
      }
      this.timers.delete(handle);
      callback();
    }, chunk);

    if (unref) {
      id.unref();
    }

    this.timers.set(handle, id);
  }

  /**
   * Clear a specific timeout
   */
  clearTimeout(handle: TimerHandle): void {
    const id = this.timers.get(handle);
    if (id !== undefined) {
      clearTimeout(id);
      this.timers.delete(handle);
    }
  }

  /**
   * Dispose all tracked timers
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }

    for (const id of this.timers.values()) {
      clearTimeout(id);
    }

    this.timers.clear();
    this.disposed = true;
  }

  getTimerCount(): number {
    return this.timers.size;
  }

  isDisposed(): boolean {
    return this.disposed;
  }
}
