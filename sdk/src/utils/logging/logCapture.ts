import { AthenaError } from '../../errors/index.js';
import { ALogCapture, LOG_LEVEL_SEVERITY } from './ALogCapture.js';
import { getCorrelationId } from './correlationContext.js';

import type { CapturedLog, LogLevel, LogQuery } from './ALogCapture.js';
import type { LogContext } from './ALogger.js';

export type { CapturedLog, LogLevel, LogQuery } from './ALogCapture.js';

const DEFAULT_CAPACITY = 500;

function describeError(error: unknown): CapturedLog['error'] {
  if (error instanceof AthenaError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: typeof error, message: String(error) };
}

function matches(entry: CapturedLog, query: LogQuery): boolean {
  if (query.minLevel && LOG_LEVEL_SEVERITY[entry.level] < LOG_LEVEL_SEVERITY[query.minLevel]) return false;
  if (query.component !== undefined && entry.component !== query.component) return false;
  if (query.accountId !== undefined && entry.accountId !== query.accountId) return false;
  if (query.correlationId !== undefined && entry.correlationId !== query.correlationId) return false;
  if (query.after !== undefined && entry.seq <= query.after) return false;
  return true;
}

/**
 * Fixed-size ring buffer. Once full, each new entry overwrites the oldest.
 */
class LogCapture extends ALogCapture {
  private slots: (CapturedLog | undefined)[] = new Array<CapturedLog | undefined>(DEFAULT_CAPACITY);
  private head = 0;
  private count = 0;
  private nextSeq = 1;
  private enabled = true;

  capture(level: LogLevel, message: string, context: LogContext = {}, error?: unknown): void {
    if (!this.enabled || this.slots.length === 0) return;

    const { component, accountId, requestId, ...fields } = context;
    const entry: CapturedLog = {
      seq: this.nextSeq++,
      timestamp: new Date(),
      level,
      message,
      component,
      accountId,
      correlationId: typeof requestId === 'string' ? requestId : getCorrelationId(),
      fields,
    };
    if (error !== undefined) {
      entry.error = describeError(error);
    }

    this.slots[this.head] = entry;
    this.head = (this.head + 1) % this.slots.length;
    this.count = Math.min(this.count + 1, this.slots.length);
  }

  query(query: LogQuery = {}): CapturedLog[] {
    const found = this.ordered().filter((entry) => matches(entry, query));
    return query.limit !== undefined ? found.slice(-query.limit) : found;
  }

  clear(): void {
    this.slots = new Array<CapturedLog | undefined>(this.slots.length);
    this.head = 0;
    this.count = 0;
  }

  resize(capacity: number): void {
    const kept = capacity > 0 ? this.ordered().slice(-capacity) : [];
    this.slots = new Array<CapturedLog | undefined>(capacity);
    kept.forEach((entry, index) => {
      this.slots[index] = entry;
    });
    this.count = kept.length;
    this.head = capacity > 0 ? kept.length % capacity : 0;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.slots.length;
  }

  private ordered(): CapturedLog[] {
    const start = (this.head - this.count + this.slots.length) % this.slots.length;
    const entries: CapturedLog[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.slots[(start + i) % this.slots.length];
      if (entry) entries.push(entry);
    }
    return entries;
  }
}

export const logCapture: ALogCapture = new LogCapture();
