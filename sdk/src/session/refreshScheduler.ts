/**
 * Refresh Scheduler
 *
 * Arms two rotation jobs from a session: a `refresh` at the access token's
 * expiry minus the margin, and a `reauthenticate` at the refresh token's
 * expiry minus the margin. A fire time already in the past fires on the next
 * tick. Timers are unref'd so a pending rotation never keeps the process alive.
 *
 * The scheduler only decides *when*; the owner's `onFire` callback performs the
 * rotation itself.
 */

import { DEFAULT_ROTATION_MARGIN_MS } from '../config/constants.js';
import { logger } from '../utils/logging/logger.js';
import { TimerManager } from '../utils/lifecycle/timerManager.js';

import type { TimerHandle } from '../utils/lifecycle/timerManager.js';
import type { RotationKind, Session } from './types.js';

export type RotationCallback = (kind: RotationKind) => Promise<void>;

export interface RefreshSchedulerOptions {
  marginMs?: number;
  /** Clock used to compute delays; overridable in tests */
  now?: () => number;
}

export class RefreshScheduler {
  private readonly timers = new TimerManager();
  private readonly jobs = new Map<RotationKind, { handle: TimerHandle; firesAt: Date }>();
  private readonly marginMs: number;
  private readonly now: () => number;

  constructor(
    private readonly onFire: RotationCallback,
    options: RefreshSchedulerOptions = {}
  ) {
    this.marginMs = options.marginMs ?? DEFAULT_ROTATION_MARGIN_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Arm both jobs from the session. Replaces any jobs already pending.
   */
  start(session: Session): void {
    this.rearm('refresh', session);
    this.rearm('reauthenticate', session);
  }

  /**
   * Arm (or re-arm) one job from the matching expiry of the session.
   */
  rearm(kind: RotationKind, session: Session): void {
    this.cancel(kind);

    const expiry = kind === 'refresh' ? session.accessTokenExpiresAt : session.refreshTokenExpiresAt;
    const firesAt = new Date(expiry.getTime() - this.marginMs);
    const delay = Math.max(0, firesAt.getTime() - this.now());

    const handle = this.timers.setTimeout(() => this.fire(kind), delay, true);
    this.jobs.set(kind, { handle, firesAt });

    logger.debug(`Scheduled ${kind} rotation`, {
      component: 'RefreshScheduler',
      accountId: session.accountId,
      firesAt: firesAt.toISOString(),
      delayMs: delay,
    });
  }

  /**
   * Clear both jobs. The scheduler can be started again afterwards.
   */
  stop(): void {
    this.cancel('refresh');
    this.cancel('reauthenticate');
  }

  isRunning(): boolean {
    return this.jobs.size > 0;
  }

  /**
   * When the job of the given kind fires, or undefined if it is not pending.
   */
  nextFireTime(kind: RotationKind): Date | undefined {
    return this.jobs.get(kind)?.firesAt;
  }

  private cancel(kind: RotationKind): void {
    const job = this.jobs.get(kind);
    if (job) {
      this.timers.clearTimeout(job.handle);
      this.jobs.delete(kind);
    }
  }

  private fire(kind: RotationKind): void {
    this.jobs.delete(kind);
    logger.info(`Rotation job fired: ${kind}`, { component: 'RefreshScheduler' });

    this.onFire(kind).catch((error: unknown) => {
      logger.error(`Rotation callback for ${kind} failed`, error, { component: 'RefreshScheduler' });
    });
  }
}
