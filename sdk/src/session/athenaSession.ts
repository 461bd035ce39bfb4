/**
 * Session Facade
 *
 * The object client code holds. It composes the credential store, token
 * authenticator, refresh scheduler, request signer and lifecycle event bus,
 * and owns orderly shutdown.
 *
 * States: authenticating → active → (rotating → active)* → shuttingDown → closed
 *
 * @example
 * ```typescript
 * const session = await AthenaSession.create({
 *   credentials: { grantType: 'device_auth', accountId, deviceId, secret },
 *   client: { clientId, clientSecret },
 * });
 *
 * const friend = await session.accounts.findByDisplayName('someone');
 * await session.close();
 * ```
 */

import { TokenAuthenticator } from '../auth/tokenAuthenticator.js';
import { AccountsService } from '../accounts/accountsService.js';
import { XmppWebSocketTransport } from '../chat/xmppWebSocketTransport.js';
import { resolveSessionOptions } from '../config/options.js';
import { AuthenticationFailedError, SessionClosedError, formatError } from '../errors/index.js';
import { HttpClient } from '../http/httpClient.js';
import { RequestSigner } from '../http/requestSigner.js';
import { LifecycleEvent, LifecycleEventBus } from '../lifecycle/lifecycleEventBus.js';
import { ListenerManager } from '../utils/lifecycle/listenerManager.js';
import { logger } from '../utils/logging/logger.js';
import { CredentialStore } from './credentialStore.js';
import { RefreshScheduler } from './refreshScheduler.js';

import type { ATokenAuthenticator } from '../auth/ATokenAuthenticator.js';
import type { ChatTransport } from '../chat/types.js';
import type { ResolvedSessionOptions, SessionOptions } from '../config/options.js';
import type { FetchFunction, InterceptorAction } from '../http/types.js';
import type { LifecycleHandler } from '../lifecycle/lifecycleEventBus.js';
import type { RotationKind, Session, SessionState } from './types.js';

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Replaceable dependencies. Anything left out is built from the options.
 */
export interface SessionCollaborators {
  /** Used for every HTTP request; defaults to the global fetch */
  fetch?: FetchFunction;
  /** Chat transport used when `enableChat` is on */
  transport?: ChatTransport;
  authenticator?: ATokenAuthenticator;
}

export class AthenaSession {
  readonly http: HttpClient;
  readonly accounts: AccountsService;
  readonly chat: ChatTransport | undefined;

  private readonly store = new CredentialStore();
  private readonly signer: RequestSigner;
  private readonly bus = new LifecycleEventBus();
  private readonly signalListeners = new ListenerManager();
  private readonly scheduler: RefreshScheduler;
  private readonly authenticator: ATokenAuthenticator;

  private currentState: SessionState = 'authenticating';
  private ownAccountId: string | undefined;
  private ownDisplayName: string | undefined;
  private rotation: Promise<boolean> | undefined;
  private closing: Promise<void> | undefined;

  private constructor(
    private readonly options: ResolvedSessionOptions,
    collaborators: SessionCollaborators
  ) {
    this.signer = new RequestSigner(this.store, options.userAgent);
    this.http = new HttpClient(this.signer, {
      fetch: collaborators.fetch,
      timeoutMs: options.requestTimeoutMs,
    });
    this.accounts = new AccountsService(this.http, options.endpoints.account);
    this.authenticator =
      collaborators.authenticator ??
      new TokenAuthenticator(this.http, {
        client: options.client,
        kairosClient: options.kairosClient,
        accountBaseUrl: options.endpoints.account,
        eulaTrackingBaseUrl: options.endpoints.eulaTracking,
        fortniteBaseUrl: options.endpoints.fortnite,
        killOtherSessions: options.killOtherSessions,
      });
    this.chat = options.enableChat
      ? collaborators.transport ?? new XmppWebSocketTransport({ url: options.endpoints.chat, ...options.chat })
      : undefined;
    this.scheduler = new RefreshScheduler((kind) => this.onScheduledRotation(kind), {
      marginMs: options.rotationMarginMs,
    });
  }

  /**
   * Validate options, log in and bring the session up.
   *
   * @throws ConfigError on invalid options
   * @throws AuthenticationFailedError | NetworkError if the initial login fails
   * @throws TransportError if chat is enabled and cannot connect
   */
  static async create(options: SessionOptions, collaborators: SessionCollaborators = {}): Promise<AthenaSession> {
    const session = new AthenaSession(resolveSessionOptions(options), collaborators);
    await session.start();
    return session;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * @throws NotAuthenticatedError before the initial login completes
   */
  get accountId(): string {
    return this.ownAccountId ?? this.store.get().accountId;
  }

  get displayName(): string | undefined {
    return this.ownDisplayName ?? this.store.peek()?.displayName;
  }

  /**
   * Read-only snapshot of the current session.
   *
   * @throws SessionClosedError once the session is closed
   */
  session(): Session {
    if (this.currentState === 'closed') {
      throw new SessionClosedError();
    }
    return this.store.get();
  }

  currentAccessToken(): string {
    return this.session().accessToken;
  }

  addLifecycleListener<K extends LifecycleEvent>(kind: K, handler: LifecycleHandler<K>): void {
    this.assertOpen();
    this.bus.register(kind, handler);
  }

  removeLifecycleListener<K extends LifecycleEvent>(kind: K, handler: LifecycleHandler<K>): boolean {
    return this.bus.unregister(kind, handler);
  }

  addRequestInterceptor(action: InterceptorAction): void {
    this.signer.addInterceptor(action);
  }

  removeRequestInterceptor(action: InterceptorAction): boolean {
    return this.signer.removeInterceptor(action);
  }

  /**
   * Rotate immediately. Joins the rotation in flight if there is one. Resolves
   * once the rotation has finished, or once the session has shut down after a
   * failed rotation.
   *
   * @throws SessionClosedError if the session is shutting down or closed
   */
  async rotateNow(kind: RotationKind = 'refresh'): Promise<void> {
    this.assertOpen();

    if (!this.rotation) {
      this.rotation = this.rotate(kind).finally(() => {
        this.rotation = undefined;
      });
    }

    const succeeded = await this.rotation;
    if (!succeeded) {
      await this.close();
    }
  }

  /**
   * Shut the session down. Every call returns the same promise.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async start(): Promise<void> {
    let initial: Session;
    try {
      initial = await this.authenticator.login(this.options.credentials);
    } catch (error) {
      this.currentState = 'closed';
      logger.error('Initial login failed', error, { component: 'AthenaSession' });
      throw error;
    }

    this.store.set(initial);
    this.ownAccountId = initial.accountId;
    this.currentState = 'active';
    logger.info('Session active', {
      component: 'AthenaSession',
      accountId: initial.accountId,
      expiresAt: initial.accessTokenExpiresAt.toISOString(),
    });

    if (this.options.handleShutdown) {
      this.installSignalHandlers();
    }

    if (this.options.acceptEula) {
      await this.authenticator.acceptEulaIfNeeded(initial);
    }

    if (this.chat) {
      try {
        await this.chat.connect(initial.accountId, initial.accessToken);
      } catch (error) {
        logger.error('Chat connection failed, closing session', error, {
          component: 'AthenaSession',
          accountId: initial.accountId,
        });
        await this.close();
        throw error;
      }
    }

    await this.lookupDisplayName(initial);

    // close() may have run during the lookup, e.g. from a signal
    if (this.isShuttingDown()) {
      return;
    }

    if (this.options.refreshAutomatically) {
      this.scheduler.start(initial);
    }
  }

  private async lookupDisplayName(session: Session): Promise<void> {
    if (session.displayName) {
      this.ownDisplayName = session.displayName;
      return;
    }

    try {
      const account = await this.accounts.findOneByAccountId(session.accountId);
      this.ownDisplayName = account?.displayName;
    } catch (error) {
      logger.warn(`Could not look up own display name: ${formatError(error)}`, {
        component: 'AthenaSession',
        accountId: session.accountId,
      });
    }
  }

  private onScheduledRotation(kind: RotationKind): Promise<void> {
    if (this.isShuttingDown()) {
      return Promise.resolve();
    }
    return this.rotateNow(kind);
  }

  /**
   * One rotation. Resolves to false when it failed and the session must shut
   * down; never rejects.
   */
  private async rotate(kind: RotationKind): Promise<boolean> {
    const old = this.store.get();
    this.currentState = 'rotating';

    try {
      const next =
        kind === 'refresh'
          ? await this.authenticator.refresh(old.refreshToken)
          : await this.authenticator.login(this.options.credentials);

      if (next.accountId !== old.accountId) {
        throw new AuthenticationFailedError(
          `Rotation returned account ${next.accountId}, expected ${old.accountId}`
        );
      }

      this.store.set(next);
      // A dropped transport may be waiting to reconnect with the old token
      if (this.chat && !this.chat.isConnected()) {
        this.chat.updateCredentials(next.accountId, next.accessToken);
      }
      await this.authenticator.revoke(old.accessToken);

      // close() was called meanwhile: keep the new session for the final
      // revoke, leave the transport to the shutdown sequence.
      if (this.isShuttingDown()) {
        return true;
      }

      if (this.chat?.isConnected()) {
        this.bus.invoke(LifecycleEvent.BeforeRotation, old);
        await this.chat.disconnect();
        await this.chat.connect(next.accountId, next.accessToken);
        this.bus.invoke(LifecycleEvent.AfterRotation, next);
      }

      if (this.options.rearmOnRotation && this.options.refreshAutomatically && !this.isShuttingDown()) {
        this.scheduler.rearm(kind, next);
      }

      logger.info(`Credentials rotated (${kind})`, {
        component: 'AthenaSession',
        accountId: next.accountId,
        expiresAt: next.accessTokenExpiresAt.toISOString(),
      });
      this.markActive();
      return true;
    } catch (error) {
      logger.error(`Credential rotation (${kind}) failed, shutting down`, error, {
        component: 'AthenaSession',
        accountId: old.accountId,
      });
      return false;
    }
  }

  private async shutdown(): Promise<void> {
    this.currentState = 'shuttingDown';
    logger.info('Shutting down session', { component: 'AthenaSession', accountId: this.ownAccountId });

    this.bus.invoke(LifecycleEvent.Shutdown);
    this.scheduler.stop();

    if (this.rotation) {
      await this.rotation;
    }

    if (this.chat) {
      try {
        if (this.chat.isConnected()) {
          await this.chat.disconnect();
        }
        await this.chat.close();
      } catch (error) {
        logger.warn(`Chat transport did not close cleanly: ${formatError(error)}`, {
          component: 'AthenaSession',
        });
      }
    }

    const current = this.store.peek();
    if (current) {
      await this.authenticator.revoke(current.accessToken);
    }
    await this.authenticator.drain();

    this.bus.dispose();
    this.signalListeners.dispose();
    this.store.clear();
    this.currentState = 'closed';
    logger.info('Session closed', { component: 'AthenaSession', accountId: this.ownAccountId });
  }

  private installSignalHandlers(): void {
    for (const signal of SHUTDOWN_SIGNALS) {
      this.signalListeners.once(process, signal, () => {
        logger.info(`Received ${signal}, closing session`, { component: 'AthenaSession' });
        this.close()
          .then(() => {
            // Our listener is gone: re-raise so the default action (or the
            // application's own handler) still runs.
            if (process.listenerCount(signal) === 0) {
              process.kill(process.pid, signal);
            }
          })
          .catch((error: unknown) => {
            logger.error(`Shutdown after ${signal} failed`, error, { component: 'AthenaSession' });
          });
      });
    }
  }

  private markActive(): void {
    if (this.currentState === 'rotating') {
      this.currentState = 'active';
    }
  }

  private isShuttingDown(): boolean {
    return this.currentState === 'shuttingDown' || this.currentState === 'closed';
  }

  private assertOpen(): void {
    if (this.isShuttingDown()) {
      throw new SessionClosedError();
    }
  }
}
