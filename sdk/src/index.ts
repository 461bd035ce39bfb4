/**
 * Client SDK for the game's online services.
 *
 * `AthenaSession` is the entry point; everything else is exported for callers
 * that compose their own pipeline or need the types.
 */

export { AthenaSession } from './session/athenaSession.js';
export type { SessionCollaborators } from './session/athenaSession.js';
export { CredentialStore, RefreshScheduler } from './session/index.js';
export type { RotationKind, Session, SessionState } from './session/index.js';

export { ATokenAuthenticator, TokenAuthenticator, basicToken } from './auth/index.js';
export type { TokenAuthenticatorConfig } from './auth/index.js';

export * from './http/index.js';
export * from './accounts/index.js';
export * from './chat/index.js';

export { LifecycleEvent, LifecycleEventBus } from './lifecycle/lifecycleEventBus.js';
export type { LifecycleEventArgs, LifecycleHandler } from './lifecycle/lifecycleEventBus.js';

export { decoders } from './decoding/decoders.js';
export type { ResourceTag } from './decoding/decoders.js';

export { credentialsSchema, resolveSessionOptions, sessionOptionsSchema } from './config/options.js';
export type {
  Credentials,
  CredentialsInput,
  GrantType,
  OAuthClient,
  ResolvedSessionOptions,
  SessionOptions,
} from './config/options.js';
export { DEFAULT_ENDPOINTS } from './config/constants.js';
export type { Endpoints } from './config/constants.js';

export * from './errors/index.js';

export { logger, logCapture, runWithCorrelation } from './utils/logging/index.js';
export type { LogContext } from './utils/logging/index.js';
