export { AthenaSession } from './athenaSession.js';
export type { SessionCollaborators } from './athenaSession.js';
export { CredentialStore } from './credentialStore.js';
export { RefreshScheduler } from './refreshScheduler.js';
export type { RefreshSchedulerOptions, RotationCallback } from './refreshScheduler.js';
export type { RotationKind, Session, SessionState } from './types.js';
