/**
 * An authenticated token pair for one account.
 *
 * Sessions are values: the credential store freezes each one on commit and a
 * rotation replaces the whole object. `accountId` never changes across
 * rotations of the same logical session.
 */
export interface Session {
  readonly accountId: string;
  readonly accessToken: string;
  readonly accessTokenExpiresAt: Date;
  readonly refreshToken: string;
  readonly refreshTokenExpiresAt: Date;
  readonly tokenType: string;
  readonly displayName?: string;
  readonly clientId?: string;
  readonly deviceId?: string;
  readonly inAppId?: string;
  readonly app?: string;
}

/**
 * Facade states, in the order a session moves through them.
 */
export type SessionState =
  | 'authenticating'
  | 'active'
  | 'rotating'
  | 'shuttingDown'
  | 'closed';

/**
 * What a rotation job does when it fires:
 * - `refresh` exchanges the refresh token for a new pair
 * - `reauthenticate` performs a full login with the configured credentials
 */
export type RotationKind = 'refresh' | 'reauthenticate';
