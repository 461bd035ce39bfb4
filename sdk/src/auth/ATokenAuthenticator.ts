/**
 * Abstract Token Authenticator
 *
 * Contract between the session and the auth endpoint. The session only talks to
 * this type, so tests and alternative backends can substitute their own.
 *
 * @see TokenAuthenticator for the concrete implementation
 */

import type { Credentials } from '../config/options.js';
import type { Session } from '../session/types.js';

export abstract class ATokenAuthenticator {
  /**
   * Perform the grant described by the credentials.
   *
   * @throws AuthenticationFailedError on rejected credentials or codes
   * @throws NetworkError on transport failure
   */
  abstract login(credentials: Credentials): Promise<Session>;

  /**
   * Exchange a refresh token for a new pair. Not retried on failure.
   *
   * @throws AuthenticationFailedError if the refresh token is expired or revoked
   * @throws NetworkError on transport failure
   */
  abstract refresh(refreshToken: string): Promise<Session>;

  /**
   * Invalidate an access token server-side. Never throws.
   */
  abstract revoke(accessToken: string): Promise<void>;

  /**
   * Invalidate every other session of the account. Never throws.
   */
  abstract killOtherSessions(accessToken: string): Promise<void>;

  /**
   * Accept a pending EULA and request game access. Never throws.
   */
  abstract acceptEulaIfNeeded(session: Session): Promise<void>;

  /**
   * Wait for background calls (session kills) started by login or refresh.
   */
  abstract drain(): Promise<void>;
}
