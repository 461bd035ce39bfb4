import { NotAuthenticatedError } from '../errors/index.js';

import type { Session } from './types.js';

/**
 * Holds the current session.
 *
 * `set` freezes the session and swaps the reference in a single assignment, so a
 * reader observes either the previous session or the new one, never a mix of
 * their fields.
 */
export class CredentialStore {
  private current: Session | undefined;

  /**
   * @throws NotAuthenticatedError before the first `set`
   */
  get(): Session {
    const session = this.current;
    if (!session) {
      throw new NotAuthenticatedError();
    }
    return session;
  }

  /**
   * Current session, or undefined before the first `set` and after `clear`.
   */
  peek(): Session | undefined {
    return this.current;
  }

  set(session: Session): void {
    this.current = Object.freeze({ ...session });
  }

  clear(): void {
    this.current = undefined;
  }

  hasSession(): boolean {
    return this.current !== undefined;
  }
}
