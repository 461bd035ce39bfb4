/**
 * OAuth client for the account service's token endpoint.
 *
 * Grants: password (with the one-time-password follow-up for accounts with
 * two-factor authentication), exchange_code (primary or Kairos client),
 * refresh_token and device_auth.
 */

import { TWO_FACTOR_REQUIRED_CODE } from '../config/constants.js';
import { decoders } from '../decoding/decoders.js';
import {
  AthenaError,
  AuthenticationFailedError,
  NetworkError,
  formatError,
} from '../errors/index.js';
import { logger } from '../utils/logging/logger.js';
import { ATokenAuthenticator } from './ATokenAuthenticator.js';

import type { Credentials, OAuthClient } from '../config/options.js';
import type { HttpClient } from '../http/httpClient.js';
import type { Session } from '../session/types.js';

export interface TokenAuthenticatorConfig {
  client: OAuthClient;
  kairosClient?: OAuthClient;
  /** Base URL of the account service */
  accountBaseUrl: string;
  eulaTrackingBaseUrl: string;
  fortniteBaseUrl: string;
  /** Kill every other session of the account after each login and refresh */
  killOtherSessions: boolean;
}

/**
 * `basic` authorization value for an OAuth client.
 */
export function basicToken(client: OAuthClient): string {
  return Buffer.from(`${client.clientId}:${client.clientSecret}`).toString('base64');
}

export class TokenAuthenticator extends ATokenAuthenticator {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly http: HttpClient,
    private readonly config: TokenAuthenticatorConfig
  ) {
    super();
  }

  async login(credentials: Credentials): Promise<Session> {
    let session: Session;
    switch (credentials.grantType) {
      case 'password':
        session = await this.passwordGrant(credentials.email, credentials.password, credentials.twoFactorCode);
        break;
      case 'exchange_code':
        session = await this.grant(
          { grant_type: 'exchange_code', exchange_code: credentials.exchangeCode },
          credentials.kairos ? this.kairosClient() : this.config.client
        );
        break;
      case 'refresh_token':
        session = await this.grant({ grant_type: 'refresh_token', refresh_token: credentials.refreshToken });
        break;
      case 'device_auth':
        session = await this.grant({
          grant_type: 'device_auth',
          account_id: credentials.accountId,
          device_id: credentials.deviceId,
          secret: credentials.secret,
        });
        break;
    }

    logger.info(`Authenticated with ${credentials.grantType} grant`, {
      component: 'TokenAuthenticator',
      accountId: session.accountId,
    });
    this.afterGrant(session);
    return session;
  }

  async refresh(refreshToken: string): Promise<Session> {
    const session = await this.grant({ grant_type: 'refresh_token', refresh_token: refreshToken });
    logger.info('Refreshed session', {
      component: 'TokenAuthenticator',
      accountId: session.accountId,
      expiresAt: session.accessTokenExpiresAt.toISOString(),
    });
    this.afterGrant(session);
    return session;
  }

  async revoke(accessToken: string): Promise<void> {
    try {
      await this.http.send({
        method: 'DELETE',
        url: `${this.config.accountBaseUrl}/account/api/oauth/sessions/kill/${encodeURIComponent(accessToken)}`,
        headers: { Authorization: `bearer ${accessToken}` },
      });
      logger.debug('Revoked access token', { component: 'TokenAuthenticator' });
    } catch (error) {
      logger.warn(`Failed to revoke access token: ${formatError(error)}`, {
        component: 'TokenAuthenticator',
      });
    }
  }

  async killOtherSessions(accessToken: string): Promise<void> {
    try {
      await this.http.send({
        method: 'DELETE',
        url: `${this.config.accountBaseUrl}/account/api/oauth/sessions/kill`,
        query: { killType: 'OTHERS_ACCOUNT_CLIENT_SERVICE' },
        headers: { Authorization: `bearer ${accessToken}` },
      });
      logger.debug('Killed other sessions', { component: 'TokenAuthenticator' });
    } catch (error) {
      logger.warn(`Failed to kill other sessions: ${formatError(error)}`, {
        component: 'TokenAuthenticator',
      });
    }
  }

  async acceptEulaIfNeeded(session: Session): Promise<void> {
    const accountId = encodeURIComponent(session.accountId);
    const headers = { Authorization: `bearer ${session.accessToken}` };

    try {
      const agreement = await this.http.request(
        {
          url: `${this.config.eulaTrackingBaseUrl}/eulatracking/api/public/agreements/fn/account/${accountId}`,
          query: { locale: 'en' },
          headers,
        },
        decoders.eulaAgreement
      );

      if (!agreement) {
        logger.debug('No pending EULA', { component: 'TokenAuthenticator', accountId: session.accountId });
        return;
      }

      await this.http.send({
        method: 'POST',
        url: `${this.config.eulaTrackingBaseUrl}/eulatracking/api/public/agreements/fn/version/${agreement.version}/account/${accountId}/accept`,
        query: { locale: agreement.locale ?? 'en' },
        headers,
      });
      await this.http.send({
        method: 'POST',
        url: `${this.config.fortniteBaseUrl}/fortnite/api/game/v2/grant_access/${accountId}`,
        headers,
        json: {},
      });

      logger.info(`Accepted EULA version ${agreement.version}`, {
        component: 'TokenAuthenticator',
        accountId: session.accountId,
      });
    } catch (error) {
      logger.warn(`Failed to accept EULA: ${formatError(error)}`, {
        component: 'TokenAuthenticator',
        accountId: session.accountId,
      });
    }
  }

  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private afterGrant(session: Session): void {
    if (!this.config.killOtherSessions) {
      return;
    }

    const task = this.killOtherSessions(session.accessToken).catch((error: unknown) => {
      logger.error('Unexpected failure killing other sessions', error, { component: 'TokenAuthenticator' });
    });
    this.pending.add(task);
    task.then(() => this.pending.delete(task)).catch((error: unknown) => {
      logger.error('Failed to track session kill', error, { component: 'TokenAuthenticator' });
    });
  }

  private async passwordGrant(email: string, password: string, twoFactorCode?: string): Promise<Session> {
    try {
      return await this.grant({ grant_type: 'password', username: email, password });
    } catch (error) {
      if (!(error instanceof AuthenticationFailedError) || error.errorCode !== TWO_FACTOR_REQUIRED_CODE) {
        throw error;
      }

      const challenge = error.body?.challenge;
      if (!twoFactorCode || !challenge) {
        throw new AuthenticationFailedError('Two-factor authentication code required', {
          statusCode: error.statusCode,
          body: error.body,
          cause: error,
        });
      }

      logger.info('Completing two-factor authentication', { component: 'TokenAuthenticator' });
      return this.grant({ grant_type: 'otp', otp: twoFactorCode, challenge });
    }
  }

  private kairosClient(): OAuthClient {
    if (!this.config.kairosClient) {
      throw new AuthenticationFailedError('No Kairos client configured for this exchange code');
    }
    return this.config.kairosClient;
  }

  /**
   * POST to the token endpoint. Rejections from the endpoint (4xx) become
   * AuthenticationFailedError; NetworkError passes through.
   */
  private async grant(form: Record<string, string>, client: OAuthClient = this.config.client): Promise<Session> {
    try {
      return await this.http.request(
        {
          method: 'POST',
          url: `${this.config.accountBaseUrl}/account/api/oauth/token`,
          headers: { Authorization: `basic ${basicToken(client)}` },
          form: { ...form, token_type: 'eg1' },
        },
        decoders.session
      );
    } catch (error) {
      if (error instanceof NetworkError || error instanceof AuthenticationFailedError) {
        throw error;
      }
      if (error instanceof AthenaError && error.statusCode !== undefined) {
        throw new AuthenticationFailedError(`${form.grant_type} grant rejected: ${error.message}`, {
          statusCode: error.statusCode,
          body: error.body,
          cause: error,
        });
      }
      throw error;
    }
  }
}
