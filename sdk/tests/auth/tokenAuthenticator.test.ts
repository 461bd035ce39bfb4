/**
 * Unit Tests for the TokenAuthenticator
 *
 * Covers every grant, the two-factor follow-up, error mapping, revocation,
 * session kills and EULA acceptance against an in-process fetch.
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { TokenAuthenticator, basicToken } from '../../src/auth/tokenAuthenticator.js';
import { HttpClient } from '../../src/http/httpClient.js';
import { RequestSigner } from '../../src/http/requestSigner.js';
import { CredentialStore } from '../../src/session/credentialStore.js';
import { TWO_FACTOR_REQUIRED_CODE } from '../../src/config/constants.js';
import {
  AuthenticationFailedError,
  DecodeError,
  NetworkError,
} from '../../src/errors/index.js';
import { FakeFetch, formOf } from '../helpers/fakeFetch.js';
import { TEST_CLIENT, createMockSession, createMockTokenResponse } from '../helpers/fixtures.js';
import type { TokenAuthenticatorConfig } from '../../src/auth/tokenAuthenticator.js';

const TOKEN_URL = 'https://account.test/account/api/oauth/token';
const KAIROS_CLIENT = { clientId: 'test-kairos', clientSecret: 'test-kairos-secret' };

function createAuthenticator(
  fake: FakeFetch,
  overrides: Partial<TokenAuthenticatorConfig> = {}
): TokenAuthenticator {
  const http = new HttpClient(new RequestSigner(new CredentialStore(), 'TestAgent/1.0'), { fetch: fake.fetch });
  return new TokenAuthenticator(http, {
    client: TEST_CLIENT,
    kairosClient: KAIROS_CLIENT,
    accountBaseUrl: 'https://account.test',
    eulaTrackingBaseUrl: 'https://eula.test',
    fortniteBaseUrl: 'https://fortnite.test',
    killOtherSessions: false,
    ...overrides,
  });
}

describe('TokenAuthenticator', () => {
  let fake: FakeFetch;

  beforeEach(() => {
    fake = new FakeFetch();
    mock.method(console, 'log', () => {});
    mock.method(console, 'warn', () => {});
    mock.method(console, 'error', () => {});
  });

  afterEach(() => {
    mock.restoreAll();
  });

  describe('basicToken', () => {
    it('should base64-encode id:secret', () => {
      assert.strictEqual(basicToken({ clientId: 'id', clientSecret: 'secret' }), 'aWQ6c2VjcmV0');
    });
  });

  describe('login', () => {
    it('should perform the password grant with the client credentials', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse() });
      const authenticator = createAuthenticator(fake);

      const session = await authenticator.login({
        grantType: 'password',
        email: 'player@example.test',
        password: 'test-password',
      });

      assert.strictEqual(fake.calls.length, 1);
      assert.strictEqual(fake.calls[0].url, TOKEN_URL);
      assert.strictEqual(fake.calls[0].headers.authorization, `basic ${basicToken(TEST_CLIENT)}`);
      assert.strictEqual(fake.calls[0].headers['content-type'], 'application/x-www-form-urlencoded');
      assert.deepStrictEqual(formOf(fake.calls[0]), {
        grant_type: 'password',
        username: 'player@example.test',
        password: 'test-password',
        token_type: 'eg1',
      });

      assert.strictEqual(session.accountId, 'account-1');
      assert.strictEqual(session.accessToken, 'access-1');
      assert.strictEqual(session.refreshToken, 'refresh-1');
      assert.strictEqual(session.accessTokenExpiresAt.toISOString(), '2030-01-01T08:00:00.000Z');
      assert.strictEqual(session.refreshTokenExpiresAt.toISOString(), '2030-01-02T00:00:00.000Z');
      assert.strictEqual(session.app, 'fortnite');
    });

    it('should complete the otp grant when a two-factor code is supplied', async () => {
      fake.on('POST', '/oauth/token', (call) =>
        formOf(call).grant_type === 'password'
          ? { status: 400, body: { errorCode: TWO_FACTOR_REQUIRED_CODE, challenge: 'challenge-1' } }
          : { body: createMockTokenResponse({ accessToken: 'access-2fa' }) }
      );
      const authenticator = createAuthenticator(fake);

      const session = await authenticator.login({
        grantType: 'password',
        email: 'player@example.test',
        password: 'test-password',
        twoFactorCode: '123456',
      });

      assert.strictEqual(session.accessToken, 'access-2fa');
      assert.strictEqual(fake.calls.length, 2);
      assert.deepStrictEqual(formOf(fake.calls[1]), {
        grant_type: 'otp',
        otp: '123456',
        challenge: 'challenge-1',
        token_type: 'eg1',
      });
    });

    it('should fail when two-factor authentication is required and no code was given', async () => {
      fake.on('POST', '/oauth/token', {
        status: 400,
        body: { errorCode: TWO_FACTOR_REQUIRED_CODE, challenge: 'challenge-1' },
      });
      const authenticator = createAuthenticator(fake);

      await assert.rejects(
        authenticator.login({ grantType: 'password', email: 'player@example.test', password: 'test-password' }),
        (error: unknown) => {
          assert.ok(error instanceof AuthenticationFailedError);
          assert.strictEqual(error.message, 'Two-factor authentication code required');
          assert.strictEqual(error.statusCode, 400);
          return true;
        }
      );
      assert.strictEqual(fake.calls.length, 1);
    });

    it('should map rejected credentials to AuthenticationFailedError', async () => {
      fake.on('POST', '/oauth/token', {
        status: 400,
        body: {
          errorCode: 'errors.com.epicgames.account.invalid_account_credentials',
          errorMessage: 'Sorry the account credentials you are using are invalid',
        },
      });
      const authenticator = createAuthenticator(fake);

      await assert.rejects(
        authenticator.login({ grantType: 'password', email: 'player@example.test', password: 'wrong' }),
        (error: unknown) => {
          assert.ok(error instanceof AuthenticationFailedError);
          assert.strictEqual(
            error.message,
            `password grant rejected: POST ${TOKEN_URL} returned 400: Sorry the account credentials you are using are invalid`
          );
          assert.strictEqual(error.errorCode, 'errors.com.epicgames.account.invalid_account_credentials');
          assert.strictEqual(error.isRetryable, false);
          return true;
        }
      );
    });

    it('should surface server errors as NetworkError', async () => {
      fake.on('POST', '/oauth/token', { status: 502 });
      const authenticator = createAuthenticator(fake);

      await assert.rejects(
        authenticator.login({ grantType: 'refresh_token', refreshToken: 'refresh-0' }),
        NetworkError
      );
    });

    it('should redeem Kairos exchange codes with the Kairos client', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse() });
      const authenticator = createAuthenticator(fake);

      await authenticator.login({ grantType: 'exchange_code', exchangeCode: 'exchange-1', kairos: true });

      assert.strictEqual(fake.calls[0].headers.authorization, `basic ${basicToken(KAIROS_CLIENT)}`);
      assert.deepStrictEqual(formOf(fake.calls[0]), {
        grant_type: 'exchange_code',
        exchange_code: 'exchange-1',
        token_type: 'eg1',
      });
    });

    it('should redeem regular exchange codes with the primary client', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse() });
      const authenticator = createAuthenticator(fake);

      await authenticator.login({ grantType: 'exchange_code', exchangeCode: 'exchange-1', kairos: false });

      assert.strictEqual(fake.calls[0].headers.authorization, `basic ${basicToken(TEST_CLIENT)}`);
    });

    it('should fail a Kairos exchange without a Kairos client', async () => {
      const authenticator = createAuthenticator(fake, { kairosClient: undefined });

      await assert.rejects(
        authenticator.login({ grantType: 'exchange_code', exchangeCode: 'exchange-1', kairos: true }),
        AuthenticationFailedError
      );
      assert.strictEqual(fake.calls.length, 0);
    });

    it('should send device auth fields', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse() });
      const authenticator = createAuthenticator(fake);

      await authenticator.login({
        grantType: 'device_auth',
        accountId: 'account-1',
        deviceId: 'device-1',
        secret: 'test-device-secret',
      });

      assert.deepStrictEqual(formOf(fake.calls[0]), {
        grant_type: 'device_auth',
        account_id: 'account-1',
        device_id: 'device-1',
        secret: 'test-device-secret',
        token_type: 'eg1',
      });
    });

    it('should reject a token response that does not decode', async () => {
      fake.on('POST', '/oauth/token', { body: { account_id: 'account-1' } });
      const authenticator = createAuthenticator(fake);

      await assert.rejects(
        authenticator.login({ grantType: 'refresh_token', refreshToken: 'refresh-0' }),
        DecodeError
      );
    });

    it('should fall back to relative expiry fields', async () => {
      const token = createMockTokenResponse();
      delete token.expires_at;
      delete token.refresh_expires_at;
      fake.on('POST', '/oauth/token', { body: token });
      const authenticator = createAuthenticator(fake);

      const before = Date.now();
      const session = await authenticator.login({ grantType: 'refresh_token', refreshToken: 'refresh-0' });
      const after = Date.now();

      const accessExpiry = session.accessTokenExpiresAt.getTime();
      assert.ok(accessExpiry >= before + 28800 * 1000 && accessExpiry <= after + 28800 * 1000);
      const refreshExpiry = session.refreshTokenExpiresAt.getTime();
      assert.ok(refreshExpiry >= before + 86400 * 1000 && refreshExpiry <= after + 86400 * 1000);
    });
  });

  describe('refresh', () => {
    it('should perform the refresh_token grant', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse({ accessToken: 'access-2' }) });
      const authenticator = createAuthenticator(fake);

      const session = await authenticator.refresh('refresh-1');

      assert.strictEqual(session.accessToken, 'access-2');
      assert.deepStrictEqual(formOf(fake.calls[0]), {
        grant_type: 'refresh_token',
        refresh_token: 'refresh-1',
        token_type: 'eg1',
      });
    });

    it('should fail without retrying when the refresh token is expired', async () => {
      fake.on('POST', '/oauth/token', {
        status: 400,
        body: { errorCode: 'errors.com.epicgames.account.auth_token.invalid_refresh_token' },
      });
      const authenticator = createAuthenticator(fake);

      await assert.rejects(authenticator.refresh('refresh-expired'), (error: unknown) => {
        assert.ok(error instanceof AuthenticationFailedError);
        assert.strictEqual(error.errorCode, 'errors.com.epicgames.account.auth_token.invalid_refresh_token');
        return true;
      });
      assert.strictEqual(fake.calls.length, 1);
    });
  });

  describe('killOtherSessions', () => {
    it('should kill other sessions after a successful login when enabled', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse() });
      fake.on('DELETE', '/oauth/sessions/kill', { status: 204 });
      const authenticator = createAuthenticator(fake, { killOtherSessions: true });

      await authenticator.login({ grantType: 'refresh_token', refreshToken: 'refresh-0' });
      await authenticator.drain();

      const kills = fake.callsTo('DELETE', 'killType=OTHERS_ACCOUNT_CLIENT_SERVICE');
      assert.strictEqual(kills.length, 1);
      assert.strictEqual(
        kills[0].url,
        'https://account.test/account/api/oauth/sessions/kill?killType=OTHERS_ACCOUNT_CLIENT_SERVICE'
      );
      assert.strictEqual(kills[0].headers.authorization, 'bearer access-1');
    });

    it('should kill other sessions after a refresh when enabled', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse({ accessToken: 'access-2' }) });
      fake.on('DELETE', '/oauth/sessions/kill', { status: 204 });
      const authenticator = createAuthenticator(fake, { killOtherSessions: true });

      await authenticator.refresh('refresh-1');
      await authenticator.drain();

      const kills = fake.callsTo('DELETE', 'killType=');
      assert.strictEqual(kills.length, 1);
      assert.strictEqual(kills[0].headers.authorization, 'bearer access-2');
    });

    it('should not kill other sessions when disabled', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse() });
      const authenticator = createAuthenticator(fake);

      await authenticator.login({ grantType: 'refresh_token', refreshToken: 'refresh-0' });
      await authenticator.drain();

      assert.strictEqual(fake.callsTo('DELETE', 'killType=').length, 0);
    });

    it('should not fail the login when the kill fails', async () => {
      fake.on('POST', '/oauth/token', { body: createMockTokenResponse() });
      fake.on('DELETE', '/oauth/sessions/kill', new Error('connection reset'));
      const authenticator = createAuthenticator(fake, { killOtherSessions: true });

      const session = await authenticator.login({ grantType: 'refresh_token', refreshToken: 'refresh-0' });
      await authenticator.drain();

      assert.strictEqual(session.accountId, 'account-1');
    });
  });

  describe('revoke', () => {
    it('should delete the token session', async () => {
      fake.on('DELETE', '/oauth/sessions/kill/', { status: 204 });
      const authenticator = createAuthenticator(fake);

      await authenticator.revoke('access-1');

      assert.strictEqual(fake.calls.length, 1);
      assert.strictEqual(fake.calls[0].url, 'https://account.test/account/api/oauth/sessions/kill/access-1');
      assert.strictEqual(fake.calls[0].headers.authorization, 'bearer access-1');
    });

    it('should swallow and log failures', async () => {
      const warn = mock.method(console, 'warn', () => {});
      fake.on('DELETE', '/oauth/sessions/kill/', { status: 500 });
      const authenticator = createAuthenticator(fake);

      await authenticator.revoke('access-1');

      assert.strictEqual(fake.calls.length, 1);
      assert.strictEqual(warn.mock.callCount(), 1);
      const line = String(warn.mock.calls[0].arguments[0]);
      assert.ok(line.endsWith('Failed to revoke access token: [NETWORK_ERROR] DELETE https://account.test/account/api/oauth/sessions/kill/access-1 returned 500'));
    });
  });

  describe('acceptEulaIfNeeded', () => {
    const session = createMockSession();

    it('should accept a pending agreement and request game access', async () => {
      fake.on('GET', '/eulatracking/api/public/agreements/fn/account/account-1', {
        body: { key: 'fn', version: 3, locale: 'en' },
      });
      fake.on('POST', '/accept', { status: 204 });
      fake.on('POST', '/grant_access/', { status: 204 });
      const authenticator = createAuthenticator(fake);

      await authenticator.acceptEulaIfNeeded(session);

      assert.deepStrictEqual(
        fake.calls.map((call) => `${call.method} ${call.url}`),
        [
          'GET https://eula.test/eulatracking/api/public/agreements/fn/account/account-1?locale=en',
          'POST https://eula.test/eulatracking/api/public/agreements/fn/version/3/account/account-1/accept?locale=en',
          'POST https://fortnite.test/fortnite/api/game/v2/grant_access/account-1',
        ]
      );
      assert.strictEqual(fake.calls[1].headers.authorization, 'bearer access-1');
    });

    it('should do nothing when no agreement is pending', async () => {
      fake.on('GET', '/eulatracking/', { status: 204 });
      const authenticator = createAuthenticator(fake);

      await authenticator.acceptEulaIfNeeded(session);

      assert.strictEqual(fake.calls.length, 1);
    });

    it('should not throw when the tracking service fails', async () => {
      fake.on('GET', '/eulatracking/', { status: 500 });
      const authenticator = createAuthenticator(fake);

      await authenticator.acceptEulaIfNeeded(session);

      assert.strictEqual(fake.calls.length, 1);
    });
  });
});
