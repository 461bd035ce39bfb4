import type { Session } from '../../src/session/types.js';

export const TEST_CLIENT = { clientId: 'test-client', clientSecret: 'test-secret' };
export const TEST_ACCOUNT_ID = 'account-1';

// ============================================================================
// Mock Data Factories
// ============================================================================

export function createMockTokenResponse(
  overrides: {
    accessToken?: string;
    refreshToken?: string;
    accountId?: string;
    expiresAt?: string;
    refreshExpiresAt?: string;
    displayName?: string;
  } = {}
): Record<string, unknown> {
  return {
    access_token: overrides.accessToken ?? 'access-1',
    expires_in: 28800,
    expires_at: overrides.expiresAt ?? '2030-01-01T08:00:00.000Z',
    token_type: 'bearer',
    refresh_token: overrides.refreshToken ?? 'refresh-1',
    refresh_expires: 86400,
    refresh_expires_at: overrides.refreshExpiresAt ?? '2030-01-02T00:00:00.000Z',
    account_id: overrides.accountId ?? TEST_ACCOUNT_ID,
    client_id: TEST_CLIENT.clientId,
    displayName: overrides.displayName,
    app: 'fortnite',
    in_app_id: overrides.accountId ?? TEST_ACCOUNT_ID,
  };
}

export function createMockSession(overrides: Partial<Session> = {}): Session {
  return {
    accountId: TEST_ACCOUNT_ID,
    accessToken: 'access-1',
    accessTokenExpiresAt: new Date('2030-01-01T08:00:00.000Z'),
    refreshToken: 'refresh-1',
    refreshTokenExpiresAt: new Date('2030-01-02T00:00:00.000Z'),
    tokenType: 'bearer',
    ...overrides,
  };
}
