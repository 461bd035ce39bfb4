/**
 * Response decoders, selected by resource tag.
 *
 * The mapping is closed: adding a resource means adding a tag and its decoder
 * here. Each decoder validates the body against its schema and converts it to
 * the SDK's own type.
 */

import { DecodeError } from '../errors/index.js';
import {
  accountSchema,
  eulaAgreementSchema,
  tokenResponseSchema,
} from './schemas.js';

import type { z, ZodTypeAny } from 'zod';
import type { Account } from '../accounts/types.js';
import type { Session } from '../session/types.js';
import type { AccountPayload, EulaAgreement, TokenResponse } from './schemas.js';

function parseWith<S extends ZodTypeAny>(schema: S, tag: string, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new DecodeError(`Unexpected ${tag} payload: ${issues.join('; ')}`);
  }
  return result.data;
}

function expiry(isoTimestamp: string | undefined, seconds: number | undefined, issuedAt: number): Date {
  if (isoTimestamp !== undefined) {
    return new Date(isoTimestamp);
  }
  return new Date(issuedAt + (seconds ?? 0) * 1000);
}

export function toSession(token: TokenResponse, issuedAt: number = Date.now()): Session {
  return {
    accountId: token.account_id,
    accessToken: token.access_token,
    accessTokenExpiresAt: expiry(token.expires_at, token.expires_in, issuedAt),
    refreshToken: token.refresh_token,
    refreshTokenExpiresAt: expiry(token.refresh_expires_at, token.refresh_expires, issuedAt),
    tokenType: token.token_type,
    displayName: token.displayName,
    clientId: token.client_id,
    deviceId: token.device_id,
    inAppId: token.in_app_id,
    app: token.app,
  };
}

export function toAccount(payload: AccountPayload): Account {
  return {
    id: payload.id,
    displayName: payload.displayName,
    externalAuths: Object.fromEntries(
      Object.entries(payload.externalAuths).map(([platform, auth]) => [
        platform,
        { type: auth.type, displayName: auth.externalDisplayName, accountId: auth.accountId },
      ])
    ),
  };
}

export const decoders = {
  session: (body: unknown): Session => toSession(parseWith(tokenResponseSchema, 'session', body)),
  account: (body: unknown): Account => toAccount(parseWith(accountSchema, 'account', body)),
  accounts: (body: unknown): Account[] =>
    parseWith(accountSchema.array(), 'accounts', body).map((payload) => toAccount(payload)),
  eulaAgreement: (body: unknown): EulaAgreement | undefined =>
    // The tracking service answers with an empty body when nothing is pending
    body === undefined ? undefined : parseWith(eulaAgreementSchema, 'eulaAgreement', body),
} as const;

export type ResourceTag = keyof typeof decoders;
