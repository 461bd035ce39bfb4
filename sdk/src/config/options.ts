/**
 * Session options.
 *
 * Validated with zod when a session is created. Values missing from the options
 * fall back to the environment (see env.ts), then to the defaults below.
 */

import { z } from 'zod';

import { ConfigError } from '../errors/index.js';
import {
  DEFAULT_CHAT_DOMAIN,
  DEFAULT_ENDPOINTS,
  DEFAULT_RECONNECT_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_ROTATION_MARGIN_MS,
} from './constants.js';
import { envDefaults } from './env.js';

// =============================================================================
// CREDENTIALS
// =============================================================================

const passwordCredentialsSchema = z.object({
  grantType: z.literal('password'),
  email: z.string().email(),
  password: z.string().min(1),
  /** Six-digit code for accounts with two-factor authentication */
  twoFactorCode: z.string().regex(/^\d{6}$/, 'must be six digits').optional(),
});

const exchangeCodeCredentialsSchema = z.object({
  grantType: z.literal('exchange_code'),
  exchangeCode: z.string().min(1),
  /** Exchange codes minted by the companion app must be redeemed with the Kairos client */
  kairos: z.boolean().default(false),
});

const refreshTokenCredentialsSchema = z.object({
  grantType: z.literal('refresh_token'),
  refreshToken: z.string().min(1),
});

const deviceAuthCredentialsSchema = z.object({
  grantType: z.literal('device_auth'),
  accountId: z.string().min(1),
  deviceId: z.string().min(1),
  secret: z.string().min(1),
});

export const credentialsSchema = z.discriminatedUnion('grantType', [
  passwordCredentialsSchema,
  exchangeCodeCredentialsSchema,
  refreshTokenCredentialsSchema,
  deviceAuthCredentialsSchema,
]);

export type Credentials = z.infer<typeof credentialsSchema>;
export type CredentialsInput = z.input<typeof credentialsSchema>;
export type GrantType = Credentials['grantType'];

// =============================================================================
// OPTIONS
// =============================================================================

const clientSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
});

export type OAuthClient = z.infer<typeof clientSchema>;

const chatOptionsSchema = z
  .object({
    domain: z.string().default(DEFAULT_CHAT_DOMAIN),
    /** Platform tag used in the XMPP resource, e.g. WIN, MAC, PSN */
    platform: z.string().default('WIN'),
    reconnectOnError: z.boolean().default(true),
    reconnectDelayMs: z.number().int().nonnegative().default(DEFAULT_RECONNECT_DELAY_MS),
  })
  .default({});

const endpointsSchema = z
  .object({
    account: z.string().url().default(DEFAULT_ENDPOINTS.account),
    eulaTracking: z.string().url().default(DEFAULT_ENDPOINTS.eulaTracking),
    fortnite: z.string().url().default(DEFAULT_ENDPOINTS.fortnite),
    chat: z.string().url().default(DEFAULT_ENDPOINTS.chat),
  })
  .default({});

export const sessionOptionsSchema = z.object({
  credentials: credentialsSchema,
  client: clientSchema,
  kairosClient: clientSchema.optional(),
  refreshAutomatically: z.boolean().default(true),
  killOtherSessions: z.boolean().default(true),
  acceptEula: z.boolean().default(false),
  enableChat: z.boolean().default(false),
  handleShutdown: z.boolean().default(false),
  rearmOnRotation: z.boolean().default(false),
  rotationMarginMs: z.number().int().nonnegative().default(DEFAULT_ROTATION_MARGIN_MS),
  requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  userAgent: z.string().min(1),
  endpoints: endpointsSchema,
  chat: chatOptionsSchema,
});

export type ResolvedSessionOptions = z.infer<typeof sessionOptionsSchema>;

/**
 * Options accepted by `AthenaSession.create`.
 *
 * `client` and `userAgent` may be left out when the environment provides them.
 */
export type SessionOptions = Omit<z.input<typeof sessionOptionsSchema>, 'client' | 'userAgent'> & {
  client?: OAuthClient;
  userAgent?: string;
};

/**
 * Validate options and fill in defaults.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveSessionOptions(options: SessionOptions): ResolvedSessionOptions {
  const result = sessionOptionsSchema.safeParse({
    ...options,
    client: options.client ?? envDefaults.client,
    kairosClient: options.kairosClient ?? envDefaults.kairosClient,
    userAgent: options.userAgent ?? envDefaults.userAgent,
  });

  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid session options', issues);
  }

  const resolved = result.data;
  if (
    resolved.credentials.grantType === 'exchange_code' &&
    resolved.credentials.kairos &&
    !resolved.kairosClient
  ) {
    throw new ConfigError('Invalid session options', [
      'kairosClient: required when redeeming a Kairos exchange code',
    ]);
  }

  return resolved;
}
