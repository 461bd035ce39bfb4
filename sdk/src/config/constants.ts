/**
 * Service endpoints and timing defaults.
 */

export const DEFAULT_ENDPOINTS = {
  account: 'https://account-public-service-prod03.ol.epicgames.com',
  eulaTracking: 'https://eulatracking-public-service-prod-m.ol.epicgames.com',
  fortnite: 'https://fortnite-public-service-prod11.ol.epicgames.com',
  chat: 'wss://xmpp-service-prod.ol.epicgames.com',
} as const;

export type Endpoints = { [K in keyof typeof DEFAULT_ENDPOINTS]: string };

/** Rotation fires this long before a token expires. */
export const DEFAULT_ROTATION_MARGIN_MS = 5 * 60 * 1000;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const DEFAULT_CHAT_DOMAIN = 'prod.ol.epicgames.com';

export const DEFAULT_RECONNECT_DELAY_MS = 5_000;

/** Error code the token endpoint returns when the account needs a 2FA code. */
export const TWO_FACTOR_REQUIRED_CODE = 'errors.com.epicgames.common.two_factor_authentication.required';
