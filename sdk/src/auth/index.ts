export { ATokenAuthenticator } from './ATokenAuthenticator.js';
export { TokenAuthenticator, basicToken } from './tokenAuthenticator.js';
export type { TokenAuthenticatorConfig } from './tokenAuthenticator.js';
