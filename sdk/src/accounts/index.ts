export { AccountsService, MAX_ACCOUNTS_PER_LOOKUP } from './accountsService.js';
export type { Account, ExternalAuth } from './types.js';
