/**
 * Account lookups by ID and display name.
 */

import { ServiceError } from '../errors/index.js';
import { decoders } from '../decoding/decoders.js';

import type { HttpClient } from '../http/httpClient.js';
import type { Account } from './types.js';

/** The lookup endpoint accepts at most this many IDs per call. */
export const MAX_ACCOUNTS_PER_LOOKUP = 100;

const NOT_FOUND_CODE = 'errors.com.epicgames.account.account_not_found';

function isNotFound(error: unknown): boolean {
  return error instanceof ServiceError && (error.statusCode === 404 || error.errorCode === NOT_FOUND_CODE);
}

export class AccountsService {
  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string
  ) {}

  /**
   * @returns the account, or undefined if no account has that display name
   */
  async findByDisplayName(displayName: string): Promise<Account | undefined> {
    try {
      return await this.http.request(
        { url: `${this.baseUrl}/account/api/public/account/displayName/${encodeURIComponent(displayName)}` },
        decoders.account
      );
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  /**
   * @returns the account, or undefined if the ID is unknown
   */
  async findOneByAccountId(accountId: string): Promise<Account | undefined> {
    try {
      return await this.http.request(
        { url: `${this.baseUrl}/account/api/public/account/${encodeURIComponent(accountId)}` },
        decoders.account
      );
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  /**
   * Look up several accounts. Unknown IDs are left out of the result; an empty
   * input makes no request.
   */
  async findManyByAccountId(accountIds: Iterable<string>): Promise<Account[]> {
    const ids = [...new Set(accountIds)];
    const accounts: Account[] = [];

    for (let start = 0; start < ids.length; start += MAX_ACCOUNTS_PER_LOOKUP) {
      const batch = ids.slice(start, start + MAX_ACCOUNTS_PER_LOOKUP);
      const found = await this.http.request(
        { url: `${this.baseUrl}/account/api/public/account`, query: { accountId: batch } },
        decoders.accounts
      );
      accounts.push(...found);
    }

    return accounts;
  }
}
