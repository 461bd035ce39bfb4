/**
 * Tests for AccountsService lookups.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AccountsService, MAX_ACCOUNTS_PER_LOOKUP } from '../../src/accounts/accountsService.js';
import { HttpClient } from '../../src/http/httpClient.js';
import { RequestSigner } from '../../src/http/requestSigner.js';
import { CredentialStore } from '../../src/session/credentialStore.js';
import { DecodeError, ServiceError } from '../../src/errors/index.js';
import { FakeFetch } from '../helpers/fakeFetch.js';
import { createMockSession } from '../helpers/fixtures.js';

const BASE = 'https://account.test';

describe('AccountsService', () => {
  let fake: FakeFetch;
  let accounts: AccountsService;

  beforeEach(() => {
    fake = new FakeFetch();
    const store = new CredentialStore();
    store.set(createMockSession({ accessToken: 'access-5' }));
    accounts = new AccountsService(new HttpClient(new RequestSigner(store, 'TestAgent/1.0'), { fetch: fake.fetch }), BASE);
  });

  describe('findByDisplayName', () => {
    it('should look the name up and map external auths', async () => {
      fake.on('GET', '/displayName/', {
        body: {
          id: 'friend-1',
          displayName: 'Some Friend',
          externalAuths: {
            psn: { type: 'psn', externalDisplayName: 'FriendOnPsn', accountId: 'psn-1' },
          },
        },
      });

      const account = await accounts.findByDisplayName('Some Friend');

      assert.strictEqual(fake.calls[0].url, `${BASE}/account/api/public/account/displayName/Some%20Friend`);
      assert.strictEqual(fake.calls[0].headers.authorization, 'bearer access-5');
      assert.deepStrictEqual(account, {
        id: 'friend-1',
        displayName: 'Some Friend',
        externalAuths: { psn: { type: 'psn', displayName: 'FriendOnPsn', accountId: 'psn-1' } },
      });
    });

    it('should return undefined for an unknown name', async () => {
      fake.on('GET', '/displayName/', {
        status: 404,
        body: { errorCode: 'errors.com.epicgames.account.account_not_found' },
      });

      assert.strictEqual(await accounts.findByDisplayName('nobody'), undefined);
    });

    it('should rethrow other errors', async () => {
      fake.on('GET', '/displayName/', { status: 403, body: { errorCode: 'errors.test.forbidden' } });

      await assert.rejects(accounts.findByDisplayName('someone'), ServiceError);
    });
  });

  describe('findOneByAccountId', () => {
    it('should default missing external auths to an empty map', async () => {
      fake.on('GET', '/account/api/public/account/friend-2', { body: { id: 'friend-2' } });

      const account = await accounts.findOneByAccountId('friend-2');

      assert.deepStrictEqual(account, { id: 'friend-2', displayName: undefined, externalAuths: {} });
    });

    it('should reject a payload without an id', async () => {
      fake.on('GET', '/account/api/public/account/friend-3', { body: { displayName: 'No Id' } });

      await assert.rejects(accounts.findOneByAccountId('friend-3'), DecodeError);
    });
  });

  describe('findManyByAccountId', () => {
    it('should make no request for an empty input', async () => {
      assert.deepStrictEqual(await accounts.findManyByAccountId([]), []);
      assert.strictEqual(fake.calls.length, 0);
    });

    it('should deduplicate IDs and split them into batches', async () => {
      fake.on('GET', `${BASE}/account/api/public/account?`, (call) => {
        const ids = new URL(call.url).searchParams.getAll('accountId');
        return { body: ids.map((id) => ({ id })) };
      });
      const ids = Array.from({ length: MAX_ACCOUNTS_PER_LOOKUP + 5 }, (_, i) => `id-${i}`);

      const found = await accounts.findManyByAccountId([...ids, 'id-0']);

      assert.strictEqual(fake.calls.length, 2);
      assert.strictEqual(new URL(fake.calls[0].url).searchParams.getAll('accountId').length, MAX_ACCOUNTS_PER_LOOKUP);
      assert.strictEqual(new URL(fake.calls[1].url).searchParams.getAll('accountId').length, 5);
      assert.strictEqual(found.length, MAX_ACCOUNTS_PER_LOOKUP + 5);
      assert.strictEqual(found[104].id, 'id-104');
    });
  });
});
