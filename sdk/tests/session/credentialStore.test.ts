/**
 * Tests for the CredentialStore.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CredentialStore } from '../../src/session/credentialStore.js';
import { NotAuthenticatedError } from '../../src/errors/index.js';
import { createMockSession } from '../helpers/fixtures.js';

describe('CredentialStore', () => {
  it('should throw NotAuthenticatedError before the first set', () => {
    const store = new CredentialStore();

    assert.throws(() => store.get(), NotAuthenticatedError);
    assert.strictEqual(store.peek(), undefined);
    assert.strictEqual(store.hasSession(), false);
  });

  it('should return the committed session', () => {
    const store = new CredentialStore();
    store.set(createMockSession());

    assert.strictEqual(store.get().accountId, 'account-1');
    assert.strictEqual(store.get().accessToken, 'access-1');
    assert.strictEqual(store.hasSession(), true);
  });

  it('should freeze a copy so the caller cannot mutate the stored session', () => {
    const store = new CredentialStore();
    const session = { ...createMockSession() };
    store.set(session);

    assert.notStrictEqual(store.get(), session);
    assert.ok(Object.isFrozen(store.get()));
  });

  it('should return either the whole old or the whole new session to readers', async () => {
    const store = new CredentialStore();
    const old = createMockSession({ accessToken: 'access-old', refreshToken: 'refresh-old' });
    const next = createMockSession({ accessToken: 'access-new', refreshToken: 'refresh-new' });
    store.set(old);

    const reads: Promise<string>[] = [];
    for (let i = 0; i < 50; i++) {
      reads.push(
        (async () => {
          await new Promise((resolve) => setImmediate(resolve));
          const seen = store.get();
          return `${seen.accessToken}/${seen.refreshToken}`;
        })()
      );
      if (i === 25) store.set(next);
    }

    const results = await Promise.all(reads);
    for (const result of results) {
      assert.ok(result === 'access-old/refresh-old' || result === 'access-new/refresh-new', result);
    }
  });

  it('should drop the session on clear', () => {
    const store = new CredentialStore();
    store.set(createMockSession());
    store.clear();

    assert.strictEqual(store.peek(), undefined);
    assert.throws(() => store.get(), NotAuthenticatedError);
  });
});
