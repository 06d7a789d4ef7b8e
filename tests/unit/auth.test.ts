import { describe, it, expect, vi } from 'vitest';

import { CachedTokenGetter, bearerToken, credentialTokenGetter } from '../../src/auth.js';
import type { Credential } from '../../src/auth.js';
import { resolveValue } from '../../src/utils.js';

describe('credentialTokenGetter', () => {
  it('should refresh a stale credential before handing out its token', async () => {
    class FakeCredential implements Credential {
      valid = false;
      token: string | undefined = undefined;
      refreshes = 0;

      async refresh(): Promise<void> {
        this.refreshes++;
        this.valid = true;
        this.token = 'test-token-1';
      }
    }
    const credential = new FakeCredential();

    const getter = credentialTokenGetter(credential);
    expect(await resolveValue(getter)).toBe('test-token-1');
    expect(await resolveValue(getter)).toBe('test-token-1');
    expect(credential.refreshes).toBe(1);
  });

  it('should fail when refreshing yields no token', async () => {
    const credential: Credential = { valid: false, token: undefined, refresh: async () => undefined };
    await expect(resolveValue(credentialTokenGetter(credential))).rejects.toThrow(
      'Credential did not produce a token after refresh'
    );
  });
});

describe('bearerToken', () => {
  it('should prefix the token', async () => {
    expect(await resolveValue(bearerToken(() => 'test-secret'))).toBe('Bearer test-secret');
  });
});

describe('CachedTokenGetter', () => {
  it('should reuse a token until the refresh margin is reached', async () => {
    let now = 0;
    let issued = 0;
    const fetchToken = vi.fn(async () => ({ token: `token-${++issued}`, expiresAt: 100_000 }));
    const getter = new CachedTokenGetter(fetchToken, { refreshMarginMs: 10_000, now: () => now });

    expect(await getter.getToken()).toBe('token-1');
    now = 89_999;
    expect(await getter.getToken()).toBe('token-1');
    now = 90_000;
    expect(await getter.getToken()).toBe('token-2');
    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('should share one fetch between concurrent callers', async () => {
    const fetchToken = vi.fn(async () => ({ token: 'shared', expiresAt: Number.MAX_SAFE_INTEGER }));
    const getter = new CachedTokenGetter(fetchToken);

    const tokens = await Promise.all([getter.getToken(), resolveValue(getter.asGetter())]);
    expect(tokens).toEqual(['shared', 'shared']);
    expect(fetchToken).toHaveBeenCalledTimes(1);
  });

  it('should fetch again after invalidate', async () => {
    const fetchToken = vi.fn(async () => ({ token: 'again', expiresAt: Number.MAX_SAFE_INTEGER }));
    const getter = new CachedTokenGetter(fetchToken);
    await getter.getToken();
    getter.invalidate();
    await getter.getToken();
    expect(fetchToken).toHaveBeenCalledTimes(2);
  });
});
