/**
 * Token getter helpers
 *
 * Nothing is persisted; cached tokens live as long as the getter does.
 */

import { asyncProvider, resolveValue, toValueSource } from './utils.js';
import type { TokenGetter, ValueSource } from './utils.js';
import { ValidationError } from './errors.js';

/**
 * A refreshable credential, e.g. one handed out by a cloud SDK
 */
export interface Credential {
  readonly valid: boolean;
  readonly token: string | undefined;
  refresh(): Promise<void>;
}

/**
 * Getter that refreshes the credential whenever it is no longer valid
 */
export function credentialTokenGetter(credential: Credential): ValueSource<string> {
  return asyncProvider(async () => {
    if (!credential.valid || !credential.token) {
      await credential.refresh();
    }
    const token = credential.token;
    if (!token) {
      throw new ValidationError('Credential did not produce a token after refresh');
    }
    return token;
  });
}

/**
 * Wrap a getter so its token is sent as `Bearer <token>`
 */
export function bearerToken(getter: TokenGetter): ValueSource<string> {
  const source = toValueSource(getter);
  return asyncProvider(async () => {
    const token = await resolveValue(source);
    if (typeof token !== 'string') {
      throw new ValidationError('Token getter did not resolve to a string');
    }
    return `Bearer ${token}`;
  });
}

export interface FetchedToken {
  token: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

export interface CachedTokenGetterOptions {
  /** Fetch again this long before expiry; default 60 s */
  refreshMarginMs?: number;
  now?: () => number;
}

export const DEFAULT_REFRESH_MARGIN_MS = 60_000;

/**
 * Keeps a fetched token until shortly before it expires
 *
 * Concurrent callers share one in-flight fetch.
 */
export class CachedTokenGetter {
  private cached: FetchedToken | null = null;
  private pending: Promise<FetchedToken> | null = null;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;

  constructor(
    private readonly fetchToken: () => Promise<FetchedToken>,
    options: CachedTokenGetterOptions = {}
  ) {
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
  }

  private fresh(token: FetchedToken | null): token is FetchedToken {
    return token !== null && this.now() < token.expiresAt - this.refreshMarginMs;
  }

  async getToken(): Promise<string> {
    if (this.fresh(this.cached)) {
      return this.cached.token;
    }
    if (!this.pending) {
      this.pending = this.fetchToken().finally(() => {
        this.pending = null;
      });
    }
    this.cached = await this.pending;
    return this.cached.token;
  }

  /**
   * Forget the cached token
   */
  invalidate(): void {
    this.cached = null;
  }

  /**
   * Value source for `authTokenGetters`
   */
  asGetter(): ValueSource<string> {
    return asyncProvider(() => this.getToken());
  }
}
