/**
 * Token Rejection Cache
 *
 * Remembers, for a short TTL, tokens rejected for reasons carried by the
 * token itself (bad signature, issuer, audience, malformed). A repeated
 * presentation is answered from the cache without touching the key set.
 * Time-dependent failures (expiry, not yet valid) and key-infrastructure
 * failures are never recorded.
 */

import { CacheStore } from '../repositories/cache-store';
import {
  InvalidAudienceError,
  InvalidIssuerError,
  InvalidSignatureError,
  TokenExpiredError,
  TokenValidationError,
} from '../models/errors';
import { CacheNamespace, hashToken, makeCacheKey } from '../utils/cache-keys';
import { LogLevel, log } from '../utils/logger';

const REJECTION_FACTORIES: Record<string, (message: string) => TokenValidationError> = {
  INVALID_SIGNATURE: (message) => new InvalidSignatureError(message),
  INVALID_ISSUER: (message) => new InvalidIssuerError(message),
  INVALID_AUDIENCE: (message) => new InvalidAudienceError(message),
  INVALID_TOKEN: (message) => new TokenValidationError(message),
};

export function isCacheableRejection(error: unknown): error is TokenValidationError {
  return (
    error instanceof TokenValidationError &&
    !(error instanceof TokenExpiredError) &&
    error.code in REJECTION_FACTORIES
  );
}

export class TokenResultCache {
  constructor(
    private readonly store: CacheStore,
    private readonly keyPrefix: string,
    private readonly ttlSeconds: number
  ) {}

  get enabled(): boolean {
    return this.ttlSeconds > 0 && this.store.available;
  }

  private makeKey(token: string): string {
    return makeCacheKey(this.keyPrefix, CacheNamespace.TOKEN, hashToken(token));
  }

  /**
   * The recorded rejection for a token, rebuilt as its original error type
   */
  async getRejection(token: string): Promise<TokenValidationError | null> {
    if (!this.enabled) {
      return null;
    }

    try {
      const raw = await this.store.get(this.makeKey(token));
      if (raw === null) {
        return null;
      }
      const separator = raw.indexOf(':');
      const code = separator >= 0 ? raw.slice(0, separator) : raw;
      const message = separator >= 0 ? raw.slice(separator + 1) : 'Token rejected';
      const factory = REJECTION_FACTORIES[code];
      return factory ? factory(message) : null;
    } catch (error) {
      log(LogLevel.WARN, 'Token cache read failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Record a rejection when its cause does not depend on time or key set
   */
  async recordRejection(token: string, error: unknown): Promise<void> {
    if (!this.enabled || !isCacheableRejection(error)) {
      return;
    }

    try {
      await this.store.set(this.makeKey(token), `${error.code}:${error.message}`, this.ttlSeconds);
    } catch (cacheError) {
      log(LogLevel.WARN, 'Token cache write failed', {
        error: cacheError instanceof Error ? cacheError.message : String(cacheError),
      });
    }
  }
}
