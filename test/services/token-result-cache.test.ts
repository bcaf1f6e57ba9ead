/**
 * Token Rejection Cache Tests
 */

import { TokenResultCache, isCacheableRejection } from '../../src/services/token-result-cache';
import {
  InvalidAudienceError,
  InvalidSignatureError,
  KeySetFetchError,
  TokenExpiredError,
  TokenNotYetValidError,
  TokenValidationError,
} from '../../src/models/errors';
import { InMemoryCacheStore } from '../support/in-memory-cache-store';

const TOKEN = 'header.payload.signature';

describe('TokenResultCache', () => {
  let store: InMemoryCacheStore;
  let cache: TokenResultCache;

  beforeEach(() => {
    store = new InMemoryCacheStore();
    cache = new TokenResultCache(store, 'gateway:auth:', 60);
  });

  it('should replay a recorded rejection as its original error type', async () => {
    await cache.recordRejection(TOKEN, new InvalidSignatureError('invalid signature'));

    const rejection = await cache.getRejection(TOKEN);

    expect(rejection).toBeInstanceOf(InvalidSignatureError);
    expect(rejection?.message).toBe('invalid signature');
    expect(rejection?.code).toBe('INVALID_SIGNATURE');
  });

  it('should keep colons inside the recorded message', async () => {
    await cache.recordRejection(TOKEN, new InvalidAudienceError('Invalid client_id: other'));

    const rejection = await cache.getRejection(TOKEN);

    expect(rejection).toBeInstanceOf(InvalidAudienceError);
    expect(rejection?.message).toBe('Invalid client_id: other');
  });

  it('should store entries under a hashed token key with the configured TTL', async () => {
    await cache.recordRejection(TOKEN, new TokenValidationError('Invalid token format'));

    const [key] = [...store.entries.keys()];
    expect(key).toMatch(/^gateway:auth:token:[0-9a-f]{64}$/);
    expect(store.ttls.get(key)).toBe(60);
  });

  it('should not record expiry or key set failures', async () => {
    await cache.recordRejection(TOKEN, new TokenExpiredError());
    await cache.recordRejection(TOKEN, new KeySetFetchError('Failed to fetch key set: timeout'));
    await cache.recordRejection(TOKEN, new Error('unexpected'));

    expect(store.entries.size).toBe(0);
    await expect(cache.getRejection(TOKEN)).resolves.toBeNull();
  });

  it('should not record tokens that are not yet valid', async () => {
    await cache.recordRejection(TOKEN, new TokenNotYetValidError('jwt not active'));
    await cache.recordRejection(TOKEN, new TokenNotYetValidError('Token issued in the future'));

    expect(store.entries.size).toBe(0);
  });

  it('should be disabled when the TTL is zero', async () => {
    const disabled = new TokenResultCache(store, 'gateway:auth:', 0);

    await disabled.recordRejection(TOKEN, new InvalidSignatureError());

    expect(disabled.enabled).toBe(false);
    expect(store.entries.size).toBe(0);
  });

  it('should ignore store failures', async () => {
    const consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    store.failOperations = true;

    await expect(
      cache.recordRejection(TOKEN, new InvalidSignatureError())
    ).resolves.toBeUndefined();
    await expect(cache.getRejection(TOKEN)).resolves.toBeNull();

    consoleLogSpy.mockRestore();
  });

  it('should ignore entries with an unknown code', async () => {
    await cache.recordRejection(TOKEN, new InvalidSignatureError());
    const [storedKey] = [...store.entries.keys()];
    await store.set(storedKey, 'TOKEN_EXPIRED:Token has expired', 60);

    await expect(cache.getRejection(TOKEN)).resolves.toBeNull();
  });

  describe('isCacheableRejection', () => {
    it('should accept token-intrinsic rejections only', () => {
      expect(isCacheableRejection(new InvalidSignatureError())).toBe(true);
      expect(isCacheableRejection(new TokenValidationError('bad'))).toBe(true);
      expect(isCacheableRejection(new TokenExpiredError())).toBe(false);
      expect(isCacheableRejection(new TokenNotYetValidError())).toBe(false);
      expect(isCacheableRejection(new KeySetFetchError('down'))).toBe(false);
      expect(isCacheableRejection('bad')).toBe(false);
    });
  });
});
