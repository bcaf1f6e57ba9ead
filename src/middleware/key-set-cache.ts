/**
 * Key Set Cache
 *
 * Holds the identity provider's public signing keys. Refresh is lazy: a
 * lookup refreshes when the held set is older than the TTL, and a key-id
 * miss forces exactly one refresh before the key is declared unknown, so a
 * provider-side key rotation costs at most one extra round trip. Forced
 * refreshes are spaced at least `minRefreshIntervalSeconds` apart; a miss
 * inside that window is answered from the held set.
 *
 * The held set is a frozen object replaced in a single assignment; readers
 * never see a partially updated set.
 */

import axios from 'axios';
import jwksClient from 'jwks-rsa';
import { KeyNotFoundError, KeySetFetchError } from '../models/errors';
import { LogLevel, log } from '../utils/logger';
import { MetricName, MetricsEmitter } from '../utils/metrics';

export interface SigningKey {
  readonly kid: string;
  readonly alg?: string;
  readonly publicKey: string;     // PEM (SPKI)
}

export interface KeySet {
  readonly keys: readonly SigningKey[];
  readonly fetchedAt: number;     // epoch millis
}

/**
 * Fetches the raw key-set document
 */
export type KeySetFetcher = (uri: string, signal?: AbortSignal) => Promise<unknown>;

export interface KeySetCacheOptions {
  uri: string;
  ttlSeconds: number;
  timeoutMs?: number;
  minRefreshIntervalSeconds?: number;
  fetcher?: KeySetFetcher;
  metrics?: MetricsEmitter;
}

interface JsonWebKeyEntry {
  kid?: unknown;
  kty?: unknown;
  use?: unknown;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MIN_REFRESH_INTERVAL_SECONDS = 30;
const SIGNING_KEY_TYPES = ['RSA', 'EC', 'OKP'];

function httpFetcher(timeoutMs: number): KeySetFetcher {
  return async (uri, signal) => {
    const response = await axios.get<unknown>(uri, {
      timeout: timeoutMs,
      signal,
      headers: { Accept: 'application/json' },
    });
    return response.data;
  };
}

function readKeyEntries(document: unknown): JsonWebKeyEntry[] {
  if (document === null || typeof document !== 'object' || !('keys' in document)) {
    throw new KeySetFetchError('Key set document has no keys array');
  }
  const keys: unknown = document.keys;
  if (!Array.isArray(keys)) {
    throw new KeySetFetchError('Key set document has no keys array');
  }
  return keys.filter(
    (entry): entry is JsonWebKeyEntry => entry !== null && typeof entry === 'object'
  );
}

function isAdvertisedSigningKey(entry: JsonWebKeyEntry): boolean {
  return (
    (entry.use === undefined || entry.use === 'sig') &&
    typeof entry.kty === 'string' &&
    SIGNING_KEY_TYPES.includes(entry.kty) &&
    typeof entry.kid === 'string'
  );
}

export class KeySetCache {
  private keySet: KeySet | null = null;
  private lastForcedRefreshAt: number | null = null;
  private readonly fetcher: KeySetFetcher;

  constructor(private readonly options: KeySetCacheOptions) {
    this.fetcher = options.fetcher ?? httpFetcher(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  }

  /**
   * The currently held key set, if any
   */
  get current(): KeySet | null {
    return this.keySet;
  }

  private isFresh(keySet: KeySet): boolean {
    return Date.now() - keySet.fetchedAt < this.options.ttlSeconds * 1000;
  }

  private mayForceRefresh(): boolean {
    const intervalMs =
      (this.options.minRefreshIntervalSeconds ?? DEFAULT_MIN_REFRESH_INTERVAL_SECONDS) * 1000;
    return this.lastForcedRefreshAt === null || Date.now() - this.lastForcedRefreshAt >= intervalMs;
  }

  private find(kid: string): SigningKey | undefined {
    return this.keySet?.keys.find((key) => key.kid === kid);
  }

  /**
   * Resolve a signing key by key id
   *
   * @throws KeySetFetchError when no key set could ever be fetched
   * @throws KeyNotFoundError when the key is absent after a forced refresh,
   * or absent while a forced refresh is not yet allowed
   */
  async getKey(kid: string, signal?: AbortSignal): Promise<SigningKey> {
    if (!this.keySet || !this.isFresh(this.keySet)) {
      await this.refresh(signal);
    }

    const key = this.find(kid);
    if (key) {
      return key;
    }

    if (!this.mayForceRefresh()) {
      log(LogLevel.DEBUG, 'Signing key not in held key set, forced refresh rate limited', { kid });
      throw new KeyNotFoundError(`Key with kid '${kid}' not found in key set`);
    }

    // Possible key rotation: one forced refresh, one retry.
    log(LogLevel.INFO, 'Signing key not in held key set, forcing refresh', { kid });
    this.lastForcedRefreshAt = Date.now();
    await this.refresh(signal);

    const rotated = this.find(kid);
    if (!rotated) {
      throw new KeyNotFoundError(`Key with kid '${kid}' not found in key set`);
    }
    return rotated;
  }

  /**
   * Fetch the published key set and swap it in.
   *
   * A failed refresh leaves the previous set in place and does not throw;
   * without a previous set it throws KeySetFetchError. A document with any
   * unparseable signing key fails as a whole.
   */
  async refresh(signal?: AbortSignal): Promise<void> {
    try {
      const next = await this.fetchKeySet(signal);
      this.keySet = next;
      log(LogLevel.INFO, 'Key set refreshed', { key_count: next.keys.length });
      void this.options.metrics?.count(MetricName.KEY_SET_REFRESH, { outcome: 'success' });
    } catch (error) {
      void this.options.metrics?.count(MetricName.KEY_SET_REFRESH, { outcome: 'error' });
      const message = error instanceof Error ? error.message : String(error);

      if (this.keySet) {
        log(LogLevel.WARN, 'Key set refresh failed, keeping previous set', { error: message });
        return;
      }
      throw new KeySetFetchError(`Failed to fetch key set: ${message}`);
    }
  }

  /**
   * Drop the held key set
   */
  clear(): void {
    this.keySet = null;
    this.lastForcedRefreshAt = null;
  }

  private async fetchKeySet(signal?: AbortSignal): Promise<KeySet> {
    let advertised = 0;

    const client = jwksClient({
      jwksUri: this.options.uri,
      cache: false,
      rateLimit: false,
      fetcher: async (uri: string) => {
        const entries = readKeyEntries(await this.fetcher(uri, signal));
        advertised = entries.filter(isAdvertisedSigningKey).length;
        return { keys: entries };
      },
    });

    const parsed = await client.getSigningKeys();
    const keys: SigningKey[] = [];
    for (const signingKey of parsed) {
      if (typeof signingKey.kid === 'string') {
        keys.push(
          Object.freeze({
            kid: signingKey.kid,
            alg: signingKey.alg,
            publicKey: signingKey.getPublicKey(),
          })
        );
      }
    }

    if (keys.length < advertised) {
      throw new KeySetFetchError(
        `Key set contains ${advertised - keys.length} unparseable signing key(s)`
      );
    }

    return Object.freeze({ keys: Object.freeze(keys), fetchedAt: Date.now() });
  }
}
