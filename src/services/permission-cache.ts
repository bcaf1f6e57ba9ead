/**
 * Permission Cache
 *
 * Cache-aside resolution of user permissions over the identity cache store.
 * The cache only accelerates: every entry can be rebuilt from the
 * permissions API, so store failures and malformed entries read as misses.
 *
 * Concurrent misses for the same email each call the fetch function unless
 * single-flight mode is on, in which case callers in this process share
 * one in-flight fetch.
 */

import Ajv, { JSONSchemaType } from 'ajv';
import addFormats from 'ajv-formats';
import { CacheStore } from '../repositories/cache-store';
import {
  CachedUserPermissions,
  UserPermissions,
  fromCacheRecord,
  toCacheRecord,
} from '../models/permissions';
import { CacheNamespace, hashIdentity, makeCacheKey } from '../utils/cache-keys';
import { LogLevel, log } from '../utils/logger';
import { MetricName, MetricsEmitter } from '../utils/metrics';

const ajv = new Ajv({ allErrors: true, strict: true, coerceTypes: false });
addFormats(ajv);

const cachedPermissionsSchema: JSONSchemaType<CachedUserPermissions> = {
  type: 'object',
  properties: {
    email: { type: 'string' },
    customers: { type: 'array', items: { type: 'string' } },
    roles: { type: 'array', items: { type: 'string' } },
    permissions: { type: 'array', items: { type: 'string' } },
    fetched_at: { type: 'string', format: 'date-time' },
  },
  required: ['email', 'customers', 'roles', 'permissions', 'fetched_at'],
  additionalProperties: true,
};

const validateCachedPermissions = ajv.compile(cachedPermissionsSchema);

export type FetchPermissions = () => Promise<UserPermissions>;

export interface PermissionCacheOptions {
  keyPrefix: string;
  ttlSeconds: number;
  singleFlight?: boolean;
  metrics?: MetricsEmitter;
}

export class PermissionCache {
  private readonly inFlight = new Map<string, Promise<UserPermissions>>();

  constructor(
    private readonly store: CacheStore,
    private readonly options: PermissionCacheOptions
  ) {}

  get isAvailable(): boolean {
    return this.store.available;
  }

  makeKey(email: string): string {
    return makeCacheKey(this.options.keyPrefix, CacheNamespace.PERMISSIONS, hashIdentity(email));
  }

  /**
   * Cached permissions for an email, or null on miss, store failure or a
   * malformed entry
   */
  async getPermissions(email: string): Promise<UserPermissions | null> {
    if (!this.store.available) {
      return null;
    }

    const key = this.makeKey(email);
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      log(LogLevel.WARN, 'Permission cache read failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    if (raw === null) {
      log(LogLevel.DEBUG, 'Permission cache miss', { key });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      log(LogLevel.WARN, 'Permission cache entry is not valid JSON', { key });
      return null;
    }

    if (!validateCachedPermissions(parsed)) {
      log(LogLevel.WARN, 'Permission cache entry has an unexpected shape', {
        key,
        errors: ajv.errorsText(validateCachedPermissions.errors),
      });
      return null;
    }

    log(LogLevel.DEBUG, 'Permission cache hit', { key });
    return fromCacheRecord(parsed);
  }

  /**
   * Write permissions with a TTL. Returns false when the write did not happen.
   */
  async setPermissions(
    email: string,
    permissions: UserPermissions,
    ttlSeconds?: number
  ): Promise<boolean> {
    const ttl = ttlSeconds ?? this.options.ttlSeconds;
    if (!this.store.available || ttl <= 0) {
      return false;
    }

    const key = this.makeKey(email);
    try {
      await this.store.set(key, JSON.stringify(toCacheRecord(permissions)), ttl);
      log(LogLevel.DEBUG, 'Cached permissions', { key, ttl_seconds: ttl });
      return true;
    } catch (error) {
      log(LogLevel.WARN, 'Permission cache write failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Drop the cached entry. Returns whether an entry existed.
   */
  async invalidate(email: string): Promise<boolean> {
    if (!this.store.available) {
      return false;
    }

    const key = this.makeKey(email);
    try {
      const existed = await this.store.delete(key);
      log(LogLevel.DEBUG, 'Invalidated permission cache entry', { key, existed });
      return existed;
    } catch (error) {
      log(LogLevel.WARN, 'Permission cache delete failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Return cached permissions, or fetch, cache and return fresh ones.
   * A hit never calls `fetch`.
   */
  async getOrFetch(
    email: string,
    fetch: FetchPermissions,
    ttlSeconds?: number
  ): Promise<UserPermissions> {
    const cached = await this.getPermissions(email);
    if (cached) {
      void this.options.metrics?.count(MetricName.PERMISSION_CACHE_HIT);
      return cached;
    }
    void this.options.metrics?.count(MetricName.PERMISSION_CACHE_MISS);

    if (!this.options.singleFlight) {
      return this.fetchAndStore(email, fetch, ttlSeconds);
    }

    const key = this.makeKey(email);
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.fetchAndStore(email, fetch, ttlSeconds).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  private async fetchAndStore(
    email: string,
    fetch: FetchPermissions,
    ttlSeconds?: number
  ): Promise<UserPermissions> {
    const permissions = await fetch();
    await this.setPermissions(email, permissions, ttlSeconds);
    return permissions;
  }
}
