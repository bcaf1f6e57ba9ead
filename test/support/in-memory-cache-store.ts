/**
 * In-process stand-in for the Redis cache store
 */

import { CacheStore } from '../../src/repositories/cache-store';
import { CacheError } from '../../src/models/errors';

interface Entry {
  value: string;
  expiresAt: number;
}

export class InMemoryCacheStore implements CacheStore {
  readonly entries = new Map<string, Entry>();
  readonly ttls = new Map<string, number>();
  available = true;
  failConnect = false;
  failOperations = false;
  connectCalls = 0;
  closeCalls = 0;

  async connect(): Promise<void> {
    this.connectCalls += 1;
    if (this.failConnect) {
      this.available = false;
      throw new CacheError('Failed to connect to Redis: connection refused');
    }
    this.available = true;
  }

  private guard(operation: string): void {
    if (this.failOperations) {
      throw new CacheError(`Redis ${operation} error: connection lost`);
    }
  }

  async get(key: string): Promise<string | null> {
    this.guard('get');
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.guard('set');
    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
    this.ttls.set(key, ttlSeconds);
  }

  async delete(key: string): Promise<boolean> {
    this.guard('delete');
    return this.entries.delete(key);
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.available = false;
  }
}
