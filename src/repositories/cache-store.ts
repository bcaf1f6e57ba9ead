/**
 * Identity Cache Store
 *
 * TTL key/value store backing the permission and token caches. The Redis
 * implementation fails open: when the server cannot be reached the store
 * reports itself unavailable and callers treat every read as a miss.
 */

import Redis from 'ioredis';
import { CacheError } from '../models/errors';
import { LogLevel, log } from '../utils/logger';

export interface CacheStore {
  readonly available: boolean;
  connect(): Promise<void>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface RedisCacheStoreOptions {
  connectTimeoutMs?: number;      // Connect, ready check and PING together
  commandTimeoutMs?: number;      // Each GET/SET/DEL
}

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
const DEFAULT_COMMAND_TIMEOUT_MS = 2000;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Settle with `operation`, or reject once `timeoutMs` has passed
 */
async function withDeadline<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Redis-backed cache store
 */
export class RedisCacheStore implements CacheStore {
  private client: Redis | null = null;
  private readonly connectTimeoutMs: number;
  private readonly commandTimeoutMs: number;

  constructor(
    private readonly url: string,
    options: RedisCacheStoreOptions = {}
  ) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  get available(): boolean {
    return this.client !== null;
  }

  /**
   * Open the connection and verify it with PING, within the connect timeout.
   * On failure the store stays unavailable and a CacheError is thrown.
   */
  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    const client = new Redis(this.url, {
      lazyConnect: true,
      connectTimeout: this.connectTimeoutMs,
      commandTimeout: this.commandTimeoutMs,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      retryStrategy: (times: number) => Math.min(times * 50, 2000),
    });

    client.on('error', (error: Error) => {
      log(LogLevel.WARN, 'Redis connection error', { error: error.message });
    });

    const handshake = async (): Promise<void> => {
      await client.connect();
      await client.ping();
    };

    try {
      await withDeadline(handshake(), this.connectTimeoutMs, 'Redis connection');
      this.client = client;
      log(LogLevel.INFO, 'Redis cache initialized');
    } catch (error) {
      client.disconnect();
      throw new CacheError(`Failed to connect to Redis: ${describe(error)}`);
    }
  }

  private requireClient(): Redis {
    if (!this.client) {
      throw new CacheError('Cache store is not connected');
    }
    return this.client;
  }

  async get(key: string): Promise<string | null> {
    const client = this.requireClient();
    try {
      return await client.get(key);
    } catch (error) {
      throw new CacheError(`Redis get error: ${describe(error)}`);
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = this.requireClient();
    try {
      await client.set(key, value, 'EX', ttlSeconds);
    } catch (error) {
      throw new CacheError(`Redis set error: ${describe(error)}`);
    }
  }

  async delete(key: string): Promise<boolean> {
    const client = this.requireClient();
    try {
      return (await client.del(key)) > 0;
    } catch (error) {
      throw new CacheError(`Redis delete error: ${describe(error)}`);
    }
  }

  /**
   * Close the connection. Safe to call repeatedly or before connect.
   */
  async close(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = null;
    try {
      await withDeadline(client.quit(), this.commandTimeoutMs, 'Redis quit');
    } catch (error) {
      log(LogLevel.WARN, 'Redis quit failed, forcing disconnect', { error: describe(error) });
      client.disconnect();
    }
  }
}
