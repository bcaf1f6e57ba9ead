/**
 * Cache Store Tests
 *
 * Unit tests for RedisCacheStore against a mocked ioredis client.
 */

import Redis from 'ioredis';
import { RedisCacheStore } from '../../src/repositories/cache-store';
import { CacheError } from '../../src/models/errors';

const mockRedisClient = {
  connect: jest.fn(),
  ping: jest.fn(),
  get: jest.fn(),
  set: jest.fn(),
  del: jest.fn(),
  quit: jest.fn(),
  disconnect: jest.fn(),
  on: jest.fn(),
};

jest.mock('ioredis', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => mockRedisClient),
}));

const mockRedis = jest.mocked(Redis);
const REDIS_URL = 'redis://localhost:6379';

describe('RedisCacheStore', () => {
  let store: RedisCacheStore;
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    mockRedisClient.connect.mockResolvedValue(undefined);
    mockRedisClient.ping.mockResolvedValue('PONG');
    mockRedisClient.get.mockResolvedValue(null);
    mockRedisClient.set.mockResolvedValue('OK');
    mockRedisClient.del.mockResolvedValue(0);
    mockRedisClient.quit.mockResolvedValue('OK');
    store = new RedisCacheStore(REDIS_URL);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe('connect', () => {
    it('should connect lazily and verify the connection with PING', async () => {
      await store.connect();

      expect(mockRedis).toHaveBeenCalledWith(
        REDIS_URL,
        expect.objectContaining({
          lazyConnect: true,
          connectTimeout: 5000,
          commandTimeout: 2000,
          maxRetriesPerRequest: 1,
          enableOfflineQueue: false,
        })
      );
      expect(mockRedisClient.connect).toHaveBeenCalledTimes(1);
      expect(mockRedisClient.ping).toHaveBeenCalledTimes(1);
      expect(store.available).toBe(true);
    });

    it('should create one client across repeated connects', async () => {
      await store.connect();
      await store.connect();

      expect(mockRedis).toHaveBeenCalledTimes(1);
    });

    it('should stay unavailable and throw CacheError when the server is unreachable', async () => {
      mockRedisClient.connect.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const connecting = store.connect();

      await expect(connecting).rejects.toThrow(CacheError);
      await expect(connecting).rejects.toThrow('Failed to connect to Redis: connect ECONNREFUSED');
      expect(mockRedisClient.disconnect).toHaveBeenCalledTimes(1);
      expect(store.available).toBe(false);
    });

    it('should pass configured timeouts to the client', async () => {
      const tuned = new RedisCacheStore(REDIS_URL, { connectTimeoutMs: 1500, commandTimeoutMs: 250 });

      await tuned.connect();

      expect(mockRedis).toHaveBeenCalledWith(
        REDIS_URL,
        expect.objectContaining({ connectTimeout: 1500, commandTimeout: 250 })
      );
    });

    it('should give up on a server that accepts but never answers', async () => {
      mockRedisClient.connect.mockReturnValue(new Promise(() => undefined));
      const stalled = new RedisCacheStore(REDIS_URL, { connectTimeoutMs: 50 });

      await expect(stalled.connect()).rejects.toThrow(
        'Failed to connect to Redis: Redis connection timed out after 50ms'
      );
      expect(mockRedisClient.disconnect).toHaveBeenCalledTimes(1);
      expect(stalled.available).toBe(false);
    });

    it('should give up when PING never returns', async () => {
      mockRedisClient.ping.mockReturnValue(new Promise(() => undefined));
      const stalled = new RedisCacheStore(REDIS_URL, { connectTimeoutMs: 50 });

      await expect(stalled.connect()).rejects.toThrow(CacheError);
      expect(stalled.available).toBe(false);
    });

    it('should log connection errors reported by the client', async () => {
      await store.connect();
      const errorHandler = mockRedisClient.on.mock.calls.find(([event]) => event === 'error')?.[1];

      errorHandler(new Error('socket closed'));

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[consoleLogSpy.mock.calls.length - 1][0]);
      expect(logEntry.level).toBe('WARN');
      expect(logEntry.message).toBe('Redis connection error');
      expect(logEntry.error).toBe('socket closed');
    });
  });

  describe('operations', () => {
    beforeEach(async () => {
      await store.connect();
    });

    it('should return stored values', async () => {
      mockRedisClient.get.mockResolvedValue('{"email":"x"}');

      await expect(store.get('gateway:auth:permissions:abc')).resolves.toBe('{"email":"x"}');
      expect(mockRedisClient.get).toHaveBeenCalledWith('gateway:auth:permissions:abc');
    });

    it('should write values with an expiry in seconds', async () => {
      await store.set('gateway:auth:permissions:abc', 'value', 300);

      expect(mockRedisClient.set).toHaveBeenCalledWith(
        'gateway:auth:permissions:abc',
        'value',
        'EX',
        300
      );
    });

    it('should report whether a deleted key existed', async () => {
      mockRedisClient.del.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

      await expect(store.delete('present')).resolves.toBe(true);
      await expect(store.delete('absent')).resolves.toBe(false);
    });

    it('should wrap client failures in CacheError', async () => {
      mockRedisClient.get.mockRejectedValue(new Error('Command timed out'));

      const read = store.get('key');

      await expect(read).rejects.toThrow(CacheError);
      await expect(read).rejects.toThrow('Redis get error: Command timed out');
    });
  });

  it('should reject operations before connect', async () => {
    await expect(store.get('key')).rejects.toThrow('Cache store is not connected');
  });

  describe('close', () => {
    it('should quit once and be safe to repeat', async () => {
      await store.connect();

      await store.close();
      await store.close();

      expect(mockRedisClient.quit).toHaveBeenCalledTimes(1);
      expect(store.available).toBe(false);
    });

    it('should be safe before connect', async () => {
      await expect(store.close()).resolves.toBeUndefined();
      expect(mockRedisClient.quit).not.toHaveBeenCalled();
    });

    it('should force a disconnect when quit never returns', async () => {
      const stalled = new RedisCacheStore(REDIS_URL, { commandTimeoutMs: 50 });
      await stalled.connect();
      mockRedisClient.quit.mockReturnValue(new Promise(() => undefined));

      await stalled.close();

      expect(mockRedisClient.disconnect).toHaveBeenCalledTimes(1);
      expect(stalled.available).toBe(false);
    });

    it('should force a disconnect when quit fails', async () => {
      await store.connect();
      mockRedisClient.quit.mockRejectedValue(new Error('Connection is closed.'));

      await store.close();

      expect(mockRedisClient.disconnect).toHaveBeenCalledTimes(1);
    });
  });
});
