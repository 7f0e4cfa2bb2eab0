import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Redis } from 'ioredis';
import { BackendUnavailableError } from '../errors.js';
import { RedisCacheStore } from './cache.js';
import { TimeoutError } from './timeout.js';

describe('RedisCacheStore', () => {
  let redis: Redis;

  beforeEach(() => {
    redis = new Redis({ lazyConnect: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    redis.disconnect();
  });

  it('namespaces keys under the prefix', async () => {
    const get = vi.spyOn(redis, 'get').mockResolvedValue('{"a":1}');
    const store = new RedisCacheStore(redis, { timeoutMs: 100, keyPrefix: 'test' });

    expect(await store.get('search-options', 'abc')).toBe('{"a":1}');
    expect(get).toHaveBeenCalledWith('test:search-options:abc');
  });

  it('sets values with an expiry', async () => {
    const set = vi.spyOn(redis, 'set').mockResolvedValue('OK');
    const store = new RedisCacheStore(redis, { timeoutMs: 100 });

    await store.set('search-options', 'abc', 'value', 30);
    await store.set('search-options', 'def', 'value', 0);

    expect(set).toHaveBeenNthCalledWith(1, 'opsdesk:search-options:abc', 'value', 'EX', 30);
    expect(set).toHaveBeenNthCalledWith(2, 'opsdesk:search-options:def', 'value');
  });

  it('wraps client errors as backend unavailability', async () => {
    vi.spyOn(redis, 'get').mockRejectedValue(new Error('Connection is closed.'));
    const store = new RedisCacheStore(redis, { timeoutMs: 100 });

    await expect(store.get('search-options', 'abc')).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  it('gives up on a call that outlives the timeout', async () => {
    vi.spyOn(redis, 'get').mockReturnValue(new Promise<string | null>(() => undefined));
    const store = new RedisCacheStore(redis, { timeoutMs: 20 });

    const error = await store.get('search-options', 'abc').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error instanceof BackendUnavailableError && error.cause).toBeInstanceOf(TimeoutError);
  });

  it('logs client errors instead of leaving them unhandled', () => {
    new RedisCacheStore(redis, { timeoutMs: 100 });

    expect(redis.listenerCount('error')).toBe(1);
    expect(redis.emit('error', new Error('connect ECONNREFUSED'))).toBe(true);
  });

  it('connects lazily before probing', async () => {
    const connect = vi.spyOn(redis, 'connect').mockResolvedValue(undefined);
    vi.spyOn(redis, 'ping').mockResolvedValue('PONG');
    const store = new RedisCacheStore(redis, { timeoutMs: 100 });

    expect(await store.ping()).toBe('available');
    expect(connect).toHaveBeenCalledTimes(1);
  });

  it('reports an unreachable cache', async () => {
    vi.spyOn(redis, 'connect').mockRejectedValue(new Error('connect ECONNREFUSED'));
    const store = new RedisCacheStore(redis, { timeoutMs: 100 });

    expect(await store.ping()).toBe('unavailable');
  });
});
