import type { Redis } from 'ioredis';
import { BackendUnavailableError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { Availability, CacheStore } from './types.js';
import { withTimeout } from './timeout.js';

const log = logger.child({ module: 'cache' });

export interface RedisCacheStoreOptions {
  timeoutMs: number;
  keyPrefix?: string;
}

export class RedisCacheStore implements CacheStore {
  readonly backend = 'cache';
  private readonly prefix: string;

  constructor(
    private readonly client: Redis,
    private readonly options: RedisCacheStoreOptions
  ) {
    this.prefix = options.keyPrefix ?? 'opsdesk';
    // Without a listener ioredis prints every reconnect failure to the console.
    client.on('error', (err: Error) => {
      log.warn({ err }, 'Redis connection error');
    });
  }

  async ping(): Promise<Availability> {
    try {
      if (this.client.status === 'wait') {
        await withTimeout(this.client.connect(), this.options.timeoutMs, 'cache connect');
      }
      const reply = await withTimeout(this.client.ping(), this.options.timeoutMs, 'cache ping');
      return reply === 'PONG' ? 'available' : 'unavailable';
    } catch {
      return 'unavailable';
    }
  }

  async get(namespace: string, key: string): Promise<string | null> {
    return this.call(() => this.client.get(this.key(namespace, key)));
  }

  async set(namespace: string, key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.call(() =>
      ttlSeconds > 0
        ? this.client.set(this.key(namespace, key), value, 'EX', ttlSeconds)
        : this.client.set(this.key(namespace, key), value)
    );
  }

  private key(namespace: string, key: string): string {
    return `${this.prefix}:${namespace}:${key}`;
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(operation(), this.options.timeoutMs, 'cache call');
    } catch (error) {
      throw new BackendUnavailableError('cache', error);
    }
  }
}
