import { Redis } from 'ioredis';
import { env } from '../config/index.js';

// Offline queue disabled so commands fail fast while Redis is down.
export const redis = new Redis(env.REDIS_URL, {
  lazyConnect: true,
  enableOfflineQueue: false,
  maxRetriesPerRequest: 1,
  connectTimeout: env.BACKEND_TIMEOUT_MS,
});

