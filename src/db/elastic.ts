import { Client } from '@elastic/elasticsearch';
import { env } from '../config/index.js';

export const elastic = new Client({
  node: env.ELASTIC_HOST,
  requestTimeout: env.BACKEND_TIMEOUT_MS,
  maxRetries: 0,
});
