export { env } from './env.js';
export type { Env } from './env.js';
