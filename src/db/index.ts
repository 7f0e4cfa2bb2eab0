export { supabase } from './client.js';
export { elastic } from './elastic.js';
export { redis } from './redis.js';
