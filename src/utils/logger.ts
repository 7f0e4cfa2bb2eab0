import { pino } from 'pino';

export const logger = pino({
  name: 'opsdesk',
  level: process.env.LOG_LEVEL ?? 'info',
});
