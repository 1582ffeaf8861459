import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Logger used when callers do not pass their own. Silent unless `LOG_LEVEL`
 * is set.
 */
export const defaultLogger: Logger = pino({
  name: 'operation-compiler',
  level: process.env.LOG_LEVEL ?? 'silent',
});
