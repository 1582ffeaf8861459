import pino from 'pino';
import type { Logger } from 'pino';

export interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * A logger writing parsed records into an array.
 */
export function captureLogs(level = 'trace'): {
  logger: Logger;
  records: Array<LogRecord>;
} {
  const records: Array<LogRecord> = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  );
  return { logger, records };
}
