import { pino } from 'pino';
import type { Logger } from 'pino';

export const SERVICE_NAME = 'schemalog';

/** Root logger. Components derive children tagged with `component`. */
export function createLogger(level: string): Logger {
  return pino({
    level,
    base: { service: SERVICE_NAME },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
