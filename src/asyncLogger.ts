import logger from './logger';
import { loggingQueue } from './queues';

/**
 * Non-blocking log helpers: formatting and the Winston write happen on the
 * serial `loggingQueue` instead of inside the command being handled.
 *
 * @module asyncLogger
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export function enqueueLog(level: LogLevel, msg: string) {
  loggingQueue.push(async () => {
    logger.log({ level, message: msg });
  });
}

/**
 * Render an unknown thrown value for a log line.
 */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
