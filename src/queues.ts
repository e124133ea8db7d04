import { createQueue } from './threads';

/**
 * Named application queues.
 *
 * @module queues
 */

/** Log writes, in order. */
export const loggingQueue = createQueue(1);

/** Replies from the console transport, serial so they print in input order. */
export const answerQueue = createQueue(1);

/**
 * Settings and NPC file writes. Serial so two commands touching the same
 * file never interleave a read-modify-write.
 */
export const storeQueue = createQueue(1);
