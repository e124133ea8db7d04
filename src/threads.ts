import logger from './logger';

/**
 * Small in-process job queue.
 *
 * @module threads
 */

export type Job = () => Promise<void>;

export type AsyncQueue = {
  push(job: Job): void;
  run<T>(job: () => Promise<T>): Promise<T>;
  size(): number;
  drain(): Promise<void>;
};

/**
 * Create an asynchronous queue that runs enqueued jobs with at most
 * `concurrency` jobs in flight. With the default of 1, jobs run strictly in
 * the order they were pushed.
 *
 * Jobs given to `push` are fire-and-forget: a rejection is logged and the
 * queue moves on. `run` enqueues a job and hands its result (or rejection)
 * back to the caller.
 */
export function createQueue(concurrency = 1): AsyncQueue {
  const queue: Job[] = [];
  let running = 0;
  let idleResolvers: Array<() => void> = [];

  function checkIdle() {
    if (running === 0 && queue.length === 0) {
      const resolvers = idleResolvers;
      idleResolvers = [];
      for (const r of resolvers) r();
    }
  }

  async function runNext() {
    if (running >= concurrency) return;
    const job = queue.shift();
    if (!job) return;
    running++;
    try {
      await job();
    } catch (e) {
      logger.warn('Queue job failed: ' + (e instanceof Error ? e.message : String(e)));
    } finally {
      running--;
      process.nextTick(() => {
        void runNext();
        checkIdle();
      });
    }
  }

  function push(job: Job) {
    queue.push(job);
    process.nextTick(() => void runNext());
  }

  return {
    push,

    run<T>(job: () => Promise<T>): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        push(async () => {
          try {
            resolve(await job());
          } catch (e) {
            reject(e);
          }
        });
      });
    },

    size() {
      return queue.length;
    },

    async drain() {
      if (running === 0 && queue.length === 0) return;
      return new Promise<void>(resolve => {
        idleResolvers.push(resolve);
      });
    },
  };
}
