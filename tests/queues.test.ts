import { storeQueue } from '../src/queues';
import { createQueue } from '../src/threads';

describe('queue', () => {
  test('runs jobs sequentially and respects concurrency', async () => {
    const q = createQueue(2);
    const results: number[] = [];

    q.push(async () => {
      await new Promise(r => setTimeout(r, 10));
      results.push(1);
    });

    q.push(async () => {
      await new Promise(r => setTimeout(r, 5));
      results.push(2);
    });

    q.push(async () => {
      results.push(3);
    });

    await q.drain();
    expect(results.sort()).toEqual([1, 2, 3]);
  });

  test('single-slot queue keeps push order', async () => {
    const q = createQueue();
    const order: string[] = [];
    q.push(async () => {
      await new Promise(r => setTimeout(r, 10));
      order.push('slow');
    });
    q.push(async () => {
      order.push('fast');
    });
    await q.drain();
    expect(order).toEqual(['slow', 'fast']);
  });

  test('run resolves with the job result', async () => {
    const q = createQueue();
    await expect(q.run(async () => 42)).resolves.toBe(42);
  });

  test('run rejects with the job error and the queue keeps going', async () => {
    const q = createQueue();
    await expect(
      q.run(async () => {
        throw new Error('write failed');
      }),
    ).rejects.toThrow('write failed');
    await expect(q.run(async () => 'next')).resolves.toBe('next');
  });

  test('a failing pushed job does not stop later jobs', async () => {
    const q = createQueue();
    const done: number[] = [];
    q.push(async () => {
      throw new Error('boom');
    });
    q.push(async () => {
      done.push(2);
    });
    await q.drain();
    expect(done).toEqual([2]);
    expect(q.size()).toBe(0);
  });

  test('drain waits for concurrent jobs to finish', async () => {
    const q = createQueue(2);
    let running = 0;
    let peak = 0;
    const ended: number[] = [];

    const job = (id: number) => async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise(r => setTimeout(r, 20));
      running--;
      ended.push(id);
    };

    q.push(job(1));
    q.push(job(2));
    q.push(job(3));
    await q.drain();

    expect(running).toBe(0);
    expect(peak).toBe(2);
    expect(ended.sort()).toEqual([1, 2, 3]);
  });

  test('storeQueue runs writes one at a time in order', async () => {
    const order: string[] = [];
    const write = (name: string, delay: number) =>
      storeQueue.run(async () => {
        order.push(`start ${name}`);
        await new Promise(r => setTimeout(r, delay));
        order.push(`end ${name}`);
        return name;
      });

    const results = await Promise.all([write('settings', 15), write('npcs', 1)]);

    expect(results).toEqual(['settings', 'npcs']);
    expect(order).toEqual(['start settings', 'end settings', 'start npcs', 'end npcs']);
  });
});
