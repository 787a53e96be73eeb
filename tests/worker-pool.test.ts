import { describe, it, expect } from 'vitest';
import { BoundedQueue, runWorkerPool } from '../server/services/worker-pool';
import { TaskDeadlineError } from '../server/errors';
import { sleep } from '../server/services/scraper-utils';

interface Job {
  id: number;
  delayMs: number;
}

const options = { concurrency: 2, queueSize: 2, taskDeadlineMs: 1000 };

describe('runWorkerPool', () => {
  it('never runs more tasks than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const jobs: Job[] = Array.from({ length: 6 }, (_, id) => ({ id, delayMs: 10 }));

    const results = await runWorkerPool(jobs, async (job) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(job.delayMs);
      inFlight--;
      return job.id;
    }, options);

    expect(results).toHaveLength(6);
    expect(peak).toBe(2);
  });

  it('reports results in completion order', async () => {
    const jobs: Job[] = [{ id: 1, delayMs: 60 }, { id: 2, delayMs: 5 }];

    const results = await runWorkerPool(jobs, async (job) => {
      await sleep(job.delayMs);
      return job.id;
    }, options);

    expect(results.map(r => r.item.id)).toEqual([2, 1]);
  });

  it('keeps going after a task fails', async () => {
    const jobs: Job[] = [{ id: 1, delayMs: 0 }, { id: 2, delayMs: 0 }, { id: 3, delayMs: 0 }];

    const results = await runWorkerPool(jobs, async (job) => {
      if (job.id === 2) throw new Error('bad listing');
      return job.id * 10;
    }, { ...options, concurrency: 1 });

    expect(results.map(r => (r.ok ? r.value : 'failed'))).toEqual([10, 'failed', 30]);
  });

  it('aborts a task that passes its deadline', async () => {
    let signalAborted = false;
    const jobs: Job[] = [{ id: 1, delayMs: 0 }, { id: 2, delayMs: 0 }];

    const results = await runWorkerPool(jobs, (job, { signal }) => {
      if (job.id === 2) return Promise.resolve('done');
      signal.addEventListener('abort', () => { signalAborted = true; });
      return new Promise<string>(() => undefined);
    }, { concurrency: 1, queueSize: 1, taskDeadlineMs: 20 });

    const first = results[0];
    expect(first?.ok).toBe(false);
    if (first && !first.ok) {
      expect(first.error).toBeInstanceOf(TaskDeadlineError);
    }
    expect(results[1]).toMatchObject({ ok: true, value: 'done' });
    expect(signalAborted).toBe(true);
  });

  it('hands each slot its own index', async () => {
    const jobs: Job[] = Array.from({ length: 4 }, (_, id) => ({ id, delayMs: 5 }));

    const results = await runWorkerPool(jobs, async (job, { slot }) => {
      await sleep(job.delayMs);
      return slot;
    }, { concurrency: 3, queueSize: 1, taskDeadlineMs: 1000 });

    const slots = results.map(r => (r.ok ? r.value : -1));
    expect(slots).toHaveLength(4);
    for (const slot of slots) {
      expect(slot).toBeGreaterThanOrEqual(0);
      expect(slot).toBeLessThan(3);
    }
  });

  it('finishes immediately without items', async () => {
    expect(await runWorkerPool<Job, number>([], async () => 1, options)).toEqual([]);
  });
});

describe('BoundedQueue', () => {
  it('rejects a capacity below one', () => {
    expect(() => new BoundedQueue<Job>(0)).toThrow(RangeError);
  });

  it('makes producers wait while full', async () => {
    const queue = new BoundedQueue<Job>(1);
    await queue.push({ id: 1, delayMs: 0 });

    let pushed = false;
    const pending = queue.push({ id: 2, delayMs: 0 }).then(() => { pushed = true; });
    await sleep(5);
    expect(pushed).toBe(false);

    expect(await queue.shift()).toEqual({ id: 1, delayMs: 0 });
    await pending;
    expect(pushed).toBe(true);
    expect(queue.size).toBe(1);
  });

  it('drains then ends after close', async () => {
    const queue = new BoundedQueue<Job>(2);
    await queue.push({ id: 1, delayMs: 0 });
    queue.close();

    expect(await queue.shift()).toEqual({ id: 1, delayMs: 0 });
    expect(await queue.shift()).toBeUndefined();
    await expect(queue.push({ id: 2, delayMs: 0 })).rejects.toThrow('queue is closed');
  });
});
