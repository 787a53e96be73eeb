import { TaskDeadlineError } from '../errors';

export interface WorkerPoolOptions {
  concurrency: number;
  /** Items buffered ahead of the workers. */
  queueSize: number;
  /** Wall-clock cap per item; the task's signal aborts when it passes. */
  taskDeadlineMs: number;
}

export interface TaskContext {
  slot: number;
  signal: AbortSignal;
}

export type TaskResult<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: unknown };

/**
 * FIFO with a capacity. push waits while full, shift waits while empty and
 * resolves undefined once the queue is closed and drained.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private closed = false;
  private waitingConsumers: Array<() => void> = [];
  private waitingProducers: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (capacity < 1) throw new RangeError('capacity must be at least 1');
  }

  get size(): number {
    return this.items.length;
  }

  async push(item: T): Promise<void> {
    if (this.closed) throw new Error('queue is closed');
    while (this.items.length >= this.capacity) {
      await new Promise<void>(resolve => this.waitingProducers.push(resolve));
    }
    this.items.push(item);
    this.waitingConsumers.shift()?.();
  }

  async shift(): Promise<T | undefined> {
    while (this.items.length === 0) {
      if (this.closed) return undefined;
      await new Promise<void>(resolve => this.waitingConsumers.push(resolve));
    }
    const item = this.items.shift();
    this.waitingProducers.shift()?.();
    return item;
  }

  close(): void {
    this.closed = true;
    for (const wake of this.waitingConsumers.splice(0)) wake();
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

async function runWithDeadline<T, R>(
  item: T,
  slot: number,
  worker: (item: T, ctx: TaskContext) => Promise<R>,
  deadlineMs: number,
): Promise<R> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new TaskDeadlineError(deadlineMs)), deadlineMs);
  try {
    return await Promise.race([
      worker(item, { slot, signal: controller.signal }),
      rejectOnAbort(controller.signal),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs worker over items with at most `concurrency` tasks in flight.
 * Results arrive in completion order; a failing task never stops the pool.
 */
export async function runWorkerPool<T extends object, R>(
  items: Iterable<T>,
  worker: (item: T, ctx: TaskContext) => Promise<R>,
  options: WorkerPoolOptions,
): Promise<TaskResult<T, R>[]> {
  const queue = new BoundedQueue<T>(options.queueSize);
  const results: TaskResult<T, R>[] = [];

  const produce = async () => {
    try {
      for (const item of items) {
        await queue.push(item);
      }
    } finally {
      queue.close();
    }
  };

  const consume = async (slot: number) => {
    for (let item = await queue.shift(); item !== undefined; item = await queue.shift()) {
      try {
        const value = await runWithDeadline(item, slot, worker, options.taskDeadlineMs);
        results.push({ item, ok: true, value });
      } catch (error) {
        results.push({ item, ok: false, error });
      }
    }
  };

  const slots = Array.from({ length: Math.max(1, options.concurrency) }, (_, slot) => consume(slot));
  await Promise.all([produce(), ...slots]);
  return results;
}
