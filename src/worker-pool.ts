import { SCRAPING_CONFIG } from './constants';
import { AbortError } from './errors';

/**
 * FIFO queue with a fixed capacity. `put` waits while the queue is full so a
 * fast producer cannot run ahead of slow consumers.
 */
export class BoundedQueue<T> {
  private items: Array<{ value: T }> = [];
  private takers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private putters: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves to false when the queue was closed before the item fit.
   */
  async put(item: T): Promise<boolean> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
    if (this.closed) return false;

    const taker = this.takers.shift();
    if (taker) {
      taker({ value: item, done: false });
    } else {
      this.items.push({ value: item });
    }
    return true;
  }

  take(): Promise<IteratorResult<T, undefined>> {
    const entry = this.items.shift();
    if (entry) {
      this.putters.shift()?.();
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.takers.push(resolve));
  }

  // No more puts; takers drain what is left, then see `done`
  close(): void {
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      taker({ value: undefined, done: true });
    }
    for (const putter of this.putters.splice(0)) {
      putter();
    }
  }

  clear(): void {
    this.items = [];
  }
}

export interface WorkerPoolOptions {
  concurrency?: number;
  queueCapacity?: number;
  signal?: AbortSignal;
  // 'abort' stops the whole pool on the first failure, 'skip' records it
  onError?: 'abort' | 'skip';
}

export interface WorkerPoolFailure<T> {
  item: T;
  error: unknown;
}

export interface WorkerPoolResult<T, R> {
  results: R[];
  failures: WorkerPoolFailure<T>[];
}

/**
 * Feeds `source` through a bounded queue to a fixed number of workers.
 * Result order is completion order, not source order.
 */
export async function runWorkerPool<T, R>(
  source: Iterable<T> | AsyncIterable<T>,
  worker: (item: T, signal: AbortSignal) => Promise<R>,
  options: WorkerPoolOptions = {}
): Promise<WorkerPoolResult<T, R>> {
  const concurrency = Math.max(
    1,
    Math.floor(options.concurrency ?? SCRAPING_CONFIG.MAX_CONCURRENT_REQUESTS)
  );
  const queue = new BoundedQueue<T>(Math.max(1, options.queueCapacity ?? concurrency * 2));
  const onError = options.onError ?? 'abort';
  const controller = new AbortController();
  const state: { error?: unknown } = {};

  const results: R[] = [];
  const failures: WorkerPoolFailure<T>[] = [];

  const abort = (error: unknown): void => {
    if (controller.signal.aborted) return;
    state.error = error;
    queue.clear();
    queue.close();
    controller.abort(error);
  };

  if (options.signal?.aborted) {
    throw new AbortError({ cause: options.signal.reason });
  }
  const onExternalAbort = (): void => abort(new AbortError({ cause: options.signal?.reason }));
  options.signal?.addEventListener('abort', onExternalAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(state.error), { once: true });
  });

  const produce = async (): Promise<void> => {
    try {
      for await (const item of source) {
        if (controller.signal.aborted) break;
        if (!(await queue.put(item))) break;
      }
    } catch (error) {
      abort(error);
    } finally {
      queue.close();
    }
  };

  const work = async (): Promise<void> => {
    for (;;) {
      const next = await queue.take();
      if (next.done || controller.signal.aborted) return;

      try {
        results.push(await worker(next.value, controller.signal));
      } catch (error) {
        if (controller.signal.aborted) return;
        if (onError === 'skip') {
          failures.push({ item: next.value, error });
        } else {
          abort(error);
        }
      }
    }
  };

  try {
    // Workers still in flight when the pool aborts are left to settle on their own
    await Promise.race([
      Promise.all([produce(), ...Array.from({ length: concurrency }, () => work())]),
      aborted,
    ]);
  } finally {
    options.signal?.removeEventListener('abort', onExternalAbort);
  }

  if (controller.signal.aborted) {
    throw state.error;
  }
  return { results, failures };
}
