import { expect, test } from '@playwright/test';
import { AbortError } from '../src/errors';
import { sleep } from '../src/http';
import { BoundedQueue, runWorkerPool } from '../src/worker-pool';

test.describe('BoundedQueue', () => {
  test('put waits while the queue is full', async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.put(1);

    let secondPut = false;
    const pending = queue.put(2).then((accepted) => {
      secondPut = accepted;
    });
    await sleep(10);
    expect(secondPut).toBe(false);
    expect(queue.size).toBe(1);

    expect(await queue.take()).toEqual({ value: 1, done: false });
    await pending;
    expect(secondPut).toBe(true);
    expect(await queue.take()).toEqual({ value: 2, done: false });
  });

  test('a closed queue drains and then reports done', async () => {
    const queue = new BoundedQueue<string>(2);
    await queue.put('a');
    queue.close();

    expect(await queue.put('b')).toBe(false);
    expect(await queue.take()).toEqual({ value: 'a', done: false });
    expect(await queue.take()).toEqual({ value: undefined, done: true });
  });

  test('capacity must be positive', () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
  });
});

test.describe('runWorkerPool', () => {
  test('every item is processed', async () => {
    const { results, failures } = await runWorkerPool([1, 2, 3, 4, 5], async (n) => n * 10, {
      concurrency: 2,
    });
    expect([...results].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50]);
    expect(failures).toEqual([]);
  });

  test('no more than `concurrency` workers run at once', async () => {
    let running = 0;
    let peak = 0;
    await runWorkerPool(
      Array.from({ length: 8 }, (_, i) => i),
      async () => {
        running += 1;
        peak = Math.max(peak, running);
        await sleep(5);
        running -= 1;
      },
      { concurrency: 3 }
    );
    expect(peak).toBe(3);
  });

  test('async sources are consumed', async () => {
    async function* source() {
      yield 'a';
      yield 'b';
    }
    const { results } = await runWorkerPool(source(), async (s) => s.toUpperCase(), { concurrency: 1 });
    expect(results).toEqual(['A', 'B']);
  });

  test("'skip' records failures and keeps going", async () => {
    const failure = new Error('bad item');
    const { results, failures } = await runWorkerPool(
      [1, 2, 3],
      async (n) => {
        if (n === 2) throw failure;
        return n;
      },
      { concurrency: 1, onError: 'skip' }
    );
    expect(results).toEqual([1, 3]);
    expect(failures).toEqual([{ item: 2, error: failure }]);
  });

  test("'abort' rejects with the first failure", async () => {
    const processed: number[] = [];
    await expect(
      runWorkerPool(
        [1, 2, 3, 4],
        async (n) => {
          if (n === 2) throw new Error('bad item');
          processed.push(n);
          return n;
        },
        { concurrency: 1, queueCapacity: 1 }
      )
    ).rejects.toThrow('bad item');
    expect(processed).toEqual([1]);
  });

  test('an aborted signal stops the pool with AbortError', async () => {
    const controller = new AbortController();
    const pool = runWorkerPool(
      [1, 2, 3],
      async (n) => {
        if (n === 1) controller.abort();
        await sleep(5);
        return n;
      },
      { concurrency: 1, signal: controller.signal }
    );
    await expect(pool).rejects.toBeInstanceOf(AbortError);
  });

  test('a signal aborted up front starts no work', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    await expect(
      runWorkerPool(
        [1],
        async () => {
          calls += 1;
        },
        { signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(AbortError);
    expect(calls).toBe(0);
  });
});
