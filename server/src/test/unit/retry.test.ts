import assert from 'node:assert/strict';
import { test } from 'node:test';
import { KeyedLock } from '../../utils/keyedLock.js';
import {
  AbortError,
  DEFAULT_BACKOFF,
  backoffDelay,
  runWithRetry,
} from '../../utils/retry.js';
import { withTimeout } from '../../utils/timeout.js';

const retryable = new Error('retry me');

test('backoff grows by the factor and stops at the cap', () => {
  const noJitter = () => 0;
  assert.equal(backoffDelay(DEFAULT_BACKOFF, 1, noJitter), 200);
  assert.equal(backoffDelay(DEFAULT_BACKOFF, 2, noJitter), 400);
  assert.equal(backoffDelay(DEFAULT_BACKOFF, 3, noJitter), 800);
  assert.equal(backoffDelay(DEFAULT_BACKOFF, 10, noJitter), 5000);
  assert.equal(backoffDelay(DEFAULT_BACKOFF, 1, () => 1), 240);
});

test('retries retryable failures and returns the eventual result', async () => {
  const sleeps: number[] = [];
  const retries: number[] = [];
  let calls = 0;
  const result = await runWithRetry({
    runStep: async () => {
      calls += 1;
      if (calls < 3) throw retryable;
      return 'done';
    },
    isRetryableError: (err) => err === retryable,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0,
    onRetry: ({ attempt }) => retries.push(attempt),
  });
  assert.equal(result, 'done');
  assert.deepEqual(sleeps, [200, 400]);
  assert.deepEqual(retries, [1, 2]);
});

test('gives up after maxAttempts and reports exhaustion', async () => {
  let calls = 0;
  let exhaustedAt = 0;
  await assert.rejects(
    runWithRetry({
      runStep: async () => {
        calls += 1;
        throw retryable;
      },
      isRetryableError: () => true,
      sleep: async () => undefined,
      onExhausted: ({ attempt }) => {
        exhaustedAt = attempt;
      },
    }),
    (err) => err === retryable,
  );
  assert.equal(calls, 3);
  assert.equal(exhaustedAt, 3);
});

test('non-retryable errors fail on the first attempt', async () => {
  let calls = 0;
  await assert.rejects(
    runWithRetry({
      runStep: async () => {
        calls += 1;
        throw new Error('bad input');
      },
      isRetryableError: () => false,
    }),
    /bad input/,
  );
  assert.equal(calls, 1);
});

test('an aborted signal stops before the next attempt', async () => {
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(
    runWithRetry({
      runStep: async () => 'never',
      isRetryableError: () => true,
      signal: controller.signal,
    }),
    AbortError,
  );
});

test('withTimeout rejects with the supplied error when the call hangs', async () => {
  await assert.rejects(
    withTimeout(new Promise<never>(() => undefined), 10, () => new Error('too slow')),
    /too slow/,
  );
  assert.equal(await withTimeout(Promise.resolve(7), 1000, () => new Error('x')), 7);
});

test('KeyedLock serializes holders of the same key only', async () => {
  const lock = new KeyedLock();
  const events: string[] = [];
  let releaseFirst: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    releaseFirst = resolve;
  });

  const first = lock.run('a', async () => {
    events.push('a1 start');
    await gate;
    events.push('a1 end');
  });
  const second = lock.run('a', async () => {
    events.push('a2 start');
  });
  const other = lock.run('b', async () => {
    events.push('b start');
  });

  await other;
  assert.deepEqual(events, ['a1 start', 'b start']);

  releaseFirst();
  await Promise.all([first, second]);
  assert.deepEqual(events, ['a1 start', 'b start', 'a1 end', 'a2 start']);
});

test('KeyedLock.runMany waits for every key it claims', async () => {
  const lock = new KeyedLock();
  const events: string[] = [];
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });

  const holder = lock.run('y', async () => {
    await gate;
    events.push('y done');
  });
  const many = lock.runMany(['x', 'y'], async () => {
    events.push('many');
  });

  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(events, []);
  release();
  await Promise.all([holder, many]);
  assert.deepEqual(events, ['y done', 'many']);
});
