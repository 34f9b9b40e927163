import test from 'node:test';
import assert from 'node:assert/strict';
import { RateLimiter } from '../utils/rate-limiter.js';

function httpError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    }
  };
}

test('runs a task and returns its value', async () => {
  const limiter = new RateLimiter();
  assert.equal(await limiter.execute(() => Promise.resolve('ok')), 'ok');
  assert.equal(limiter.getStats().queueLength, 0);
});

test('retries rate limiting with backoff', async () => {
  const { sleep, delays } = recordingSleep();
  const limiter = new RateLimiter({ initialRetryDelayMs: 10, maxRetryDelayMs: 10, sleep });
  let calls = 0;

  const result = await limiter.execute(async () => {
    calls++;
    if (calls === 1) throw httpError(429);
    return 'done';
  });

  assert.equal(result, 'done');
  assert.equal(calls, 2);
  assert.deepStrictEqual(delays, [10]);
  assert.equal(limiter.getStats().retries, 1);
});

test('gives up after the last attempt', async () => {
  const { sleep, delays } = recordingSleep();
  const limiter = new RateLimiter({ maxAttempts: 2, initialRetryDelayMs: 5, maxRetryDelayMs: 5, sleep });
  let calls = 0;

  await assert.rejects(
    limiter.execute(async () => {
      calls++;
      throw httpError(503);
    }),
    { message: 'HTTP 503' }
  );
  assert.equal(calls, 2);
  assert.deepStrictEqual(delays, [5]);
});

test('does not retry client errors', async () => {
  const { sleep, delays } = recordingSleep();
  const limiter = new RateLimiter({ sleep });
  let calls = 0;

  await assert.rejects(
    limiter.execute(async () => {
      calls++;
      throw httpError(400);
    }),
    { message: 'HTTP 400' }
  );
  assert.equal(calls, 1);
  assert.deepStrictEqual(delays, []);
});

test('rejects work beyond the queue size', async () => {
  const limiter = new RateLimiter({ maxQueueSize: 0 });
  await assert.rejects(
    limiter.execute(() => Promise.resolve(1)),
    { message: 'Rate limiter queue is full (0 items)' }
  );
});

test('backoff doubles per attempt up to the ceiling', () => {
  const limiter = new RateLimiter({ initialRetryDelayMs: 100, maxRetryDelayMs: 250 });
  const first = limiter.getRetryDelay(1);
  const second = limiter.getRetryDelay(2);
  assert.ok(first >= 100 && first <= 110);
  assert.ok(second >= 200 && second <= 220);
  assert.equal(limiter.getRetryDelay(5), 250);
});
