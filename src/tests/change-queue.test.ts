import test from 'node:test';
import assert from 'node:assert/strict';
import { ChangeQueue, type PendingChange } from '../indexer/ChangeQueue.js';
import { ManualScheduler } from './helpers/manual-scheduler.js';
import { settle } from './helpers/test-repo.js';

interface Harness {
  queue: ChangeQueue;
  scheduler: ManualScheduler;
  calls: Array<{ file: string; change: PendingChange }>;
}

function createHarness(handler?: (file: string) => Promise<void>, debounceMs = 100): Harness {
  const scheduler = new ManualScheduler();
  const calls: Harness['calls'] = [];
  const queue = new ChangeQueue({
    debounceMs,
    scheduler,
    clock: scheduler.clock,
    onChange: async (file, change) => {
      calls.push({ file, change });
      await handler?.(file);
    }
  });
  return { queue, scheduler, calls };
}

function gate(): { wait: Promise<void>; open: () => void } {
  let open = () => {};
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

test('a burst of writes drains once, in first-seen order', async () => {
  const { queue, scheduler, calls } = createHarness();

  await queue.enqueue('/p', '/p/a.py');
  await queue.enqueue('/p', '/p/b.py');
  await queue.enqueue('/p', '/p/a.py');
  assert.equal(queue.size, 2);
  assert.equal(scheduler.activeCount, 1);

  scheduler.advance(99);
  assert.equal(calls.length, 0);

  scheduler.advance(1);
  await queue.whenIdle();

  assert.deepStrictEqual(
    calls.map((call) => call.file),
    ['/p/a.py', '/p/b.py']
  );
  assert.equal(queue.size, 0);
  assert.equal(scheduler.activeCount, 0);
});

test('every write restarts the delay', async () => {
  const { queue, scheduler, calls } = createHarness();

  await queue.enqueue('/p', '/p/a.py');
  scheduler.advance(60);
  await queue.enqueue('/p', '/p/b.py');
  scheduler.advance(60);
  assert.equal(calls.length, 0);

  scheduler.advance(40);
  await queue.whenIdle();
  assert.deepStrictEqual(
    calls.map(({ file, change }) => [file, change.observedAt]),
    [
      ['/p/a.py', 0],
      ['/p/b.py', 60]
    ]
  );
});

test('a failing update does not stop the rest of the drain', async () => {
  const { queue, calls } = createHarness(async (file) => {
    if (file.endsWith('a.py')) throw new Error('embedding backend down');
  });

  await queue.enqueue('/p', '/p/a.py');
  await queue.enqueue('/p', '/p/b.py');
  await queue.flush();

  assert.deepStrictEqual(
    calls.map((call) => call.file),
    ['/p/a.py', '/p/b.py']
  );
});

test('discarding a project drops only its entries', async () => {
  const { queue, scheduler } = createHarness();

  await queue.enqueue('/one', '/one/a.py');
  await queue.enqueue('/two', '/two/b.py');
  await queue.enqueue('/one', '/one/c.py');

  assert.equal(await queue.discardProject('/one'), 2);
  assert.equal(queue.size, 1);
  assert.equal(queue.hasPending('/one'), false);
  assert.equal(queue.hasPending('/two'), true);
  assert.equal(scheduler.activeCount, 1);

  assert.equal(await queue.discardProject('/two'), 1);
  assert.equal(queue.hasPending(), false);
  assert.equal(scheduler.activeCount, 0);
});

test('discarding a file reports whether it was pending', async () => {
  const { queue, scheduler } = createHarness();

  await queue.enqueue('/p', '/p/a.py');
  assert.equal(await queue.discardFile('/p/a.py'), true);
  assert.equal(await queue.discardFile('/p/a.py'), false);
  assert.equal(scheduler.activeCount, 0);
});

test('flush drains without waiting for the timer', async () => {
  const { queue, scheduler, calls } = createHarness();

  await queue.enqueue('/p', '/p/a.py');
  await queue.flush();

  assert.equal(calls.length, 1);
  assert.equal(scheduler.activeCount, 0);
  await queue.flush();
  assert.equal(calls.length, 1);
});

test('writes during a drain wait for it and run one at a time', async () => {
  const blocker = gate();
  let running = 0;
  let maxRunning = 0;
  const { queue, scheduler, calls } = createHarness(async (file) => {
    running++;
    maxRunning = Math.max(maxRunning, running);
    if (file.endsWith('a.py')) await blocker.wait;
    running--;
  });

  await queue.enqueue('/p', '/p/a.py');
  scheduler.advance(100);
  await settle();
  assert.equal(queue.isFlushing(), true);
  assert.equal(queue.isFlushing('/p'), true);
  assert.equal(queue.isFlushing('/q'), false);

  await queue.enqueue('/p', '/p/b.py');
  scheduler.advance(100);
  assert.deepStrictEqual(
    calls.map((call) => call.file),
    ['/p/a.py']
  );

  blocker.open();
  await queue.whenIdle();
  await settle();
  assert.equal(queue.hasPending('/p'), true);
  assert.equal(scheduler.activeCount, 1);

  scheduler.advance(100);
  await queue.whenIdle();
  assert.deepStrictEqual(
    calls.map((call) => call.file),
    ['/p/a.py', '/p/b.py']
  );
  assert.equal(maxRunning, 1);
});

test('the delay has a floor and a default', () => {
  assert.equal(new ChangeQueue({ debounceMs: 10, onChange: async () => {} }).delayMs, 50);
  assert.equal(new ChangeQueue({ onChange: async () => {} }).delayMs, 2000);
});
