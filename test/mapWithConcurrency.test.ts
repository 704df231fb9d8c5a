import test from 'node:test';
import assert from 'node:assert/strict';

import { isSettledError, mapWithConcurrency } from '../server/lib/mapWithConcurrency.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// Basic behavior
// ---------------------------------------------------------------------------

test('mapWithConcurrency processes all items and returns correct results', async () => {
  const results = await mapWithConcurrency([1, 2, 3, 4, 5], 3, async (n) => n * 2);
  assert.deepEqual(results, [2, 4, 6, 8, 10]);
});

test('mapWithConcurrency returns empty array for empty input', async () => {
  const results = await mapWithConcurrency<number, number>([], 4, async (x) => x);
  assert.deepEqual(results, []);
});

test('mapWithConcurrency preserves result order regardless of completion order', async () => {
  const results = await mapWithConcurrency([50, 30, 10, 40, 20], 5, async (ms, idx) => {
    await delay(ms);
    return idx;
  });
  assert.deepEqual(results, [0, 1, 2, 3, 4]);
});

// ---------------------------------------------------------------------------
// Concurrency limit
// ---------------------------------------------------------------------------

test('mapWithConcurrency never exceeds the concurrency limit', async () => {
  let concurrent = 0;
  let maxConcurrent = 0;

  await mapWithConcurrency(
    Array.from({ length: 10 }, (_, i) => i),
    3,
    async () => {
      concurrent++;
      maxConcurrent = Math.max(maxConcurrent, concurrent);
      await delay(5);
      concurrent--;
    },
  );

  assert.equal(maxConcurrent, 3);
});

test('mapWithConcurrency with concurrency=1 processes items serially', async () => {
  const order: string[] = [];

  await mapWithConcurrency(['TCS', 'INFY', 'WIPRO'], 1, async (symbol) => {
    order.push(`start:${symbol}`);
    await delay(1);
    order.push(`end:${symbol}`);
  });

  assert.deepEqual(order, ['start:TCS', 'end:TCS', 'start:INFY', 'end:INFY', 'start:WIPRO', 'end:WIPRO']);
});

test('mapWithConcurrency treats a non-numeric concurrency as 1', async () => {
  let maxConcurrent = 0;
  let concurrent = 0;
  await mapWithConcurrency([1, 2, 3], Number.NaN, async () => {
    concurrent++;
    maxConcurrent = Math.max(maxConcurrent, concurrent);
    await delay(1);
    concurrent--;
  });
  assert.equal(maxConcurrent, 1);
});

// ---------------------------------------------------------------------------
// onSettled callback
// ---------------------------------------------------------------------------

test('mapWithConcurrency onSettled receives result, index and item', async () => {
  const calls: Array<{ result: unknown; index: number; item: string }> = [];

  await mapWithConcurrency(
    ['a', 'b', 'c'],
    2,
    async (s) => s.toUpperCase(),
    (result, index, item) => calls.push({ result, index, item }),
  );

  assert.deepEqual(
    calls.sort((a, b) => a.index - b.index),
    [
      { result: 'A', index: 0, item: 'a' },
      { result: 'B', index: 1, item: 'b' },
      { result: 'C', index: 2, item: 'c' },
    ],
  );
});

test('mapWithConcurrency keeps going when onSettled throws', async () => {
  let settledCount = 0;
  const results = await mapWithConcurrency(
    [1, 2, 3],
    2,
    async (n) => n,
    () => {
      settledCount++;
      throw new Error('callback error');
    },
  );
  assert.equal(settledCount, 3);
  assert.deepEqual(results, [1, 2, 3]);
});

// ---------------------------------------------------------------------------
// Worker errors
// ---------------------------------------------------------------------------

test('mapWithConcurrency captures worker rejections as { error } results', async () => {
  const boom = new Error('boom');
  const results = await mapWithConcurrency([1, 2, 3], 2, async (n) => {
    if (n === 2) throw boom;
    return n * 10;
  });

  assert.deepEqual(results, [10, { error: boom }, 30]);
  assert.equal(isSettledError(results[0]), false);
  assert.equal(isSettledError(results[1]), true);
});

test('isSettledError does not mistake a result object carrying an error field plus others', () => {
  assert.equal(isSettledError({ error: 'x', symbol: 'TCS' }), false);
});
