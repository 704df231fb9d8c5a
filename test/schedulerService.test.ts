import test from 'node:test';
import assert from 'node:assert/strict';

import {
  getNextScanUtcMs,
  getSchedulerState,
  runDailyScanPipeline,
  runStepWithRetries,
  setSchedulerEnabled,
  startScheduler,
  stopScheduler,
} from '../server/services/schedulerService.js';

const NO_WAIT = { ignoreRuntimeEnabled: true, retryDelayMs: 0 };
const SCHEDULE = { hour: 10, minute: 30 };

test('pipeline reloads symbols before scanning', async () => {
  const calls: string[] = [];
  await runDailyScanPipeline(
    '2026-10-16',
    {
      reloadSymbols: async () => {
        calls.push('reload');
        return { count_added: 0, count_total: 5 };
      },
      runScan: async () => {
        calls.push('scan');
        return { status: 'completed' };
      },
    },
    NO_WAIT,
  );
  assert.deepEqual(calls, ['reload', 'scan']);
});

test('pipeline still scans when the reload step keeps failing', async () => {
  const calls: string[] = [];
  await runDailyScanPipeline(
    '2026-10-16',
    {
      reloadSymbols: async () => {
        calls.push('reload');
        throw new Error('symbols file not found at /tmp/missing.txt');
      },
      runScan: async () => {
        calls.push('scan');
        return { status: 'completed' };
      },
    },
    NO_WAIT,
  );
  assert.deepEqual(calls, ['reload', 'reload', 'reload', 'scan']);
});

test('runStepWithRetries retries a rejected step until it succeeds', async () => {
  let attempts = 0;
  const ok = await runStepWithRetries(
    'Scan',
    async () => {
      attempts += 1;
      if (attempts < 3) throw new Error('transient');
      return { status: 'completed' };
    },
    NO_WAIT,
  );
  assert.equal(ok, true);
  assert.equal(attempts, 3);
});

test('runStepWithRetries treats a failed status as a failed attempt', async () => {
  let attempts = 0;
  const ok = await runStepWithRetries(
    'Scan',
    async () => {
      attempts += 1;
      return { status: 'failed' };
    },
    NO_WAIT,
  );
  assert.equal(ok, false);
  assert.equal(attempts, 3);
});

test('runStepWithRetries accepts an already running scan', async () => {
  let attempts = 0;
  const ok = await runStepWithRetries(
    'Scan',
    async () => {
      attempts += 1;
      return { status: 'running' };
    },
    NO_WAIT,
  );
  assert.equal(ok, true);
  assert.equal(attempts, 1);
});

test('runStepWithRetries does nothing while the scheduler is disabled', async () => {
  setSchedulerEnabled(false);
  let attempts = 0;
  const ok = await runStepWithRetries(
    'Scan',
    async () => {
      attempts += 1;
    },
    { retryDelayMs: 0 },
  );
  assert.equal(ok, false);
  assert.equal(attempts, 0);
});

test('getNextScanUtcMs picks the same day before the scheduled time', () => {
  const next = getNextScanUtcMs(new Date('2026-10-16T09:00:00Z'), SCHEDULE);
  assert.equal(new Date(next).toISOString(), '2026-10-16T10:30:00.000Z');
});

test('getNextScanUtcMs skips the weekend after a Friday run', () => {
  const next = getNextScanUtcMs(new Date('2026-10-16T11:00:00Z'), SCHEDULE);
  assert.equal(new Date(next).toISOString(), '2026-10-19T10:30:00.000Z');
});

test('getNextScanUtcMs from a Sunday lands on Monday', () => {
  const next = getNextScanUtcMs(new Date('2026-10-18T12:00:00Z'), SCHEDULE);
  assert.equal(new Date(next).toISOString(), '2026-10-19T10:30:00.000Z');
});

test('startScheduler arms a timer only while enabled', () => {
  const deps = { reloadSymbols: async () => undefined, runScan: async () => ({ status: 'completed' }) };

  setSchedulerEnabled(false);
  assert.equal(startScheduler(deps).nextScanRunUtc, null);

  const enabled = setSchedulerEnabled(true);
  assert.equal(enabled.enabled, true);
  assert.ok(enabled.nextScanRunUtc);
  assert.ok(Date.parse(enabled.nextScanRunUtc) > Date.now());

  stopScheduler();
  assert.equal(getSchedulerState().nextScanRunUtc, null);
  setSchedulerEnabled(false);
});
