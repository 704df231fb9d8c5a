import test from 'node:test';
import assert from 'node:assert/strict';

import { ScanState } from '../server/lib/ScanState.js';
import { ORPHANED_SCAN_MESSAGE, ScanOrchestrator, summarizeScanErrors } from '../server/orchestrators/scanOrchestrator.js';
import type { ScanOrchestratorDeps } from '../server/orchestrators/scanOrchestrator.js';
import type { ScanProgress } from '../server/lib/ScanState.js';
import { SKIPPED_MESSAGE } from '../server/services/scanSnapshot.js';
import { processSymbol } from '../server/services/symbolPipeline.js';
import { barsFromCloses, FakeMarketData, reversalCloses, risingCloses } from './support/fixtures.js';
import type { FakeMarketDataOptions } from './support/fixtures.js';
import { MemoryScanStore } from './support/memoryScanStore.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const MORNING = new Date('2026-10-16T09:00:00Z');

async function setup(
  symbols: string[],
  marketOptions: FakeMarketDataOptions = {},
  deps: Partial<ScanOrchestratorDeps> = {},
) {
  const store = new MemoryScanStore();
  await store.insertMissingSymbols(symbols);
  const market = new FakeMarketData(marketOptions);
  const clock = { now: MORNING };
  const orchestrator = new ScanOrchestrator({
    store,
    marketData: market,
    state: new ScanState('scan', { retentionMs: 0 }),
    now: () => clock.now,
    concurrency: 4,
    lookback: 5,
    ...deps,
  });
  return { store, market, orchestrator, clock };
}

const MIXED_BARS = {
  NMDC: barsFromCloses(reversalCloses()),
  SHORT: barsFromCloses(risingCloses(29)),
};

function withoutScan<T extends { scanId: number }>(rows: readonly T[], scanId: number): Array<Omit<T, 'scanId'>> {
  return rows
    .filter((row) => row.scanId === scanId)
    .map(({ scanId: _scanId, ...rest }) => rest);
}

// ---------------------------------------------------------------------------
// summarizeScanErrors
// ---------------------------------------------------------------------------

test('summarizeScanErrors returns null without errors', () => {
  assert.equal(summarizeScanErrors([]), null);
});

test('summarizeScanErrors joins at most the first N errors', () => {
  const errors = Array.from({ length: 12 }, (_, i) => `S${i}: boom`);
  assert.equal(summarizeScanErrors(errors, 3), 'S0: boom; S1: boom; S2: boom');
  assert.equal(summarizeScanErrors(errors)?.split('; ').length, 10);
});

test('summarizeScanErrors truncates to the maximum length', () => {
  assert.equal(summarizeScanErrors(['abcdef', 'ghij'], 10, 8), 'abcdef; ');
});

// ---------------------------------------------------------------------------
// Full scan
// ---------------------------------------------------------------------------

test('runScan processes every symbol and records each outcome', async () => {
  const { store, orchestrator } = await setup(['TCS', 'NMDC', 'SHORT', 'FAIL'], {
    bars: MIXED_BARS,
    failHistory: ['FAIL'],
  });

  const summary = await orchestrator.runScan();
  assert.deepEqual(summary, {
    status: 'completed',
    scanId: 1,
    total: 4,
    processed: 4,
    skipped: 0,
    ignored: 1,
    errors: 1,
    recommended: 1,
    errorMessage: 'FAIL: history unavailable for FAIL',
  });

  const scan = await store.getScan(1);
  assert.equal(scan?.status, 'completed');
  assert.equal(scan?.errorMessage, 'FAIL: history unavailable for FAIL');
  assert.deepEqual(scan?.finishedAt, MORNING);

  assert.deepEqual(await store.countResults(1), { total: 4, recommended: 1 });
  const [top] = await store.listScanResults(1, { recommendedOnly: true });
  assert.equal(top.symbol, 'NMDC');
  assert.ok(top.recommendation.score >= 1);
  assert.equal(top.technicals?.historySource, 'google');

  const logs = await store.listScanLogs(1);
  assert.deepEqual(
    logs.map(({ status, symbol, message }) => ({ status, symbol, message })),
    [
      { status: 'ignored', symbol: 'SHORT', message: 'Insufficient price data (29 bars, need ≥30)' },
      { status: 'error', symbol: 'FAIL', message: 'history unavailable for FAIL' },
    ],
  );
  assert.equal(orchestrator.state.isRunning, false);
});

test('ignored symbols keep their price series but no indicators', async () => {
  const { store, orchestrator } = await setup(['SHORT'], { bars: MIXED_BARS });
  await orchestrator.runScan();
  const [technicals] = store.technicals;
  assert.equal(technicals.rsi14, null);
  assert.equal(technicals.close, null);
  assert.equal(JSON.parse(technicals.priceSeriesJson).length, 29);
  assert.equal(technicals.rsiSeriesJson, '[]');
});

test('an empty universe completes with zero counts', async () => {
  const { store, orchestrator } = await setup([]);
  const summary = await orchestrator.runScan();
  assert.equal(summary.status, 'completed');
  if (summary.status === 'completed') {
    assert.equal(summary.total, 0);
    assert.equal(summary.errorMessage, null);
  }
  assert.equal((await store.getScan(1))?.status, 'completed');
});

test('a rejecting processor counts as a symbol error', async () => {
  const { store, orchestrator } = await setup(['TCS'], {}, {
    processor: async () => {
      throw new Error('parser exploded');
    },
  });
  const summary = await orchestrator.runScan();
  assert.equal(summary.status, 'completed');
  if (summary.status === 'completed') assert.equal(summary.errorMessage, 'TCS: parser exploded');
  assert.equal(store.logs[0].status, 'error');
});

// ---------------------------------------------------------------------------
// Same-day replay
// ---------------------------------------------------------------------------

test('a second scan the same day replays stored rows without fetching', async () => {
  const { store, market, orchestrator, clock } = await setup(['TCS', 'NMDC', 'SHORT', 'FAIL'], {
    bars: MIXED_BARS,
    failHistory: ['FAIL'],
  });
  await orchestrator.runScan();
  const callsAfterFirst = market.calls.length;

  clock.now = new Date('2026-10-16T11:00:00Z');
  const summary = await orchestrator.runScan();

  assert.equal(market.calls.length, callsAfterFirst);
  assert.deepEqual(summary, {
    status: 'completed',
    scanId: 2,
    total: 4,
    processed: 0,
    skipped: 4,
    ignored: 0,
    errors: 0,
    recommended: 1,
    errorMessage: null,
  });

  const restamp = <T extends { computedAt: Date }>(rows: T[]) => rows.map(({ computedAt: _at, ...rest }) => rest);
  assert.deepEqual(restamp(withoutScan(store.technicals, 2)), restamp(withoutScan(store.technicals, 1)));
  assert.deepEqual(
    withoutScan(store.recommendations, 2).map(({ symbolId, recommended, score, reason }) => ({ symbolId, recommended, score, reason })),
    withoutScan(store.recommendations, 1).map(({ symbolId, recommended, score, reason }) => ({ symbolId, recommended, score, reason })),
  );
  assert.ok(store.technicals.filter((row) => row.scanId === 2).every((row) => row.computedAt.getTime() === clock.now.getTime()));

  const logs = await store.listScanLogs(2);
  assert.equal(logs.length, 4);
  assert.ok(logs.every((log) => log.status === 'skipped' && log.message === SKIPPED_MESSAGE));
});

test('a scan on the next day fetches again', async () => {
  const { market, orchestrator, clock } = await setup(['TCS']);
  await orchestrator.runScan();
  clock.now = new Date('2026-10-17T09:00:00Z');
  const summary = await orchestrator.runScan();
  assert.equal(summary.status, 'completed');
  if (summary.status === 'completed') assert.equal(summary.processed, 1);
  assert.deepEqual(market.calls, ['fundamentals:TCS', 'history:TCS', 'fundamentals:TCS', 'history:TCS']);
});

// ---------------------------------------------------------------------------
// Run guard
// ---------------------------------------------------------------------------

test('a concurrent start reports running and writes nothing', async () => {
  const { store, orchestrator } = await setup(['TCS', 'INFY'], { delayMs: 10 });
  const mutationsBefore = store.mutations;

  const [first, second] = await Promise.all([orchestrator.startScan(), orchestrator.startScan()]);
  assert.equal(first.status, 'started');
  assert.deepEqual(second, { status: 'running' });
  assert.deepEqual(await orchestrator.runScan(), { status: 'running' });

  if (first.status === 'started') {
    const completion = await first.completion;
    assert.equal(completion.ok, true);
  }
  assert.equal(store.scans.length, 1);
  // createScan, saveScanResults, finalizeScan
  assert.equal(store.mutations - mutationsBefore, 3);
  assert.equal(orchestrator.state.isRunning, false);
});

test('progress is readable while a scan runs', async () => {
  const seen: Array<ScanProgress | null> = [];
  const state = new ScanState('scan', { retentionMs: 0 });
  const { orchestrator } = await setup(['TCS', 'INFY', 'WIPRO'], {}, {
    state,
    concurrency: 1,
    processor: async (symbol, marketData, options) => {
      const scanId = state.activeScanId;
      seen.push(scanId === null ? null : state.getProgress(scanId));
      return processSymbol(symbol, marketData, options);
    },
  });
  await orchestrator.runScan();

  assert.deepEqual(seen[1], {
    total: 3,
    to_process: 3,
    skipped: 0,
    completed: 1,
    current_symbol: 'INFY',
    errors: 0,
  });
  assert.equal(orchestrator.getProgress(1), null);
});

test('fetches respect the concurrency limit', async () => {
  const symbols = ['A', 'B', 'C', 'D', 'E', 'F'];
  const { market, orchestrator } = await setup(symbols, { delayMs: 5 }, { concurrency: 2 });
  await orchestrator.runScan();
  assert.equal(market.maxInFlight, 2);
});

test('same-day lookups respect the concurrency limit', async () => {
  const symbols = Array.from({ length: 40 }, (_, i) => `SYM${i}`);
  const { store, orchestrator } = await setup(symbols, {}, { concurrency: 3 });
  const lookup = store.latestSnapshot.bind(store);
  let inFlight = 0;
  let maxInFlight = 0;
  let calls = 0;
  store.latestSnapshot = async (symbolId) => {
    calls += 1;
    inFlight += 1;
    maxInFlight = Math.max(maxInFlight, inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return await lookup(symbolId);
    } finally {
      inFlight -= 1;
    }
  };

  const summary = await orchestrator.runScan();
  assert.equal(summary.status, 'completed');
  assert.equal(calls, 40);
  assert.equal(maxInFlight, 3);
});

test('a failed same-day lookup marks the scan failed', async () => {
  const { store, orchestrator } = await setup(['TCS', 'INFY']);
  store.latestSnapshot = async () => {
    throw new Error('timeout exceeded when trying to connect');
  };

  await assert.rejects(orchestrator.runScan(), /latest snapshot lookup failed for TCS: timeout exceeded/);
  const scan = await store.getScan(1);
  assert.equal(scan?.status, 'failed');
  assert.equal(orchestrator.state.isRunning, false);
});

// ---------------------------------------------------------------------------
// Failure handling
// ---------------------------------------------------------------------------

test('a failed write marks the scan failed and frees the run slot', async () => {
  const { store, orchestrator } = await setup(['TCS']);
  store.failSaveWith = new Error('deadlock detected');

  await assert.rejects(orchestrator.runScan(), /deadlock detected/);
  const scan = await store.getScan(1);
  assert.equal(scan?.status, 'failed');
  assert.equal(scan?.errorMessage, 'deadlock detected');
  assert.equal(orchestrator.state.isRunning, false);

  store.failSaveWith = null;
  const retry = await orchestrator.runScan();
  assert.equal(retry.status, 'completed');
});

test('a failed scan row insert releases the run slot', async () => {
  const { store, orchestrator } = await setup(['TCS']);
  store.createScan = async () => {
    throw new Error('connection refused');
  };
  await assert.rejects(orchestrator.startScan(), /connection refused/);
  assert.equal(orchestrator.state.isRunning, false);
});

test('reconcileOrphanedScans fails scans left running', async () => {
  const { store, orchestrator } = await setup([]);
  await store.createScan(new Date('2026-10-15T09:00:00Z'));
  assert.equal(await orchestrator.reconcileOrphanedScans(), 1);
  const scan = await store.getScan(1);
  assert.equal(scan?.status, 'failed');
  assert.equal(scan?.errorMessage, ORPHANED_SCAN_MESSAGE);
  assert.deepEqual(scan?.finishedAt, MORNING);
  assert.equal(await orchestrator.reconcileOrphanedScans(), 0);
});
