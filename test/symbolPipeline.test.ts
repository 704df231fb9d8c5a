import test from 'node:test';
import assert from 'node:assert/strict';

import { analyzeBars, insufficientDataMessage, processSymbol } from '../server/services/symbolPipeline.js';
import { barsFromCloses, FakeMarketData, fundamentalsFor, reversalCloses, risingCloses } from './support/fixtures.js';

test('insufficientDataMessage names the bar count and the minimum', () => {
  assert.equal(insufficientDataMessage(29), 'Insufficient price data (29 bars, need ≥30)');
});

test('processSymbol ignores a symbol with fewer than 30 bars', async () => {
  const bars = barsFromCloses(risingCloses(29));
  const market = new FakeMarketData({ bars: { TCS: bars } });
  const outcome = await processSymbol('TCS', market);

  assert.deepEqual(outcome, {
    kind: 'ignored',
    symbol: 'TCS',
    fundamentals: fundamentalsFor('TCS'),
    historySource: 'google',
    bars,
    reason: 'Insufficient price data (29 bars, need ≥30)',
  });
});

test('processSymbol analyzes exactly 30 bars', async () => {
  const market = new FakeMarketData({ bars: { TCS: barsFromCloses(risingCloses(30)) } });
  const outcome = await processSymbol('TCS', market);
  assert.equal(outcome.kind, 'ok');
});

test('processSymbol scores a reversal as recommended', async () => {
  const bars = barsFromCloses(reversalCloses());
  const market = new FakeMarketData({ bars: { NMDC: bars } });
  const outcome = await processSymbol('NMDC', market, { lookback: 5, months: 9 });

  assert.equal(outcome.kind, 'ok');
  if (outcome.kind === 'ok') {
    assert.equal(outcome.historySource, 'google');
    assert.equal(outcome.analysis.bars.length, 180);
    assert.deepEqual(outcome.analysis, analyzeBars(bars, 5));
    assert.equal(outcome.analysis.score.recommended, true);
  }
  assert.deepEqual(market.calls, ['fundamentals:NMDC', 'history:NMDC']);
});

test('processSymbol turns a history failure into an error outcome', async () => {
  const market = new FakeMarketData({ failHistory: ['INFY'] });
  assert.deepEqual(await processSymbol('INFY', market), {
    kind: 'error',
    symbol: 'INFY',
    fundamentals: fundamentalsFor('INFY'),
    message: 'history unavailable for INFY',
  });
});

test('processSymbol turns a fundamentals failure into an error outcome', async () => {
  const market = new FakeMarketData({ failFundamentals: ['INFY'] });
  assert.deepEqual(await processSymbol('INFY', market), {
    kind: 'error',
    symbol: 'INFY',
    fundamentals: null,
    message: 'fundamentals unavailable for INFY',
  });
});
