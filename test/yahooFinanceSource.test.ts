import test from 'node:test';
import assert from 'node:assert/strict';

import { HttpClient } from '../server/services/httpClient.js';
import { chartToBars, chartUrl, YahooFinanceSource, YAHOO_MIN_ROWS } from '../server/services/yahooFinanceSource.js';
import { fakeFetch, recordingSleep } from './support/fakeFetch.js';

const NOW = new Date('2026-10-16T00:00:00Z');
const FIRST_TS = 1760572800; // 2025-10-16

function chartBody(rows: number, close: (i: number) => number | null = (i) => 100 + i): string {
  const timestamp = Array.from({ length: rows }, (_, i) => FIRST_TS + i * 86_400);
  return JSON.stringify({
    chart: {
      result: [{ timestamp, indicators: { quote: [{ close: timestamp.map((_, i) => close(i)) }] } }],
      error: null,
    },
  });
}

function source(respond: Parameters<typeof fakeFetch>[0]) {
  const { fetchFn, calls } = fakeFetch(respond);
  const { sleep } = recordingSleep();
  const http = new HttpClient({ fetchFn, sleep, policy: { retries: 1, backoffMs: 0, timeoutMs: 1000 } });
  return { yahoo: new YahooFinanceSource(http, () => NOW), calls };
}

test('chartUrl asks for daily bars between the two epochs', () => {
  assert.equal(
    chartUrl('TCS.NS', 100, 200),
    'https://query1.finance.yahoo.com/v8/finance/chart/TCS.NS?period1=100&period2=200&interval=1d&events=history',
  );
});

test('chartToBars skips null and non-positive closes', () => {
  const bars = chartToBars({
    chart: {
      result: [
        {
          timestamp: [FIRST_TS, FIRST_TS + 86_400, FIRST_TS + 2 * 86_400, FIRST_TS + 3 * 86_400],
          indicators: { quote: [{ close: [10, null, 0, 12.5] }] },
        },
      ],
    },
  });
  assert.deepEqual(bars, [
    { date: '2025-10-16', close: 10 },
    { date: '2025-10-19', close: 12.5 },
  ]);
});

test('chartToBars returns nothing for an empty result', () => {
  assert.deepEqual(chartToBars({ chart: { result: null } }), []);
});

test('fetchHistory uses the NSE suffix when it has enough rows', async () => {
  const { yahoo, calls } = source(() => ({ status: 200, body: chartBody(25) }));
  const bars = await yahoo.fetchHistory('TCS', 9);
  assert.equal(bars.length, 25);
  assert.equal(calls.length, 1);
  assert.ok(calls[0].includes('/chart/TCS.NS?'));
});

test('fetchHistory falls through to BSE when NSE is short of rows', async () => {
  const { yahoo, calls } = source((url) =>
    url.includes('/chart/TCS.NS?') ? { status: 200, body: chartBody(YAHOO_MIN_ROWS - 1) } : { status: 200, body: chartBody(30) },
  );
  const bars = await yahoo.fetchHistory('TCS', 9);
  assert.equal(bars.length, 30);
  assert.equal(calls.length, 2);
  assert.ok(calls[1].includes('/chart/TCS.BO?'));
});

test('fetchHistory returns empty after every variant fails or is malformed', async () => {
  const { yahoo, calls } = source((_url, index) => (index === 0 ? { status: 404 } : { status: 200, body: '{"chart":"nope"}' }));
  assert.deepEqual(await yahoo.fetchHistory('TCS', 9), []);
  assert.equal(calls.length, 3);
  assert.ok(calls[2].includes('/chart/TCS?'));
});
