/**
 * Secondary history source: the Yahoo Finance chart API (no key required).
 *
 * NSE listings need a `.NS` suffix and BSE listings `.BO`; the bare symbol is
 * the last resort for non-Indian tickers.
 */

import { parseJsonSafe, validateApiResponse, YahooChartResponseSchema } from '../lib/apiSchemas.js';
import type { YahooChartResponse } from '../lib/apiSchemas.js';
import { DAY_MS, utcDateKeyFromUnixSeconds } from '../lib/dateUtils.js';
import type { HttpClient } from './httpClient.js';
import { normalizeBars } from './googleFinanceSource.js';
import type { PriceBar } from './scanTypes.js';

export const YAHOO_SYMBOL_SUFFIXES = ['.NS', '.BO', ''] as const;
export const YAHOO_MIN_ROWS = 20;
const DAYS_PER_MONTH = 30;

export function chartUrl(ticker: string, period1: number, period2: number): string {
  return `https://query1.finance.yahoo.com/v8/finance/chart/${encodeURIComponent(ticker)}?period1=${period1}&period2=${period2}&interval=1d&events=history`;
}

export function chartToBars(payload: YahooChartResponse): PriceBar[] {
  const result = payload.chart.result?.[0];
  if (!result) return [];
  const timestamps = result.timestamp ?? [];
  const closes = result.indicators.quote?.[0]?.close ?? [];
  const bars: PriceBar[] = [];
  for (let i = 0; i < timestamps.length; i++) {
    const close = closes[i];
    if (close === null || close === undefined || !Number.isFinite(close) || close <= 0) continue;
    const date = utcDateKeyFromUnixSeconds(timestamps[i]);
    if (date) bars.push({ date, close });
  }
  return normalizeBars(bars);
}

export class YahooFinanceSource {
  constructor(
    private readonly http: HttpClient,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Bars for the first suffix variant with at least YAHOO_MIN_ROWS rows; empty otherwise. */
  async fetchHistory(symbol: string, months: number): Promise<PriceBar[]> {
    const end = this.now();
    const period2 = Math.floor(end.getTime() / 1000);
    const period1 = Math.floor((end.getTime() - months * DAYS_PER_MONTH * DAY_MS) / 1000);

    for (const suffix of YAHOO_SYMBOL_SUFFIXES) {
      const ticker = `${symbol}${suffix}`;
      const page = await this.http.fetchPage(chartUrl(ticker, period1, period2));
      if (!page.ok) continue;
      const payload = validateApiResponse(YahooChartResponseSchema, parseJsonSafe(page.body), `yahoo chart ${ticker}`);
      if (!payload) continue;
      const bars = chartToBars(payload);
      if (bars.length >= YAHOO_MIN_ROWS) {
        console.log(`[yahoo] ${symbol}: ${bars.length} bars via ${ticker}`);
        return bars;
      }
      console.log(`[yahoo] ${symbol}: ${ticker} returned ${bars.length} rows (need ${YAHOO_MIN_ROWS})`);
    }
    console.warn(`[yahoo] ${symbol}: no usable variant among ${YAHOO_SYMBOL_SUFFIXES.map((s) => symbol + s).join(', ')}`);
    return [];
  }
}
