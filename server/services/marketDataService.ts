/**
 * Source fallback chain for one symbol's market data.
 *
 *   network probe dead        → synthetic
 *   fundamentals: Google page → synthetic
 *   history:      Google chart (≥60 bars) → Yahoo chart (≥20 rows) → synthetic
 *
 * Neither operation rejects on network failure; the last tier always answers.
 */

import { PRICE_HISTORY_MONTHS } from '../config.js';
import { historySourceTotal } from '../metrics.js';
import { GoogleFinanceSource } from './googleFinanceSource.js';
import type { FundamentalsResult } from './googleFinanceSource.js';
import { HttpClient } from './httpClient.js';
import type { FundamentalSnapshot, HistorySource, PriceBar, PriceHistory } from './scanTypes.js';
import { syntheticFundamentals, syntheticPriceHistory } from './syntheticSource.js';
import { YahooFinanceSource } from './yahooFinanceSource.js';

export const PRIMARY_MIN_BARS = 60;

export interface MarketDataProvider {
  fetchFundamentals(symbol: string): Promise<FundamentalSnapshot>;
  fetchPriceHistory(symbol: string, months?: number): Promise<PriceHistory>;
}

export interface HistorySourceLike {
  fetchHistory(symbol: string, months: number): Promise<PriceBar[]>;
}

export interface PrimarySourceLike {
  fetchFundamentals(symbol: string): Promise<FundamentalsResult>;
  fetchHistory(symbol: string): Promise<PriceBar[]>;
}

export interface MarketDataServiceDeps {
  http?: HttpClient;
  primary?: PrimarySourceLike;
  secondary?: HistorySourceLike;
  now?: () => Date;
}

export class MarketDataService implements MarketDataProvider {
  private readonly http: HttpClient;
  private readonly primary: PrimarySourceLike;
  private readonly secondary: HistorySourceLike;
  private readonly now: () => Date;

  constructor(deps: MarketDataServiceDeps = {}) {
    this.http = deps.http ?? new HttpClient();
    this.now = deps.now ?? (() => new Date());
    this.primary = deps.primary ?? new GoogleFinanceSource(this.http);
    this.secondary = deps.secondary ?? new YahooFinanceSource(this.http, this.now);
  }

  async fetchFundamentals(symbol: string): Promise<FundamentalSnapshot> {
    if (!(await this.http.isNetworkAlive())) {
      return syntheticFundamentals(symbol);
    }
    const result = await this.primary.fetchFundamentals(symbol);
    if (result.ok) return result.fundamentals;
    console.warn(`[market-data] ${symbol}: fundamentals unavailable (${result.reason}); using synthetic profile`);
    return syntheticFundamentals(symbol);
  }

  async fetchPriceHistory(symbol: string, months: number = PRICE_HISTORY_MONTHS): Promise<PriceHistory> {
    const history = await this.resolveHistory(symbol, months);
    historySourceTotal.inc({ source: history.source });
    return history;
  }

  private async resolveHistory(symbol: string, months: number): Promise<PriceHistory> {
    if (!(await this.http.isNetworkAlive())) {
      return this.synthetic(symbol, months);
    }

    const primaryBars = await this.primary.fetchHistory(symbol);
    if (primaryBars.length >= PRIMARY_MIN_BARS) {
      return { source: 'google', bars: primaryBars };
    }
    console.log(
      `[market-data] ${symbol}: primary chart gave ${primaryBars.length} bars (< ${PRIMARY_MIN_BARS}); trying secondary`,
    );

    const secondaryBars = await this.secondary.fetchHistory(symbol, months);
    if (secondaryBars.length > 0) {
      return { source: 'yahoo', bars: secondaryBars };
    }

    console.warn(`[market-data] ${symbol}: every live history source failed; using synthetic bars`);
    return this.synthetic(symbol, months);
  }

  private synthetic(symbol: string, months: number): PriceHistory {
    const source: HistorySource = 'synthetic';
    return { source, bars: syntheticPriceHistory(symbol, months, this.now()) };
  }
}
