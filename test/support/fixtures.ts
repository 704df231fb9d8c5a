import { businessDayKeysEnding } from '../../server/lib/dateUtils.js';
import type { MarketDataProvider } from '../../server/services/marketDataService.js';
import type { FundamentalSnapshot, PriceBar, PriceHistory } from '../../server/services/scanTypes.js';

/**
 * A long flat base, a steady 18% slide over 34 sessions, then six sessions
 * bouncing 1.2% a day. RSI pins at zero on the slide and climbs through 30
 * during the bounce.
 */
export function reversalCloses(): number[] {
  const closes: number[] = new Array<number>(140).fill(100);
  for (let k = 1; k <= 34; k++) closes.push(100 * (1 - (0.18 * k) / 34));
  for (let k = 0; k < 6; k++) closes.push(closes[closes.length - 1] * 1.012);
  return closes;
}

/** Steadily rising closes: RSI stays at 100, nothing fires. */
export function risingCloses(count: number): number[] {
  return Array.from({ length: count }, (_, i) => 100 + i);
}

export function barsFromCloses(closes: readonly number[], end: Date = new Date('2026-10-16T00:00:00Z')): PriceBar[] {
  const dates = businessDayKeysEnding(closes.length, end);
  return closes.map((close, i) => ({ date: dates[i], close }));
}

export function fundamentalsFor(symbol: string, overrides: Partial<FundamentalSnapshot> = {}): FundamentalSnapshot {
  return {
    symbol,
    name: `${symbol} Ltd`,
    cmp: 100,
    pe: 20,
    roce: 15,
    bv: 50,
    debt: 10,
    industry: 'Software',
    ...overrides,
  };
}

export interface FakeMarketDataOptions {
  /** Bars per symbol; symbols not listed get rising closes. */
  bars?: Record<string, PriceBar[]>;
  /** Symbols whose fundamentals fetch rejects. */
  failFundamentals?: readonly string[];
  /** Symbols whose price history fetch rejects. */
  failHistory?: readonly string[];
  delayMs?: number;
}

/** In-process market data with call tracking. */
export class FakeMarketData implements MarketDataProvider {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly options: FakeMarketDataOptions = {}) {}

  async fetchFundamentals(symbol: string): Promise<FundamentalSnapshot> {
    this.calls.push(`fundamentals:${symbol}`);
    await this.pause();
    if (this.options.failFundamentals?.includes(symbol)) {
      throw new Error(`fundamentals unavailable for ${symbol}`);
    }
    return fundamentalsFor(symbol);
  }

  async fetchPriceHistory(symbol: string): Promise<PriceHistory> {
    this.calls.push(`history:${symbol}`);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await this.pause();
      if (this.options.failHistory?.includes(symbol)) {
        throw new Error(`history unavailable for ${symbol}`);
      }
      const bars = this.options.bars?.[symbol] ?? barsFromCloses(risingCloses(120));
      return { source: 'google', bars };
    } finally {
      this.inFlight -= 1;
    }
  }

  private async pause(): Promise<void> {
    const ms = this.options.delayMs ?? 0;
    if (ms > 0) await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
