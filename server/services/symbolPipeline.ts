import { PRICE_HISTORY_MONTHS, SCAN_LOOKBACK_SESSIONS } from '../config.js';
import { describeError } from '../lib/errors.js';
import { computeIndicatorSeries } from './indicators.js';
import type { MarketDataProvider } from './marketDataService.js';
import type { AnalyzedSymbol, PriceBar, SymbolOutcome } from './scanTypes.js';
import { detectSignals, scoreSignals } from './signalDetector.js';

export const MIN_BARS_FOR_ANALYSIS = 30;

export interface SymbolPipelineOptions {
  months?: number;
  lookback?: number;
}

export function insufficientDataMessage(barCount: number): string {
  return `Insufficient price data (${barCount} bars, need ≥${MIN_BARS_FOR_ANALYSIS})`;
}

export function analyzeBars(bars: readonly PriceBar[], lookback: number = SCAN_LOOKBACK_SESSIONS): AnalyzedSymbol {
  const closes = bars.map((bar) => bar.close);
  const series = computeIndicatorSeries(closes);
  const signals = detectSignals(closes, series, lookback);
  return { bars: [...bars], series, signals, score: scoreSignals(signals) };
}

/**
 * Fetch → indicators → signals → score for one symbol. Never rejects:
 * failures come back as an `error` outcome so one symbol cannot sink a scan.
 */
export async function processSymbol(
  symbol: string,
  marketData: MarketDataProvider,
  options: SymbolPipelineOptions = {},
): Promise<SymbolOutcome> {
  const months = options.months ?? PRICE_HISTORY_MONTHS;
  const lookback = options.lookback ?? SCAN_LOOKBACK_SESSIONS;

  const [fundamentalsResult, historyResult] = await Promise.allSettled([
    marketData.fetchFundamentals(symbol),
    marketData.fetchPriceHistory(symbol, months),
  ]);
  const fundamentals = fundamentalsResult.status === 'fulfilled' ? fundamentalsResult.value : null;

  if (fundamentalsResult.status === 'rejected') {
    return { kind: 'error', symbol, fundamentals: null, message: describeError(fundamentalsResult.reason) };
  }
  if (historyResult.status === 'rejected') {
    return { kind: 'error', symbol, fundamentals, message: describeError(historyResult.reason) };
  }

  const { source, bars } = historyResult.value;
  if (bars.length < MIN_BARS_FOR_ANALYSIS) {
    const reason = insufficientDataMessage(bars.length);
    console.warn(`[pipeline] ${symbol}: ${reason}`);
    return { kind: 'ignored', symbol, fundamentals, historySource: source, bars, reason };
  }

  try {
    const analysis = analyzeBars(bars, lookback);
    return { kind: 'ok', symbol, fundamentals: fundamentalsResult.value, historySource: source, analysis };
  } catch (err: unknown) {
    return { kind: 'error', symbol, fundamentals, message: describeError(err) };
  }
}
