/**
 * Turns pipeline outcomes (and replayed snapshots) into the rows a scan
 * persists, including the chart series the details view reads back.
 */

import type {
  FundamentalsValues,
  LatestSymbolSnapshot,
  RecommendationValues,
  SymbolResultWrite,
  TechnicalsValues,
} from '../data/scanStoreTypes.js';
import { roundTo } from './indicators.js';
import type { FundamentalSnapshot, IndicatorSeries, PriceBar, SymbolOutcome } from './scanTypes.js';
import { emptySignals, toStoredSignals } from './signalDetector.js';

export const SKIPPED_MESSAGE = 'Already pulled today';

export interface RsiPoint {
  date: string;
  rsi: number;
}

export interface MacdPoint {
  date: string;
  macd?: number;
  signal?: number;
  histogram?: number;
}

const NOT_RECOMMENDED: RecommendationValues = { recommended: false, score: 0, reason: '' };

export function buildRsiChart(bars: readonly PriceBar[], rsi: readonly (number | null)[]): RsiPoint[] {
  const points: RsiPoint[] = [];
  bars.forEach((bar, i) => {
    const value = rsi[i];
    if (value !== null && value !== undefined) points.push({ date: bar.date, rsi: roundTo(value, 2) });
  });
  return points;
}

export function buildMacdChart(bars: readonly PriceBar[], series: IndicatorSeries['macd']): MacdPoint[] {
  const points: MacdPoint[] = [];
  bars.forEach((bar, i) => {
    const point: MacdPoint = { date: bar.date };
    const macd = series.macd[i];
    const signal = series.signal[i];
    const histogram = series.histogram[i];
    if (macd !== null && macd !== undefined) point.macd = roundTo(macd, 4);
    if (signal !== null && signal !== undefined) point.signal = roundTo(signal, 4);
    if (histogram !== null && histogram !== undefined) point.histogram = roundTo(histogram, 4);
    if (Object.keys(point).length > 1) points.push(point);
  });
  return points;
}

function fundamentalsValues(snapshot: FundamentalSnapshot | null): FundamentalsValues | null {
  if (!snapshot) return null;
  const { name, cmp, pe, roce, bv, debt, industry } = snapshot;
  return { name, cmp, pe, roce, bv, debt, industry };
}

/** Technicals row with every indicator absent, for symbols that never reached the indicator step. */
function blankTechnicals(bars: readonly PriceBar[], historySource: string | null): TechnicalsValues {
  return {
    rsi14: null,
    macd: null,
    macdSignal: null,
    sma20: null,
    close: null,
    signalsJson: JSON.stringify(toStoredSignals(emptySignals())),
    priceSeriesJson: JSON.stringify(bars.map(({ date, close }) => ({ date, close }))),
    rsiSeriesJson: '[]',
    macdSeriesJson: '[]',
    historySource,
  };
}

export function outcomeToWrite(symbolId: number, outcome: SymbolOutcome): SymbolResultWrite {
  switch (outcome.kind) {
    case 'ok': {
      const { bars, series, signals, score } = outcome.analysis;
      return {
        symbolId,
        fundamentals: fundamentalsValues(outcome.fundamentals),
        technicals: {
          rsi14: signals.latestRsi,
          macd: signals.latestMacd,
          macdSignal: signals.latestSignal,
          sma20: signals.latestSma20,
          close: signals.latestClose,
          signalsJson: JSON.stringify(toStoredSignals(signals)),
          priceSeriesJson: JSON.stringify(bars.map(({ date, close }) => ({ date, close }))),
          rsiSeriesJson: JSON.stringify(buildRsiChart(bars, series.rsi14)),
          macdSeriesJson: JSON.stringify(buildMacdChart(bars, series.macd)),
          historySource: outcome.historySource,
        },
        recommendation: score.recommended ? { ...score } : NOT_RECOMMENDED,
        log: null,
      };
    }
    case 'ignored':
      return {
        symbolId,
        fundamentals: fundamentalsValues(outcome.fundamentals),
        technicals: blankTechnicals(outcome.bars, outcome.historySource),
        recommendation: NOT_RECOMMENDED,
        log: { status: 'ignored', message: outcome.reason },
      };
    case 'error':
      return {
        symbolId,
        fundamentals: fundamentalsValues(outcome.fundamentals),
        technicals: blankTechnicals([], null),
        recommendation: NOT_RECOMMENDED,
        log: { status: 'error', message: outcome.message },
      };
  }
}

/** Copies a symbol's stored rows verbatim into a new scan. */
export function replayToWrite(symbolId: number, snapshot: LatestSymbolSnapshot): SymbolResultWrite {
  const { fundamentals, technicals, recommendation } = snapshot;
  return {
    symbolId,
    fundamentals: fundamentals
      ? {
          name: fundamentals.name,
          cmp: fundamentals.cmp,
          pe: fundamentals.pe,
          roce: fundamentals.roce,
          bv: fundamentals.bv,
          debt: fundamentals.debt,
          industry: fundamentals.industry,
        }
      : null,
    technicals: technicals
      ? {
          rsi14: technicals.rsi14,
          macd: technicals.macd,
          macdSignal: technicals.macdSignal,
          sma20: technicals.sma20,
          close: technicals.close,
          signalsJson: technicals.signalsJson,
          priceSeriesJson: technicals.priceSeriesJson,
          rsiSeriesJson: technicals.rsiSeriesJson,
          macdSeriesJson: technicals.macdSeriesJson,
          historySource: technicals.historySource,
        }
      : null,
    recommendation: recommendation
      ? { recommended: recommendation.recommended, score: recommendation.score, reason: recommendation.reason }
      : NOT_RECOMMENDED,
    log: { status: 'skipped', message: SKIPPED_MESSAGE },
  };
}
