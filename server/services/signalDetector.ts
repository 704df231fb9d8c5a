/**
 * Oversold-reversal signal detection and scoring.
 *
 * Detection looks at a trailing window of `lookback` sessions. A symbol is
 * recommended only when RSI dipped below 30 inside the window AND at least
 * one confirmation fired (MACD crossover, SMA20 reclaim, rising RSI, or a
 * bullish divergence).
 */

import { latestDefined, roundTo } from './indicators.js';
import type { IndicatorSeries, ScoreResult, SignalSet } from './scanTypes.js';

export const OVERSOLD_THRESHOLD = 30;
export const DEFAULT_LOOKBACK = 5;

export const SIGNAL_WEIGHTS = {
  macdCrossover: 3,
  sma20Cross: 2,
  rsiRising3d: 1,
  rsiDivergence: 1,
  macdDivergence: 2,
} as const;

const MAX_OVERSOLD_BONUS = 5;

function definedValues(values: readonly (number | null)[]): number[] {
  const out: number[] = [];
  for (const v of values) {
    if (v !== null && Number.isFinite(v)) out.push(v);
  }
  return out;
}

function windowMin(values: readonly (number | null)[]): number | null {
  const defined = definedValues(values);
  return defined.length > 0 ? Math.min(...defined) : null;
}

/** True if `fast` moves from at-or-below `slow` to strictly above it anywhere in the window. */
function crossedAbove(
  fast: readonly (number | null)[],
  slow: readonly (number | null)[],
  lookback: number,
): boolean {
  const n = fast.length;
  for (let i = Math.max(1, n - lookback); i < n; i++) {
    const prevFast = fast[i - 1];
    const prevSlow = slow[i - 1];
    const curFast = fast[i];
    const curSlow = slow[i];
    if (prevFast === null || prevSlow === null || curFast === null || curSlow === null) continue;
    if (prevFast <= prevSlow && curFast > curSlow) return true;
  }
  return false;
}

/**
 * Bullish divergence: the recent window's lowest close is below the prior
 * window's, while the indicator's recent low is above its prior low.
 */
export function hasBullishDivergence(
  closes: readonly number[],
  indicator: readonly (number | null)[],
  lookback: number,
): boolean {
  const n = closes.length;
  if (n < lookback * 2) return false;
  const recentStart = n - lookback;
  const priorStart = n - lookback * 2;

  const recentPriceLow = Math.min(...closes.slice(recentStart));
  const priorPriceLow = Math.min(...closes.slice(priorStart, recentStart));
  const recentIndicatorLow = windowMin(indicator.slice(recentStart));
  const priorIndicatorLow = windowMin(indicator.slice(priorStart, recentStart));
  if (recentIndicatorLow === null || priorIndicatorLow === null) return false;

  return recentPriceLow < priorPriceLow && recentIndicatorLow > priorIndicatorLow;
}

export function emptySignals(latestClose: number | null = null): SignalSet {
  return {
    rsiOversold: false,
    macdCrossover: false,
    sma20Cross: false,
    rsiRising3d: false,
    rsiDivergence: false,
    macdDivergence: false,
    latestRsi: null,
    latestMacd: null,
    latestSignal: null,
    latestSma20: null,
    latestClose,
  };
}

export function detectSignals(
  closes: readonly number[],
  series: IndicatorSeries,
  lookback: number = DEFAULT_LOOKBACK,
): SignalSet {
  const signals = emptySignals(closes.length > 0 ? roundTo(closes[closes.length - 1], 2) : null);
  signals.latestRsi = latestDefined(series.rsi14, 2);
  signals.latestMacd = latestDefined(series.macd.macd, 4);
  signals.latestSignal = latestDefined(series.macd.signal, 4);
  signals.latestSma20 = latestDefined(series.sma20, 2);

  if (signals.latestRsi === null) return signals;

  const recentRsiLow = windowMin(series.rsi14.slice(-lookback));
  signals.rsiOversold = recentRsiLow !== null && recentRsiLow < OVERSOLD_THRESHOLD;

  signals.macdCrossover = crossedAbove(series.macd.macd, series.macd.signal, lookback);
  signals.sma20Cross = crossedAbove(closes, series.sma20, lookback);

  const rsiTail = definedValues(series.rsi14).slice(-3);
  signals.rsiRising3d = rsiTail.length === 3 && rsiTail[0] < rsiTail[1] && rsiTail[1] < rsiTail[2];

  signals.rsiDivergence = hasBullishDivergence(closes, series.rsi14, lookback);
  signals.macdDivergence = hasBullishDivergence(closes, series.macd.macd, lookback);
  return signals;
}

export function scoreSignals(signals: SignalSet): ScoreResult {
  const notRecommended: ScoreResult = { score: 0, recommended: false, reason: '' };
  if (!signals.rsiOversold) return notRecommended;

  const confirmed =
    signals.macdCrossover || signals.sma20Cross || signals.rsiRising3d || signals.rsiDivergence || signals.macdDivergence;
  if (!confirmed) return notRecommended;

  let score = 0;
  const reasons: string[] = [`RSI(14)=${signals.latestRsi} (oversold)`];
  if (signals.macdCrossover) {
    score += SIGNAL_WEIGHTS.macdCrossover;
    reasons.push('bullish MACD crossover');
  }
  if (signals.sma20Cross) {
    score += SIGNAL_WEIGHTS.sma20Cross;
    reasons.push('close crossed above SMA20');
  }
  if (signals.rsiRising3d) {
    score += SIGNAL_WEIGHTS.rsiRising3d;
    reasons.push('RSI rising 3 consecutive days');
  }
  if (signals.rsiDivergence) {
    score += SIGNAL_WEIGHTS.rsiDivergence;
    reasons.push('bullish RSI divergence');
  }
  if (signals.macdDivergence) {
    score += SIGNAL_WEIGHTS.macdDivergence;
    reasons.push('bullish MACD divergence');
  }

  if (signals.latestRsi !== null) {
    const bonus = Math.min(OVERSOLD_THRESHOLD - signals.latestRsi, MAX_OVERSOLD_BONUS);
    if (bonus > 0) score += bonus;
  }

  return { score: roundTo(score, 2), recommended: true, reason: reasons.join(' + ') };
}

/** Snake-case form stored in technicals.signals_json. */
export interface StoredSignals {
  rsi_oversold: boolean;
  macd_crossover: boolean;
  sma20_cross: boolean;
  rsi_rising_3d: boolean;
  rsi_divergence: boolean;
  macd_divergence: boolean;
  latest_rsi: number | null;
  latest_macd: number | null;
  latest_signal: number | null;
  latest_sma20: number | null;
  latest_close: number | null;
}

export function toStoredSignals(signals: SignalSet): StoredSignals {
  return {
    rsi_oversold: signals.rsiOversold,
    macd_crossover: signals.macdCrossover,
    sma20_cross: signals.sma20Cross,
    rsi_rising_3d: signals.rsiRising3d,
    rsi_divergence: signals.rsiDivergence,
    macd_divergence: signals.macdDivergence,
    latest_rsi: signals.latestRsi,
    latest_macd: signals.latestMacd,
    latest_signal: signals.latestSignal,
    latest_sma20: signals.latestSma20,
    latest_close: signals.latestClose,
  };
}
