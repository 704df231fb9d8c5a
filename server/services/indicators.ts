/**
 * Technical indicator calculations over daily closes (oldest first):
 * SMA, EMA, Wilder RSI and MACD.
 *
 * Every series has the same length as its input and is null until the
 * indicator has enough history.
 */

import type { IndicatorSeries, MacdSeries } from './scanTypes.js';

export type Series = Array<number | null>;

export function calculateSMA(closes: readonly number[], period: number): Series {
  const out: Series = new Array(closes.length).fill(null);
  if (period < 1 || closes.length < period) return out;
  let sum = 0;
  for (let i = 0; i < closes.length; i++) {
    sum += closes[i];
    if (i >= period) sum -= closes[i - period];
    if (i >= period - 1) out[i] = sum / period;
  }
  return out;
}

/** EMA seeded at `period - 1` with the SMA of the first `period` values. */
export function calculateEMA(closes: readonly number[], period: number): Series {
  const out: Series = new Array(closes.length).fill(null);
  if (period < 1 || closes.length < period) return out;
  const k = 2 / (period + 1);
  let seed = 0;
  for (let i = 0; i < period; i++) seed += closes[i];
  let prev = seed / period;
  out[period - 1] = prev;
  for (let i = period; i < closes.length; i++) {
    prev = closes[i] * k + prev * (1 - k);
    out[i] = prev;
  }
  return out;
}

/**
 * Wilder RSI. The first value lands at index `period`; a window with no
 * losses reads exactly 100.
 */
export function calculateRSI(closes: readonly number[], period: number = 14): Series {
  const out: Series = new Array(closes.length).fill(null);
  if (period < 1 || closes.length <= period) return out;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const change = closes[i] - closes[i - 1];
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= period;
  avgLoss /= period;
  out[period] = rsiFromAverages(avgGain, avgLoss);

  for (let i = period + 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    out[i] = rsiFromAverages(avgGain, avgLoss);
  }
  return out;
}

function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * MACD line where both EMAs exist; the signal line is an EMA over the
 * defined MACD values only, mapped back onto their original indices.
 */
export function calculateMACD(
  closes: readonly number[],
  fast: number = 12,
  slow: number = 26,
  signalPeriod: number = 9,
): MacdSeries {
  const fastEma = calculateEMA(closes, fast);
  const slowEma = calculateEMA(closes, slow);
  const macd: Series = closes.map((_, i) => {
    const f = fastEma[i];
    const s = slowEma[i];
    return f !== null && s !== null ? f - s : null;
  });

  const definedIndices: number[] = [];
  const definedValues: number[] = [];
  macd.forEach((value, i) => {
    if (value !== null) {
      definedIndices.push(i);
      definedValues.push(value);
    }
  });
  const compactSignal = calculateEMA(definedValues, signalPeriod);
  const signal: Series = new Array(closes.length).fill(null);
  compactSignal.forEach((value, j) => {
    signal[definedIndices[j]] = value;
  });

  const histogram: Series = macd.map((value, i) => {
    const s = signal[i];
    return value !== null && s !== null ? value - s : null;
  });
  return { macd, signal, histogram };
}

export function computeIndicatorSeries(closes: readonly number[]): IndicatorSeries {
  return {
    sma20: calculateSMA(closes, 20),
    rsi14: calculateRSI(closes, 14),
    macd: calculateMACD(closes, 12, 26, 9),
  };
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Last defined value of `series`, rounded, or null when nothing is defined. */
export function latestDefined(series: readonly (number | null)[], digits: number): number | null {
  for (let i = series.length - 1; i >= 0; i--) {
    const value = series[i];
    if (value !== null && Number.isFinite(value)) return roundTo(value, digits);
  }
  return null;
}
