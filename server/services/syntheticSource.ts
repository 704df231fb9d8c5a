/**
 * Deterministic offline market data.
 *
 * Output is a pure function of (symbol, months, as-of date): the RNG is
 * seeded from a hash of the symbol, so two scans on the same day see the
 * same bars.
 */

import { createHash } from 'node:crypto';
import { DEFAULT_SYNTHETIC_PROFILE, SYNTHETIC_PROFILES } from '../data/syntheticProfiles.js';
import type { RecoveryShape, SyntheticProfile } from '../data/syntheticProfiles.js';
import { businessDayKeysEnding } from '../lib/dateUtils.js';
import { roundTo } from './indicators.js';
import type { FundamentalSnapshot, PriceBar } from './scanTypes.js';

const TRADING_DAYS_PER_MONTH = 22;
const MIN_SYNTHETIC_BARS = 60;
const BASE_PRICE_DISCOUNT = 0.92;

export type Rng = () => number;

/** mulberry32 over a 32-bit seed; uniform in [0, 1). */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seedFromSymbol(symbol: string, salt: string): number {
  return createHash('sha256').update(`${symbol.toUpperCase()}:${salt}`).digest().readUInt32BE(0);
}

/** Standard normal sample via Box-Muller. */
function gaussian(rng: Rng, mean: number = 0, stdDev: number = 1): number {
  let u = 0;
  while (u === 0) u = rng();
  const v = rng();
  return mean + stdDev * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

function profileFor(symbol: string): SyntheticProfile {
  return SYNTHETIC_PROFILES[symbol.toUpperCase()] ?? DEFAULT_SYNTHETIC_PROFILE;
}

export function syntheticFundamentals(symbol: string): FundamentalSnapshot {
  const profile = profileFor(symbol);
  return {
    symbol,
    name: profile.name ?? `${symbol} (mock)`,
    cmp: profile.cmp,
    pe: profile.pe,
    roce: profile.roce,
    bv: profile.bv,
    debt: profile.debt,
    industry: profile.industry,
  };
}

function randomWalk(rng: Rng, start: number, count: number, dailyVol: number, drift: number): number[] {
  const prices = [start];
  for (let i = 1; i < count; i++) {
    const ret = drift + dailyVol * gaussian(rng);
    prices.push(roundTo(prices[i - 1] * (1 + ret), 2));
  }
  return prices;
}

/** Mild uptrend, a sharp decline into oversold territory, then an accelerating bounce. */
function recoveryPath(rng: Rng, start: number, count: number, shape: RecoveryShape): number[] {
  const dipIndex = Math.floor(count * shape.dipStartFraction);
  let recoveryDays = shape.recoveryDays;
  let dipDays = count - dipIndex - recoveryDays;
  if (dipDays < 5) {
    dipDays = 5;
    recoveryDays = count - dipIndex - dipDays;
  }

  const prices = randomWalk(rng, start, Math.max(1, dipIndex), 0.008, 0.0003);
  const peak = prices[prices.length - 1];

  const dailyDrop = (peak * shape.dipDepth) / dipDays;
  for (let i = 0; i < dipDays; i++) {
    const noise = gaussian(rng, 0, dailyDrop * 0.15);
    prices.push(roundTo(prices[prices.length - 1] - dailyDrop + noise, 2));
  }

  const bottom = prices[prices.length - 1];
  const dailyBounce = recoveryDays > 0 ? ((peak - bottom) * 0.35) / recoveryDays : 0;
  for (let i = 0; i < recoveryDays; i++) {
    const factor = 1 + (i / recoveryDays) * 0.5;
    const noise = gaussian(rng, 0, dailyBounce * 0.2);
    prices.push(roundTo(prices[prices.length - 1] + dailyBounce * factor + noise, 2));
  }

  while (prices.length < count) {
    prices.push(roundTo(prices[prices.length - 1] * (1 + gaussian(rng, 0, 0.005)), 2));
  }
  return prices.slice(0, count);
}

export function syntheticPriceHistory(symbol: string, months: number, asOf: Date): PriceBar[] {
  const count = Math.max(MIN_SYNTHETIC_BARS, Math.floor(months) * TRADING_DAYS_PER_MONTH);
  const dates = businessDayKeysEnding(count, asOf);
  const rng = createRng(seedFromSymbol(symbol, 'prices'));
  const profile = profileFor(symbol);
  const start = profile.cmp * BASE_PRICE_DISCOUNT;

  const closes = profile.recovery
    ? recoveryPath(rng, start, count, profile.recovery)
    : randomWalk(rng, start, count, 0.012, 0.0002);

  return dates.map((date, i) => ({ date, close: closes[i] }));
}
