/**
 * Shared types for the oversold-reversal scan pipeline.
 */

/** One daily close. `date` is `YYYY-MM-DD`. */
export interface PriceBar {
  date: string;
  close: number;
}

export type HistorySource = 'google' | 'yahoo' | 'synthetic';

export interface PriceHistory {
  source: HistorySource;
  /** Ascending by date, no duplicate dates. */
  bars: PriceBar[];
}

/** Absent fields are null, never zero. */
export interface FundamentalSnapshot {
  symbol: string;
  name: string | null;
  cmp: number | null;
  pe: number | null;
  roce: number | null;
  bv: number | null;
  debt: number | null;
  industry: string | null;
}

export interface MacdSeries {
  macd: Array<number | null>;
  signal: Array<number | null>;
  histogram: Array<number | null>;
}

export interface IndicatorSeries {
  sma20: Array<number | null>;
  rsi14: Array<number | null>;
  macd: MacdSeries;
}

export interface SignalSet {
  rsiOversold: boolean;
  macdCrossover: boolean;
  sma20Cross: boolean;
  rsiRising3d: boolean;
  rsiDivergence: boolean;
  macdDivergence: boolean;
  latestRsi: number | null;
  latestMacd: number | null;
  latestSignal: number | null;
  latestSma20: number | null;
  latestClose: number | null;
}

export interface ScoreResult {
  score: number;
  recommended: boolean;
  reason: string;
}

export interface AnalyzedSymbol {
  bars: PriceBar[];
  series: IndicatorSeries;
  signals: SignalSet;
  score: ScoreResult;
}

/** Result of running one symbol through fetch → indicators → scoring. */
export type SymbolOutcome =
  | {
      kind: 'ok';
      symbol: string;
      fundamentals: FundamentalSnapshot;
      historySource: HistorySource;
      analysis: AnalyzedSymbol;
    }
  | {
      kind: 'ignored';
      symbol: string;
      fundamentals: FundamentalSnapshot | null;
      historySource: HistorySource | null;
      bars: PriceBar[];
      reason: string;
    }
  | {
      kind: 'error';
      symbol: string;
      fundamentals: FundamentalSnapshot | null;
      message: string;
    };

