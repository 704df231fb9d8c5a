import type { ColumnType } from 'kysely';

/** JSON documents are stored as text and handed back verbatim. */
export type Json = ColumnType<string, string, string>;

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export type Generated<T> =
  T extends ColumnType<infer S, infer I, infer U> ? ColumnType<S, I | undefined, U> : ColumnType<T, T | undefined, T>;

export interface Symbols {
  id: Generated<number>;
  symbol: string;
  created_at: Generated<Timestamp>;
}

export interface Scans {
  id: Generated<number>;
  started_at: Generated<Timestamp>;
  finished_at: Timestamp | null;
  status: string;
  error_message: string | null;
}

export interface Fundamentals {
  id: Generated<number>;
  scan_id: number;
  symbol_id: number;
  name: string | null;
  cmp: number | null;
  pe: number | null;
  roce: number | null;
  bv: number | null;
  debt: number | null;
  industry: string | null;
  fetched_at: Generated<Timestamp>;
}

export interface Technicals {
  id: Generated<number>;
  scan_id: number;
  symbol_id: number;
  rsi14: number | null;
  macd: number | null;
  macd_signal: number | null;
  sma20: number | null;
  close: number | null;
  signals_json: Json;
  price_series_json: Json;
  rsi_series_json: Json;
  macd_series_json: Json;
  history_source: string | null;
  computed_at: Generated<Timestamp>;
}

export interface Recommendations {
  id: Generated<number>;
  scan_id: number;
  symbol_id: number;
  recommended: boolean;
  score: number;
  reason: string;
  created_at: Generated<Timestamp>;
}

export interface ScanLogs {
  id: Generated<number>;
  scan_id: number;
  symbol_id: number | null;
  status: string;
  message: string;
  created_at: Generated<Timestamp>;
}

export interface Database {
  symbols: Symbols;
  scans: Scans;
  fundamentals: Fundamentals;
  technicals: Technicals;
  recommendations: Recommendations;
  scan_logs: ScanLogs;
}
