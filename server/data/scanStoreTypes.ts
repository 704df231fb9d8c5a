/**
 * Persistence contract for scans. `KyselyScanStore` backs it with Postgres;
 * tests use an in-memory implementation of the same interface.
 */

export type ScanStatus = 'running' | 'completed' | 'failed';
export type ScanLogStatus = 'skipped' | 'ignored' | 'error';

export interface SymbolRow {
  id: number;
  symbol: string;
}

export interface ScanRow {
  id: number;
  startedAt: Date;
  finishedAt: Date | null;
  status: ScanStatus;
  errorMessage: string | null;
}

export interface FundamentalsValues {
  name: string | null;
  cmp: number | null;
  pe: number | null;
  roce: number | null;
  bv: number | null;
  debt: number | null;
  industry: string | null;
}

export interface TechnicalsValues {
  rsi14: number | null;
  macd: number | null;
  macdSignal: number | null;
  sma20: number | null;
  close: number | null;
  signalsJson: string;
  priceSeriesJson: string;
  rsiSeriesJson: string;
  macdSeriesJson: string;
  historySource: string | null;
}

export interface RecommendationValues {
  recommended: boolean;
  score: number;
  reason: string;
}

export interface ScanLogValues {
  status: ScanLogStatus;
  message: string;
}

export interface FundamentalsRow extends FundamentalsValues {
  scanId: number;
  symbolId: number;
  fetchedAt: Date;
}

export interface TechnicalsRow extends TechnicalsValues {
  scanId: number;
  symbolId: number;
  computedAt: Date;
}

export interface RecommendationRow extends RecommendationValues {
  scanId: number;
  symbolId: number;
  createdAt: Date;
}

/** The most recent stored data for one symbol, across all scans. */
export interface LatestSymbolSnapshot {
  fundamentals: FundamentalsRow | null;
  technicals: TechnicalsRow | null;
  /** Recommendation from the scan the technicals (or, failing that, fundamentals) belong to. */
  recommendation: RecommendationRow | null;
}

/** Everything written for one symbol in one scan. */
export interface SymbolResultWrite {
  symbolId: number;
  fundamentals: FundamentalsValues | null;
  technicals: TechnicalsValues | null;
  recommendation: RecommendationValues | null;
  log: ScanLogValues | null;
}

export interface ScanFinalization {
  status: Exclude<ScanStatus, 'running'>;
  finishedAt: Date;
  errorMessage: string | null;
}

export interface ScanResultView {
  symbol: string;
  recommendation: RecommendationRow;
  fundamentals: FundamentalsRow | null;
  technicals: TechnicalsRow | null;
}

export interface SymbolScanRows {
  fundamentals: FundamentalsRow | null;
  technicals: TechnicalsRow | null;
  recommendation: RecommendationRow | null;
}

export interface ScanLogView {
  status: ScanLogStatus;
  symbol: string | null;
  message: string;
  createdAt: Date;
}

export interface ScanCounts {
  total: number;
  recommended: number;
}

export interface DeletedSymbolCounts {
  fundamentals: number;
  technicals: number;
  recommendations: number;
  logs: number;
}

export interface ClearAllCounts {
  scan_logs: number;
  recommendations: number;
  technicals: number;
  fundamentals: number;
  scans: number;
  symbols: number;
}

export interface ScanStore {
  listSymbols(): Promise<SymbolRow[]>;
  findSymbol(symbol: string): Promise<SymbolRow | null>;
  insertMissingSymbols(symbols: readonly string[]): Promise<{ added: number; total: number }>;

  createScan(startedAt: Date): Promise<ScanRow>;
  finalizeScan(scanId: number, finalization: ScanFinalization): Promise<void>;
  getScan(scanId: number): Promise<ScanRow | null>;
  getLatestScan(): Promise<ScanRow | null>;
  /** Marks every `running` scan failed; returns how many were updated. */
  failRunningScans(message: string, finishedAt: Date): Promise<number>;

  latestSnapshot(symbolId: number): Promise<LatestSymbolSnapshot>;
  /** Writes all rows for a scan atomically. */
  saveScanResults(scanId: number, results: readonly SymbolResultWrite[], writtenAt: Date): Promise<void>;

  countResults(scanId: number): Promise<ScanCounts>;
  /** Ordered by score, highest first. */
  listScanResults(scanId: number, options: { recommendedOnly: boolean }): Promise<ScanResultView[]>;
  getSymbolScanRows(scanId: number, symbolId: number): Promise<SymbolScanRows>;
  listScanLogs(scanId: number): Promise<ScanLogView[]>;
  deleteSymbolFromScan(scanId: number, symbolId: number): Promise<DeletedSymbolCounts>;
  clearAll(): Promise<ClearAllCounts>;
}
