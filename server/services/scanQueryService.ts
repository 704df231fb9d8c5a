/**
 * Read models behind the scan, recommendation and symbol HTTP routes.
 * Methods return plain JSON payloads; not-found cases come back as a
 * `QueryResult` so routes can pick the status code.
 */

import { z } from 'zod';
import type {
  FundamentalsRow,
  RecommendationRow,
  ScanResultView,
  ScanRow,
  ScanStore,
  TechnicalsRow,
} from '../data/scanStoreTypes.js';
import { parseJsonSafe } from '../lib/apiSchemas.js';
import type { ScanProgress, ScanState } from '../lib/ScanState.js';

export type QueryResult<T> = { ok: true; body: T } | { ok: false; statusCode: 404; error: string };

export type DivergenceLabel = 'Bullish' | 'Bearing';

export interface ScanStatusBody {
  scan_id: number;
  status: string;
  started_at: string | null;
  finished_at: string | null;
  error_message: string | null;
  total_symbols: number;
  recommended_count: number;
  progress: ScanProgress | null;
}

export interface ActiveScanBody {
  active: boolean;
  scan_id: number | null;
  status: 'running' | null;
  progress: ScanProgress | null;
}

export interface ScanLogEntryBody {
  status: string;
  symbol: string | null;
  message: string;
  created_at: string | null;
}

export interface ScanLogsBody {
  scan_id: number | null;
  scan_status: string | null;
  logs: ScanLogEntryBody[];
}

export interface FundamentalsFields {
  stock_name: string | null;
  cmp: number | null;
  pe: number | null;
  roce: number | null;
  bv: number | null;
  debt: number | null;
  industry: string | null;
}

export interface TechnicalsFields {
  rsi14: number | null;
  macd: number | null;
  macd_signal: number | null;
  sma20: number | null;
  close: number | null;
}

export interface RecommendationEntry extends FundamentalsFields {
  symbol: string;
  rsi_divergence: DivergenceLabel;
  macd_divergence: DivergenceLabel;
  score: number;
  reason: string;
  created_at: string | null;
}

export interface ResultEntry extends RecommendationEntry, TechnicalsFields {
  recommended: boolean;
}

interface ScanHeader {
  scan_id: number | null;
  scan_status: string | null;
  started_at?: string | null;
  finished_at?: string | null;
}

export interface LatestRecommendationsBody extends ScanHeader {
  recommendations: RecommendationEntry[];
}

export interface LatestResultsBody extends ScanHeader {
  results: ResultEntry[];
}

export interface SymbolDetailsBody extends FundamentalsFields, TechnicalsFields {
  symbol: string;
  signals: Record<string, unknown>;
  price_series: unknown[];
  rsi_series: unknown[];
  macd_series: unknown[];
  recommended: boolean;
  score: number;
  reason: string;
  created_at: string | null;
}

export interface DeleteSymbolBody {
  scan_id: number;
  symbol: string;
  deleted: { fundamentals: number; technicals: number; recommendations: number; logs: number };
}

const StoredObjectSchema = z.record(z.string(), z.unknown());

function parseStoredObject(text: string | undefined): Record<string, unknown> {
  if (!text) return {};
  const parsed = StoredObjectSchema.safeParse(parseJsonSafe(text));
  return parsed.success ? parsed.data : {};
}

function parseStoredArray(text: string | undefined): unknown[] {
  if (!text) return [];
  const value = parseJsonSafe(text);
  return Array.isArray(value) ? value : [];
}

function isoOrNull(date: Date | null | undefined): string | null {
  return date ? date.toISOString() : null;
}

function divergenceLabel(signals: Record<string, unknown>, key: string): DivergenceLabel {
  return signals[key] === true ? 'Bullish' : 'Bearing';
}

function fundamentalsFields(row: FundamentalsRow | null): FundamentalsFields {
  return {
    stock_name: row?.name ?? null,
    cmp: row?.cmp ?? null,
    pe: row?.pe ?? null,
    roce: row?.roce ?? null,
    bv: row?.bv ?? null,
    debt: row?.debt ?? null,
    industry: row?.industry ?? null,
  };
}

function technicalsFields(row: TechnicalsRow | null): TechnicalsFields {
  return {
    rsi14: row?.rsi14 ?? null,
    macd: row?.macd ?? null,
    macd_signal: row?.macdSignal ?? null,
    sma20: row?.sma20 ?? null,
    close: row?.close ?? null,
  };
}

function recommendationEntry(view: ScanResultView): RecommendationEntry {
  const signals = parseStoredObject(view.technicals?.signalsJson);
  return {
    symbol: view.symbol,
    ...fundamentalsFields(view.fundamentals),
    rsi_divergence: divergenceLabel(signals, 'rsi_divergence'),
    macd_divergence: divergenceLabel(signals, 'macd_divergence'),
    score: view.recommendation.score,
    reason: view.recommendation.reason,
    created_at: isoOrNull(view.recommendation.createdAt),
  };
}

function scanHeader(scan: ScanRow): Required<ScanHeader> {
  return {
    scan_id: scan.id,
    scan_status: scan.status,
    started_at: isoOrNull(scan.startedAt),
    finished_at: isoOrNull(scan.finishedAt),
  };
}

function notFound<T>(error: string): QueryResult<T> {
  return { ok: false, statusCode: 404, error };
}

export class ScanQueryService {
  private readonly store: ScanStore;
  private readonly state: ScanState;

  constructor(store: ScanStore, state: ScanState) {
    this.store = store;
    this.state = state;
  }

  async getScanStatus(scanId: number): Promise<QueryResult<ScanStatusBody>> {
    const scan = await this.store.getScan(scanId);
    if (!scan) return notFound('Scan not found');
    const counts = await this.store.countResults(scanId);
    return {
      ok: true,
      body: {
        scan_id: scan.id,
        status: scan.status,
        started_at: isoOrNull(scan.startedAt),
        finished_at: isoOrNull(scan.finishedAt),
        error_message: scan.errorMessage,
        total_symbols: counts.total,
        recommended_count: counts.recommended,
        progress: this.state.getProgress(scan.id),
      },
    };
  }

  getActiveScan(): ActiveScanBody {
    const scanId = this.state.activeScanId;
    if (!this.state.isRunning || scanId === null) {
      return { active: false, scan_id: null, status: null, progress: null };
    }
    return { active: true, scan_id: scanId, status: 'running', progress: this.state.getProgress(scanId) };
  }

  async getScanLogs(scanId: number): Promise<QueryResult<ScanLogsBody>> {
    const scan = await this.store.getScan(scanId);
    if (!scan) return notFound('Scan not found');
    return { ok: true, body: await this.logsFor(scan) };
  }

  async getLatestScanLogs(): Promise<ScanLogsBody> {
    const scan = await this.store.getLatestScan();
    if (!scan) return { scan_id: null, scan_status: null, logs: [] };
    return this.logsFor(scan);
  }

  async getLatestRecommendations(): Promise<LatestRecommendationsBody> {
    const scan = await this.store.getLatestScan();
    if (!scan) return { scan_id: null, scan_status: null, recommendations: [] };
    const views = await this.store.listScanResults(scan.id, { recommendedOnly: true });
    return { ...scanHeader(scan), recommendations: views.map(recommendationEntry) };
  }

  async getLatestResults(): Promise<LatestResultsBody> {
    const scan = await this.store.getLatestScan();
    if (!scan) return { scan_id: null, scan_status: null, results: [] };
    const views = await this.store.listScanResults(scan.id, { recommendedOnly: false });
    const results = views.map((view): ResultEntry => ({
      ...recommendationEntry(view),
      ...technicalsFields(view.technicals),
      recommended: view.recommendation.recommended,
    }));
    return { ...scanHeader(scan), results };
  }

  /** Details for one symbol in the given scan, or in the latest scan when none is given. */
  async getSymbolDetails(symbol: string, scanId?: number): Promise<QueryResult<SymbolDetailsBody>> {
    const symbolRow = await this.store.findSymbol(symbol.toUpperCase());
    if (!symbolRow) return notFound('Symbol not found');

    let targetScanId = scanId;
    if (targetScanId === undefined) {
      const latest = await this.store.getLatestScan();
      if (!latest) return notFound('No scans available');
      targetScanId = latest.id;
    }

    const rows = await this.store.getSymbolScanRows(targetScanId, symbolRow.id);
    const technicals = rows.technicals;
    const recommendation: RecommendationRow | null = rows.recommendation;
    return {
      ok: true,
      body: {
        symbol: symbolRow.symbol,
        ...fundamentalsFields(rows.fundamentals),
        ...technicalsFields(technicals),
        signals: parseStoredObject(technicals?.signalsJson),
        price_series: parseStoredArray(technicals?.priceSeriesJson),
        rsi_series: parseStoredArray(technicals?.rsiSeriesJson),
        macd_series: parseStoredArray(technicals?.macdSeriesJson),
        recommended: recommendation?.recommended ?? false,
        score: recommendation?.score ?? 0,
        reason: recommendation?.reason ?? '',
        created_at: isoOrNull(recommendation?.createdAt),
      },
    };
  }

  async deleteSymbolFromScan(scanId: number, symbol: string): Promise<QueryResult<DeleteSymbolBody>> {
    const scan = await this.store.getScan(scanId);
    if (!scan) return notFound('Scan not found');
    const symbolRow = await this.store.findSymbol(symbol.toUpperCase());
    if (!symbolRow) return notFound('Symbol not found');
    const deleted = await this.store.deleteSymbolFromScan(scan.id, symbolRow.id);
    console.log(`[query] deleted ${symbolRow.symbol} rows from scan ${scan.id}`);
    return { ok: true, body: { scan_id: scan.id, symbol: symbolRow.symbol, deleted } };
  }

  async deleteSymbolFromLatestScan(symbol: string): Promise<QueryResult<DeleteSymbolBody>> {
    const scan = await this.store.getLatestScan();
    if (!scan) return notFound('No scans available');
    return this.deleteSymbolFromScan(scan.id, symbol);
  }

  private async logsFor(scan: ScanRow): Promise<ScanLogsBody> {
    const logs = await this.store.listScanLogs(scan.id);
    return {
      scan_id: scan.id,
      scan_status: scan.status,
      logs: logs.map((log) => ({
        status: log.status,
        symbol: log.symbol,
        message: log.message,
        created_at: isoOrNull(log.createdAt),
      })),
    };
  }
}
