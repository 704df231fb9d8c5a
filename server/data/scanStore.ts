/**
 * Postgres-backed scan persistence.
 * Tables: symbols, scans, fundamentals, technicals, recommendations, scan_logs
 */

import type { Kysely, Selectable } from 'kysely';
import type { Database, Fundamentals, Recommendations, Scans, Technicals } from '../db/types.js';
import type {
  ClearAllCounts,
  DeletedSymbolCounts,
  FundamentalsRow,
  LatestSymbolSnapshot,
  RecommendationRow,
  ScanCounts,
  ScanFinalization,
  ScanLogStatus,
  ScanLogView,
  ScanResultView,
  ScanRow,
  ScanStatus,
  ScanStore,
  SymbolResultWrite,
  SymbolRow,
  SymbolScanRows,
  TechnicalsRow,
} from './scanStoreTypes.js';

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

const SCAN_STATUSES: readonly ScanStatus[] = ['running', 'completed', 'failed'];
const LOG_STATUSES: readonly ScanLogStatus[] = ['skipped', 'ignored', 'error'];

export function toScanStatus(value: string): ScanStatus {
  const match = SCAN_STATUSES.find((status) => status === value);
  if (!match) throw new Error(`Unknown scan status "${value}"`);
  return match;
}

export function toScanLogStatus(value: string): ScanLogStatus {
  const match = LOG_STATUSES.find((status) => status === value);
  if (!match) throw new Error(`Unknown scan log status "${value}"`);
  return match;
}

function mapScan(row: Selectable<Scans>): ScanRow {
  return {
    id: row.id,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    status: toScanStatus(row.status),
    errorMessage: row.error_message,
  };
}

function mapFundamentals(row: Selectable<Fundamentals>): FundamentalsRow {
  return {
    scanId: row.scan_id,
    symbolId: row.symbol_id,
    name: row.name,
    cmp: row.cmp,
    pe: row.pe,
    roce: row.roce,
    bv: row.bv,
    debt: row.debt,
    industry: row.industry,
    fetchedAt: row.fetched_at,
  };
}

function mapTechnicals(row: Selectable<Technicals>): TechnicalsRow {
  return {
    scanId: row.scan_id,
    symbolId: row.symbol_id,
    rsi14: row.rsi14,
    macd: row.macd,
    macdSignal: row.macd_signal,
    sma20: row.sma20,
    close: row.close,
    signalsJson: row.signals_json,
    priceSeriesJson: row.price_series_json,
    rsiSeriesJson: row.rsi_series_json,
    macdSeriesJson: row.macd_series_json,
    historySource: row.history_source,
    computedAt: row.computed_at,
  };
}

function mapRecommendation(row: Selectable<Recommendations>): RecommendationRow {
  return {
    scanId: row.scan_id,
    symbolId: row.symbol_id,
    recommended: row.recommended,
    score: row.score,
    reason: row.reason,
    createdAt: row.created_at,
  };
}

function toCount(value: string | number | bigint | undefined): number {
  return Number(value ?? 0);
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Rows per INSERT. Postgres allows 65535 bind parameters per statement and
 * the widest table (technicals) binds 13 per row.
 */
export const INSERT_CHUNK_ROWS = 1000;

/** Splits rows into batches of at most `size`; empty input yields no batch. */
export function chunkRows<T>(rows: readonly T[], size: number = INSERT_CHUNK_ROWS): T[][] {
  const chunkSize = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += chunkSize) {
    chunks.push(rows.slice(i, i + chunkSize));
  }
  return chunks;
}

export class KyselyScanStore implements ScanStore {
  constructor(private readonly db: Kysely<Database>) {}

  async listSymbols(): Promise<SymbolRow[]> {
    return this.db.selectFrom('symbols').select(['id', 'symbol']).orderBy('id').execute();
  }

  async findSymbol(symbol: string): Promise<SymbolRow | null> {
    const row = await this.db
      .selectFrom('symbols')
      .select(['id', 'symbol'])
      .where('symbol', '=', symbol.toUpperCase())
      .executeTakeFirst();
    return row ?? null;
  }

  async insertMissingSymbols(symbols: readonly string[]): Promise<{ added: number; total: number }> {
    let added = 0;
    if (symbols.length > 0) {
      const inserted = await this.db
        .insertInto('symbols')
        .values(symbols.map((symbol) => ({ symbol })))
        .onConflict((oc) => oc.column('symbol').doNothing())
        .returning('id')
        .execute();
      added = inserted.length;
    }
    const { count } = await this.db
      .selectFrom('symbols')
      .select((eb) => eb.fn.countAll<string>().as('count'))
      .executeTakeFirstOrThrow();
    return { added, total: toCount(count) };
  }

  async createScan(startedAt: Date): Promise<ScanRow> {
    const row = await this.db
      .insertInto('scans')
      .values({ started_at: startedAt, status: 'running', finished_at: null, error_message: null })
      .returningAll()
      .executeTakeFirstOrThrow();
    return mapScan(row);
  }

  async finalizeScan(scanId: number, finalization: ScanFinalization): Promise<void> {
    await this.db
      .updateTable('scans')
      .set({
        status: finalization.status,
        finished_at: finalization.finishedAt,
        error_message: finalization.errorMessage,
      })
      .where('id', '=', scanId)
      .execute();
  }

  async getScan(scanId: number): Promise<ScanRow | null> {
    const row = await this.db.selectFrom('scans').selectAll().where('id', '=', scanId).executeTakeFirst();
    return row ? mapScan(row) : null;
  }

  async getLatestScan(): Promise<ScanRow | null> {
    const row = await this.db.selectFrom('scans').selectAll().orderBy('id', 'desc').limit(1).executeTakeFirst();
    return row ? mapScan(row) : null;
  }

  async failRunningScans(message: string, finishedAt: Date): Promise<number> {
    const result = await this.db
      .updateTable('scans')
      .set({ status: 'failed', finished_at: finishedAt, error_message: message })
      .where('status', '=', 'running')
      .executeTakeFirst();
    return toCount(result.numUpdatedRows);
  }

  async latestSnapshot(symbolId: number): Promise<LatestSymbolSnapshot> {
    const [fundRow, techRow] = await Promise.all([
      this.db
        .selectFrom('fundamentals')
        .selectAll()
        .where('symbol_id', '=', symbolId)
        .orderBy('fetched_at', 'desc')
        .orderBy('id', 'desc')
        .limit(1)
        .executeTakeFirst(),
      this.db
        .selectFrom('technicals')
        .selectAll()
        .where('symbol_id', '=', symbolId)
        .orderBy('computed_at', 'desc')
        .orderBy('id', 'desc')
        .limit(1)
        .executeTakeFirst(),
    ]);
    const fundamentals = fundRow ? mapFundamentals(fundRow) : null;
    const technicals = techRow ? mapTechnicals(techRow) : null;
    const sourceScanId = technicals?.scanId ?? fundamentals?.scanId ?? null;

    let recommendation: RecommendationRow | null = null;
    if (sourceScanId !== null) {
      const recRow = await this.db
        .selectFrom('recommendations')
        .selectAll()
        .where('scan_id', '=', sourceScanId)
        .where('symbol_id', '=', symbolId)
        .executeTakeFirst();
      recommendation = recRow ? mapRecommendation(recRow) : null;
    }
    return { fundamentals, technicals, recommendation };
  }

  async saveScanResults(scanId: number, results: readonly SymbolResultWrite[], writtenAt: Date): Promise<void> {
    const fundamentals = results.flatMap((r) =>
      r.fundamentals ? [{ scan_id: scanId, symbol_id: r.symbolId, ...r.fundamentals, fetched_at: writtenAt }] : [],
    );
    const technicals = results.flatMap((r) =>
      r.technicals
        ? [
            {
              scan_id: scanId,
              symbol_id: r.symbolId,
              rsi14: r.technicals.rsi14,
              macd: r.technicals.macd,
              macd_signal: r.technicals.macdSignal,
              sma20: r.technicals.sma20,
              close: r.technicals.close,
              signals_json: r.technicals.signalsJson,
              price_series_json: r.technicals.priceSeriesJson,
              rsi_series_json: r.technicals.rsiSeriesJson,
              macd_series_json: r.technicals.macdSeriesJson,
              history_source: r.technicals.historySource,
              computed_at: writtenAt,
            },
          ]
        : [],
    );
    const recommendations = results.flatMap((r) =>
      r.recommendation ? [{ scan_id: scanId, symbol_id: r.symbolId, ...r.recommendation, created_at: writtenAt }] : [],
    );
    const logs = results.flatMap((r) =>
      r.log ? [{ scan_id: scanId, symbol_id: r.symbolId, ...r.log, created_at: writtenAt }] : [],
    );

    await this.db.transaction().execute(async (trx) => {
      for (const rows of chunkRows(fundamentals)) await trx.insertInto('fundamentals').values(rows).execute();
      for (const rows of chunkRows(technicals)) await trx.insertInto('technicals').values(rows).execute();
      for (const rows of chunkRows(recommendations)) await trx.insertInto('recommendations').values(rows).execute();
      for (const rows of chunkRows(logs)) await trx.insertInto('scan_logs').values(rows).execute();
    });
  }

  async countResults(scanId: number): Promise<ScanCounts> {
    const row = await this.db
      .selectFrom('recommendations')
      .select((eb) => [
        eb.fn.countAll<string>().as('total'),
        eb.fn.count<string>('id').filterWhere('recommended', '=', true).as('recommended'),
      ])
      .where('scan_id', '=', scanId)
      .executeTakeFirstOrThrow();
    return { total: toCount(row.total), recommended: toCount(row.recommended) };
  }

  async listScanResults(scanId: number, options: { recommendedOnly: boolean }): Promise<ScanResultView[]> {
    let recQuery = this.db
      .selectFrom('recommendations')
      .innerJoin('symbols', 'symbols.id', 'recommendations.symbol_id')
      .selectAll('recommendations')
      .select('symbols.symbol')
      .where('recommendations.scan_id', '=', scanId);
    if (options.recommendedOnly) {
      recQuery = recQuery.where('recommendations.recommended', '=', true);
    }
    const [recRows, fundRows, techRows] = await Promise.all([
      recQuery.orderBy('recommendations.score', 'desc').orderBy('symbols.symbol').execute(),
      this.db.selectFrom('fundamentals').selectAll().where('scan_id', '=', scanId).execute(),
      this.db.selectFrom('technicals').selectAll().where('scan_id', '=', scanId).execute(),
    ]);
    const fundBySymbol = new Map(fundRows.map((row) => [row.symbol_id, mapFundamentals(row)]));
    const techBySymbol = new Map(techRows.map((row) => [row.symbol_id, mapTechnicals(row)]));
    return recRows.map((row) => ({
      symbol: row.symbol,
      recommendation: mapRecommendation(row),
      fundamentals: fundBySymbol.get(row.symbol_id) ?? null,
      technicals: techBySymbol.get(row.symbol_id) ?? null,
    }));
  }

  async getSymbolScanRows(scanId: number, symbolId: number): Promise<SymbolScanRows> {
    const [fundRow, techRow, recRow] = await Promise.all([
      this.db
        .selectFrom('fundamentals')
        .selectAll()
        .where('scan_id', '=', scanId)
        .where('symbol_id', '=', symbolId)
        .executeTakeFirst(),
      this.db
        .selectFrom('technicals')
        .selectAll()
        .where('scan_id', '=', scanId)
        .where('symbol_id', '=', symbolId)
        .executeTakeFirst(),
      this.db
        .selectFrom('recommendations')
        .selectAll()
        .where('scan_id', '=', scanId)
        .where('symbol_id', '=', symbolId)
        .executeTakeFirst(),
    ]);
    return {
      fundamentals: fundRow ? mapFundamentals(fundRow) : null,
      technicals: techRow ? mapTechnicals(techRow) : null,
      recommendation: recRow ? mapRecommendation(recRow) : null,
    };
  }

  async listScanLogs(scanId: number): Promise<ScanLogView[]> {
    const rows = await this.db
      .selectFrom('scan_logs')
      .leftJoin('symbols', 'symbols.id', 'scan_logs.symbol_id')
      .select(['scan_logs.status', 'scan_logs.message', 'scan_logs.created_at', 'symbols.symbol'])
      .where('scan_logs.scan_id', '=', scanId)
      .orderBy('scan_logs.created_at')
      .orderBy('scan_logs.id')
      .execute();
    return rows.map((row) => ({
      status: toScanLogStatus(row.status),
      symbol: row.symbol,
      message: row.message,
      createdAt: row.created_at,
    }));
  }

  async deleteSymbolFromScan(scanId: number, symbolId: number): Promise<DeletedSymbolCounts> {
    return this.db.transaction().execute(async (trx) => {
      const fund = await trx
        .deleteFrom('fundamentals')
        .where('scan_id', '=', scanId)
        .where('symbol_id', '=', symbolId)
        .executeTakeFirst();
      const tech = await trx
        .deleteFrom('technicals')
        .where('scan_id', '=', scanId)
        .where('symbol_id', '=', symbolId)
        .executeTakeFirst();
      const rec = await trx
        .deleteFrom('recommendations')
        .where('scan_id', '=', scanId)
        .where('symbol_id', '=', symbolId)
        .executeTakeFirst();
      const logs = await trx
        .deleteFrom('scan_logs')
        .where('scan_id', '=', scanId)
        .where('symbol_id', '=', symbolId)
        .executeTakeFirst();
      return {
        fundamentals: toCount(fund.numDeletedRows),
        technicals: toCount(tech.numDeletedRows),
        recommendations: toCount(rec.numDeletedRows),
        logs: toCount(logs.numDeletedRows),
      };
    });
  }

  async clearAll(): Promise<ClearAllCounts> {
    return this.db.transaction().execute(async (trx) => {
      const logs = await trx.deleteFrom('scan_logs').executeTakeFirst();
      const recs = await trx.deleteFrom('recommendations').executeTakeFirst();
      const tech = await trx.deleteFrom('technicals').executeTakeFirst();
      const fund = await trx.deleteFrom('fundamentals').executeTakeFirst();
      const scans = await trx.deleteFrom('scans').executeTakeFirst();
      const symbols = await trx.deleteFrom('symbols').executeTakeFirst();
      return {
        scan_logs: toCount(logs.numDeletedRows),
        recommendations: toCount(recs.numDeletedRows),
        technicals: toCount(tech.numDeletedRows),
        fundamentals: toCount(fund.numDeletedRows),
        scans: toCount(scans.numDeletedRows),
        symbols: toCount(symbols.numDeletedRows),
      };
    });
  }
}
