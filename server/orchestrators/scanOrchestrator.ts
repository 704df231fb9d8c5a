import {
  PRICE_HISTORY_MONTHS,
  SCAN_CONCURRENCY,
  SCAN_ERROR_MESSAGE_MAX_LENGTH,
  SCAN_ERROR_SUMMARY_LIMIT,
  SCAN_LOOKBACK_SESSIONS,
} from '../config.js';
import type { ScanStore, SymbolResultWrite, SymbolRow } from '../data/scanStoreTypes.js';
import { isSameUtcDay } from '../lib/dateUtils.js';
import { describeError } from '../lib/errors.js';
import { isSettledError, mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import { ScanState, type ScanProgress } from '../lib/ScanState.js';
import { logStructured } from '../logger.js';
import { activeScanGauge, scanDurationSeconds, scanSymbolOutcomesTotal } from '../metrics.js';
import type { MarketDataProvider } from '../services/marketDataService.js';
import { outcomeToWrite, replayToWrite } from '../services/scanSnapshot.js';
import type { SymbolOutcome } from '../services/scanTypes.js';
import { processSymbol, type SymbolPipelineOptions } from '../services/symbolPipeline.js';

export const ORPHANED_SCAN_MESSAGE = 'Interrupted by server restart';

export interface ScanSummary {
  status: 'completed';
  scanId: number;
  total: number;
  processed: number;
  skipped: number;
  ignored: number;
  errors: number;
  recommended: number;
  errorMessage: string | null;
}

export type ScanCompletion = { ok: true; summary: ScanSummary } | { ok: false; error: unknown };

export type StartScanResult =
  | { status: 'running' }
  | { status: 'started'; scanId: number; completion: Promise<ScanCompletion> };

export type SymbolProcessor = (
  symbol: string,
  marketData: MarketDataProvider,
  options: SymbolPipelineOptions,
) => Promise<SymbolOutcome>;

export interface ScanOrchestratorDeps {
  store: ScanStore;
  marketData: MarketDataProvider;
  state?: ScanState;
  now?: () => Date;
  concurrency?: number;
  lookback?: number;
  months?: number;
  processor?: SymbolProcessor;
}

/**
 * Joins the first few per-symbol errors into the scan's error_message.
 * Returns null when nothing failed.
 */
export function summarizeScanErrors(
  errors: readonly string[],
  limit: number = SCAN_ERROR_SUMMARY_LIMIT,
  maxLength: number = SCAN_ERROR_MESSAGE_MAX_LENGTH,
): string | null {
  if (errors.length === 0) return null;
  const joined = errors.slice(0, Math.max(1, limit)).join('; ');
  return joined.length > maxLength ? joined.slice(0, maxLength) : joined;
}

/**
 * Runs one scan over the whole universe: symbols already pulled today are
 * replayed from storage, the rest go through the pipeline with bounded
 * concurrency, and every row lands in a single write at the end.
 */
export class ScanOrchestrator {
  readonly state: ScanState;

  private readonly store: ScanStore;
  private readonly marketData: MarketDataProvider;
  private readonly now: () => Date;
  private readonly concurrency: number;
  private readonly pipelineOptions: SymbolPipelineOptions;
  private readonly processor: SymbolProcessor;

  constructor(deps: ScanOrchestratorDeps) {
    this.store = deps.store;
    this.marketData = deps.marketData;
    this.state = deps.state ?? new ScanState('scan');
    this.now = deps.now ?? (() => new Date());
    this.concurrency = Math.max(1, Math.floor(deps.concurrency ?? SCAN_CONCURRENCY));
    this.pipelineOptions = {
      months: deps.months ?? PRICE_HISTORY_MONTHS,
      lookback: deps.lookback ?? SCAN_LOOKBACK_SESSIONS,
    };
    this.processor = deps.processor ?? processSymbol;
  }

  /**
   * Claims the run slot and creates the scan row. The slot is claimed before
   * the first await, so a concurrent call sees `running` and writes nothing.
   */
  async startScan(): Promise<StartScanResult> {
    if (!this.state.tryBegin(this.now())) {
      return { status: 'running' };
    }

    let scanId: number;
    try {
      const scan = await this.store.createScan(this.now());
      scanId = scan.id;
    } catch (err: unknown) {
      this.state.release();
      throw err;
    }

    this.state.attachScan(scanId);
    activeScanGauge.set(1);
    console.log(`[scan] scan ${scanId} started`);

    const completion: Promise<ScanCompletion> = this.execute(scanId).then(
      (summary) => ({ ok: true, summary }),
      (error: unknown) => ({ ok: false, error }),
    );
    return { status: 'started', scanId, completion };
  }

  /** Starts a scan and waits for it. Rejects if the scan itself crashed. */
  async runScan(): Promise<{ status: 'running' } | ScanSummary> {
    const started = await this.startScan();
    if (started.status === 'running') return started;
    const result = await started.completion;
    if (!result.ok) throw result.error;
    return result.summary;
  }

  getProgress(scanId: number): ScanProgress | null {
    return this.state.getProgress(scanId);
  }

  /** Fails scans left `running` by a previous process. */
  async reconcileOrphanedScans(): Promise<number> {
    const count = await this.store.failRunningScans(ORPHANED_SCAN_MESSAGE, this.now());
    if (count > 0) {
      console.warn(`[scan] marked ${count} orphaned scan(s) failed`);
    }
    return count;
  }

  private async execute(scanId: number): Promise<ScanSummary> {
    const startedMs = Date.now();
    try {
      const summary = await this.runPhases(scanId);
      scanDurationSeconds.observe({ status: 'completed' }, (Date.now() - startedMs) / 1000);
      logStructured('info', 'scan.completed', {
        scanId,
        total: summary.total,
        processed: summary.processed,
        skipped: summary.skipped,
        ignored: summary.ignored,
        errors: summary.errors,
        recommended: summary.recommended,
        durationMs: Date.now() - startedMs,
      });
      return summary;
    } catch (err: unknown) {
      const message = describeError(err);
      scanDurationSeconds.observe({ status: 'failed' }, (Date.now() - startedMs) / 1000);
      console.error(`[scan] scan ${scanId} failed: ${message}`);
      try {
        await this.store.finalizeScan(scanId, {
          status: 'failed',
          finishedAt: this.now(),
          errorMessage: message.slice(0, SCAN_ERROR_MESSAGE_MAX_LENGTH),
        });
      } catch (finalizeErr: unknown) {
        console.error(`[scan] could not mark scan ${scanId} failed: ${describeError(finalizeErr)}`);
      }
      throw err;
    } finally {
      this.state.finishProgress(scanId);
      this.state.release();
      activeScanGauge.set(0);
    }
  }

  private async runPhases(scanId: number): Promise<ScanSummary> {
    const symbols = await this.store.listSymbols();
    const scanDate = this.now();

    const snapshots = await mapWithConcurrency(symbols, this.concurrency, (row) => this.store.latestSnapshot(row.id));
    const replays: SymbolResultWrite[] = [];
    const work: SymbolRow[] = [];
    symbols.forEach((row, i) => {
      const snapshot = snapshots[i];
      if (isSettledError(snapshot)) {
        throw new Error(`latest snapshot lookup failed for ${row.symbol}: ${describeError(snapshot.error)}`);
      }
      const pulledToday =
        (snapshot.technicals !== null && isSameUtcDay(snapshot.technicals.computedAt, scanDate)) ||
        (snapshot.fundamentals !== null && isSameUtcDay(snapshot.fundamentals.fetchedAt, scanDate));
      if (pulledToday) {
        replays.push(replayToWrite(row.id, snapshot));
      } else {
        work.push(row);
      }
    });

    this.state.initProgress(scanId, { total: symbols.length, toProcess: work.length, skipped: replays.length });
    console.log(`[scan] scan ${scanId}: ${symbols.length} symbols, ${work.length} to fetch, ${replays.length} already pulled today`);

    const settled = await mapWithConcurrency(
      work,
      this.concurrency,
      async (row) => {
        this.state.markSymbolStarted(scanId, row.symbol);
        return this.processor(row.symbol, this.marketData, this.pipelineOptions);
      },
      (result) => {
        const failed = isSettledError(result) || result.kind === 'error';
        this.state.markSymbolSettled(scanId, failed);
        scanSymbolOutcomesTotal.inc({ outcome: isSettledError(result) ? 'error' : result.kind });
      },
    );

    const writes: SymbolResultWrite[] = [...replays];
    const errors: string[] = [];
    let ignored = 0;
    let recommended = 0;
    for (const row of replays) {
      if (row.recommendation?.recommended) recommended += 1;
    }
    for (let i = 0; i < work.length; i++) {
      const row = work[i];
      const result = settled[i];
      const outcome: SymbolOutcome = isSettledError(result)
        ? { kind: 'error', symbol: row.symbol, fundamentals: null, message: describeError(result.error) }
        : result;
      if (outcome.kind === 'error') errors.push(`${row.symbol}: ${outcome.message}`);
      if (outcome.kind === 'ignored') ignored += 1;
      if (outcome.kind === 'ok' && outcome.analysis.score.recommended) recommended += 1;
      writes.push(outcomeToWrite(row.id, outcome));
    }
    scanSymbolOutcomesTotal.inc({ outcome: 'skipped' }, replays.length);

    await this.store.saveScanResults(scanId, writes, this.now());

    const errorMessage = summarizeScanErrors(errors);
    await this.store.finalizeScan(scanId, { status: 'completed', finishedAt: this.now(), errorMessage });
    if (errors.length > 0) {
      console.warn(`[scan] scan ${scanId} finished with ${errors.length} symbol error(s)`);
    }

    return {
      status: 'completed',
      scanId,
      total: symbols.length,
      processed: work.length,
      skipped: replays.length,
      ignored,
      errors: errors.length,
      recommended,
      errorMessage,
    };
  }
}
