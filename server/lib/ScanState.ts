/**
 * ScanState — the single-run guard and live progress for scan jobs.
 *
 * One instance is owned by one orchestrator. All mutable fields are private;
 * callers go through tryBegin/release and the progress methods. Every method
 * is synchronous, so two callers can never both observe "not running" and
 * both start.
 */

/** Live counters for one scan, in the shape the HTTP API returns. */
export interface ScanProgress {
  total: number;
  to_process: number;
  skipped: number;
  completed: number;
  current_symbol: string | null;
  errors: number;
}

export interface ScanStateOptions {
  /** How long finished progress stays readable before it is dropped. */
  retentionMs?: number;
}

type Timer = ReturnType<typeof setTimeout>;

export class ScanState {
  readonly name: string;

  private readonly _retentionMs: number;
  private _running: boolean;
  private _activeScanId: number | null;
  private _startedAt: Date | null;
  private readonly _progress: Map<number, ScanProgress>;
  private readonly _cleanupTimers: Map<number, Timer>;

  constructor(name: string, options: ScanStateOptions = {}) {
    this.name = name;
    this._retentionMs = Math.max(0, options.retentionMs ?? 30_000);
    this._running = false;
    this._activeScanId = null;
    this._startedAt = null;
    this._progress = new Map();
    this._cleanupTimers = new Map();
  }

  // ---------------------------------------------------------------------------
  // Run guard
  // ---------------------------------------------------------------------------

  /** True while a scan job owns this state object. */
  get isRunning(): boolean {
    return this._running;
  }

  /** Id of the scan currently running, once its row exists. */
  get activeScanId(): number | null {
    return this._activeScanId;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  /** Claims the run slot. Returns false, changing nothing, when a run is already active. */
  tryBegin(now: Date = new Date()): boolean {
    if (this._running) return false;
    this._running = true;
    this._activeScanId = null;
    this._startedAt = now;
    return true;
  }

  attachScan(scanId: number): void {
    if (!this._running) {
      throw new Error(`${this.name}: attachScan called without an active run`);
    }
    this._activeScanId = scanId;
  }

  release(): void {
    this._running = false;
    this._activeScanId = null;
    this._startedAt = null;
  }

  // ---------------------------------------------------------------------------
  // Progress
  // ---------------------------------------------------------------------------

  initProgress(scanId: number, counts: { total: number; toProcess: number; skipped: number }): void {
    this.cancelCleanup(scanId);
    this._progress.set(scanId, {
      total: counts.total,
      to_process: counts.toProcess,
      skipped: counts.skipped,
      completed: 0,
      current_symbol: null,
      errors: 0,
    });
  }

  markSymbolStarted(scanId: number, symbol: string): void {
    const progress = this._progress.get(scanId);
    if (progress) progress.current_symbol = symbol;
  }

  markSymbolSettled(scanId: number, failed: boolean): void {
    const progress = this._progress.get(scanId);
    if (!progress) return;
    progress.completed += 1;
    if (failed) progress.errors += 1;
  }

  /**
   * Pins final counters and schedules the entry's removal after the
   * retention window. The timer is unref'd so it never holds the process open.
   */
  finishProgress(scanId: number): void {
    const progress = this._progress.get(scanId);
    if (progress) {
      progress.current_symbol = null;
      progress.completed = progress.to_process;
    }
    this.cancelCleanup(scanId);
    if (this._retentionMs === 0) {
      this._progress.delete(scanId);
      return;
    }
    const timer = setTimeout(() => {
      this._progress.delete(scanId);
      this._cleanupTimers.delete(scanId);
    }, this._retentionMs);
    timer.unref();
    this._cleanupTimers.set(scanId, timer);
  }

  /** A copy of the scan's progress, or null once it has been discarded. */
  getProgress(scanId: number): ScanProgress | null {
    const progress = this._progress.get(scanId);
    return progress ? { ...progress } : null;
  }

  /** Drops every progress entry and pending cleanup timer. */
  clearProgress(): void {
    for (const timer of this._cleanupTimers.values()) clearTimeout(timer);
    this._cleanupTimers.clear();
    this._progress.clear();
  }

  getStatus(): { name: string; running: boolean; scan_id: number | null; started_at: string | null } {
    return {
      name: this.name,
      running: this._running,
      scan_id: this._activeScanId,
      started_at: this._startedAt ? this._startedAt.toISOString() : null,
    };
  }

  private cancelCleanup(scanId: number): void {
    const timer = this._cleanupTimers.get(scanId);
    if (timer) {
      clearTimeout(timer);
      this._cleanupTimers.delete(scanId);
    }
  }
}
