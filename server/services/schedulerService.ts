import { SCAN_SCHEDULER_ENABLED, SCAN_SCHEDULE_UTC, parseScheduleTime } from '../config.js';
import { nextWeekdayRunUtcMs, utcDateKey } from '../lib/dateUtils.js';

const SCHEDULER_ENABLED_BY_CONFIG = Boolean(SCAN_SCHEDULER_ENABLED);
const STEP_MAX_ATTEMPTS = 3; // Initial attempt + 2 retries
const STEP_RETRY_DELAY_MS = 20_000;
const DEFAULT_SCHEDULE = { hour: 10, minute: 30 };

let schedulerEnabledRuntime = SCHEDULER_ENABLED_BY_CONFIG;
let schedulerTimer: ReturnType<typeof setTimeout> | null = null;
let nextScanRunUtcMs: number | null = null;
let pipelineDeps: DailyScanPipelineDeps | null = null;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getStatus(result: unknown): string {
  if (!result || typeof result !== 'object') return 'completed';
  const status: unknown = Reflect.get(result, 'status');
  return String(status || 'completed')
    .trim()
    .toLowerCase();
}

// `running` means another trigger already owns today's scan.
function isSuccessfulStatus(status: string): boolean {
  return status === 'completed' || status === 'ok' || status === 'running';
}

interface StepRunOptions {
  ignoreRuntimeEnabled?: boolean;
  retryDelayMs?: number;
}

export interface DailyScanPipelineDeps {
  reloadSymbols: () => Promise<unknown>;
  runScan: () => Promise<unknown>;
}

export type DailyScanPipelineOptions = StepRunOptions;

/** Runs `step` up to three times; returns whether any attempt succeeded. */
export async function runStepWithRetries(
  label: string,
  step: () => Promise<unknown>,
  options: StepRunOptions = {},
): Promise<boolean> {
  const retryDelayMs = Math.max(0, Number(options.retryDelayMs ?? STEP_RETRY_DELAY_MS));
  for (let attempt = 1; attempt <= STEP_MAX_ATTEMPTS; attempt += 1) {
    if (!options.ignoreRuntimeEnabled && !schedulerEnabledRuntime) return false;
    try {
      const result = await step();
      const status = getStatus(result);
      if (isSuccessfulStatus(status)) {
        console.log(`[scheduler] ${label} completed (attempt ${attempt}/${STEP_MAX_ATTEMPTS})`);
        return true;
      }
      console.warn(`[scheduler] ${label} returned status=${status} (attempt ${attempt}/${STEP_MAX_ATTEMPTS})`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[scheduler] ${label} failed (attempt ${attempt}/${STEP_MAX_ATTEMPTS}): ${message}`);
    }

    if (attempt < STEP_MAX_ATTEMPTS && retryDelayMs > 0) {
      await wait(retryDelayMs);
    }
  }
  console.error(`[scheduler] ${label} exhausted retries; continuing to next step`);
  return false;
}

/** Refreshes the universe from the symbols file, then scans it. */
export async function runDailyScanPipeline(
  runDate: string,
  deps: DailyScanPipelineDeps,
  options: DailyScanPipelineOptions = {},
): Promise<void> {
  console.log(`[scheduler] Daily scan pipeline started for ${runDate}`);
  await runStepWithRetries('Reload Symbols', () => deps.reloadSymbols(), options);
  await runStepWithRetries('Scan', () => deps.runScan(), options);
  console.log(`[scheduler] Daily scan pipeline finished for ${runDate}`);
}

function scheduleTime(): { hour: number; minute: number } {
  return parseScheduleTime(SCAN_SCHEDULE_UTC) ?? DEFAULT_SCHEDULE;
}

export function getNextScanUtcMs(nowUtc = new Date(), schedule = scheduleTime()): number {
  return nextWeekdayRunUtcMs(nowUtc, schedule.hour, schedule.minute);
}

function clearSchedulerTimer(): void {
  if (schedulerTimer) clearTimeout(schedulerTimer);
  schedulerTimer = null;
  nextScanRunUtcMs = null;
}

export function scheduleNextScan(): void {
  if (!schedulerEnabledRuntime || !pipelineDeps) {
    clearSchedulerTimer();
    return;
  }

  if (schedulerTimer) clearTimeout(schedulerTimer);
  const nextRunMs = getNextScanUtcMs(new Date());
  nextScanRunUtcMs = nextRunMs;
  const delayMs = Math.max(1000, nextRunMs - Date.now());
  const deps = pipelineDeps;

  const timer = setTimeout(async () => {
    try {
      await runDailyScanPipeline(utcDateKey(new Date()), deps);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[scheduler] Daily scan pipeline crashed: ${message}`);
    } finally {
      nextScanRunUtcMs = null;
      if (schedulerEnabledRuntime) {
        scheduleNextScan();
      }
    }
  }, delayMs);

  schedulerTimer = timer;
  timer.unref();
  console.log(`[scheduler] Next daily scan scheduled in ${Math.round(delayMs / 1000)}s`);
}

export interface SchedulerState {
  enabledByConfig: boolean;
  enabled: boolean;
  nextScanRunUtc: string | null;
}

export function getSchedulerState(): SchedulerState {
  return {
    enabledByConfig: SCHEDULER_ENABLED_BY_CONFIG,
    enabled: schedulerEnabledRuntime,
    nextScanRunUtc: nextScanRunUtcMs ? new Date(nextScanRunUtcMs).toISOString() : null,
  };
}

/** Wires the pipeline steps and arms the timer when the scheduler is enabled. */
export function startScheduler(deps: DailyScanPipelineDeps): SchedulerState {
  pipelineDeps = deps;
  scheduleNextScan();
  return getSchedulerState();
}

export function stopScheduler(): void {
  clearSchedulerTimer();
  pipelineDeps = null;
}

export function setSchedulerEnabled(enabled: boolean): SchedulerState {
  schedulerEnabledRuntime = Boolean(enabled);
  if (!schedulerEnabledRuntime) {
    clearSchedulerTimer();
    return getSchedulerState();
  }

  scheduleNextScan();
  return getSchedulerState();
}
