export interface DatabaseCheck {
  ok: boolean | null;
  error?: string;
}

/** `ok: null` means no database is configured. */
async function checkDatabaseReady(ping: (() => Promise<void>) | null): Promise<DatabaseCheck> {
  if (!ping) return { ok: null };
  try {
    await ping();
    return { ok: true };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

interface HealthPayloadOptions {
  isShuttingDown: boolean;
  nowIso: string;
  uptimeSeconds: number;
}

function buildHealthPayload(options: HealthPayloadOptions) {
  const { isShuttingDown, nowIso, uptimeSeconds } = options;
  return {
    status: 'ok',
    timestamp: nowIso,
    uptimeSeconds,
    shuttingDown: isShuttingDown,
  };
}

interface ReadyPayloadOptions {
  pingDatabase: (() => Promise<void>) | null;
  isShuttingDown: boolean;
  scanRunning: boolean;
  lastScan: { id: number; status: string; startedAt: Date } | null;
  now?: Date;
  getPoolStats?: () => { total: number; idle: number; waiting: number; max: number } | null;
}

const DATA_STALENESS_WARN_HOURS = 25;

async function buildReadyPayload(options: ReadyPayloadOptions) {
  const { pingDatabase, isShuttingDown, scanRunning, lastScan, getPoolStats } = options;
  const now = options.now ?? new Date();

  const database = await checkDatabaseReady(pingDatabase);
  const ready = !isShuttingDown && database.ok === true;

  // Degraded checks: the app is up but operating in a reduced-capacity state.
  const warnings: string[] = [];
  if (lastScan) {
    const hoursSinceScan = (now.getTime() - lastScan.startedAt.getTime()) / (60 * 60 * 1000);
    if (hoursSinceScan > DATA_STALENESS_WARN_HOURS) {
      warnings.push(`scan data is stale: last scan ${lastScan.id} started ${Math.floor(hoursSinceScan)}h ago`);
    }
    if (lastScan.status === 'failed') warnings.push(`last scan ${lastScan.id} failed`);
  }
  const poolStats = typeof getPoolStats === 'function' ? getPoolStats() : null;
  if (poolStats && poolStats.max > 0) {
    const utilization = poolStats.total / poolStats.max;
    if (poolStats.waiting > 0) warnings.push(`DB pool has ${poolStats.waiting} waiting connection(s)`);
    else if (utilization >= 0.9) warnings.push(`DB pool near capacity (${poolStats.total}/${poolStats.max} connections)`);
  }

  const degraded = warnings.length > 0;
  const statusCode = !ready ? 503 : 200;

  return {
    statusCode,
    body: {
      ready,
      degraded,
      shuttingDown: isShuttingDown,
      database: database.ok,
      scanRunning,
      lastScanId: lastScan?.id ?? null,
      dbPool: poolStats ?? undefined,
      warnings: degraded ? warnings : undefined,
      errors: {
        database: database.error || null,
      },
    },
  };
}

export { checkDatabaseReady, buildHealthPayload, buildReadyPayload };
