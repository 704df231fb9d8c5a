import 'dotenv/config';
import { HOST, PORT, SCAN_PROGRESS_RETENTION_MS, validateStartupEnvironment } from './server/config.js';
import logger from './server/logger.js';
import { buildApp } from './server/app.js';
import { KyselyScanStore } from './server/data/scanStore.js';
import { closeDatabase, db, getPoolStats, pingDatabase } from './server/db.js';
import { runMigrations } from './server/db/migrate.js';
import { describeError } from './server/lib/errors.js';
import { ScanState } from './server/lib/ScanState.js';
import { ScanOrchestrator } from './server/orchestrators/scanOrchestrator.js';
import { MarketDataService } from './server/services/marketDataService.js';
import { startScheduler, stopScheduler } from './server/services/schedulerService.js';
import { UniverseService } from './server/services/universeService.js';

const SHUTDOWN_TIMEOUT_MS = 15_000;

validateStartupEnvironment();

if (!db) {
  // validateStartupEnvironment rejects a missing DATABASE_URL, so this only guards the type.
  throw new Error('Database is not configured');
}
const database = db;

const startedAtMs = Date.now();
let isShuttingDown = false;

const store = new KyselyScanStore(database);
const scanState = new ScanState('scan', { retentionMs: SCAN_PROGRESS_RETENTION_MS });
const orchestrator = new ScanOrchestrator({
  store,
  marketData: new MarketDataService(),
  state: scanState,
});
const universe = new UniverseService({ store, state: scanState });

const app = buildApp({
  store,
  orchestrator,
  universe,
  pingDatabase: () => pingDatabase(database),
  getPoolStats,
  isShuttingDown: () => isShuttingDown,
  startedAtMs,
});

async function start(): Promise<void> {
  await runMigrations(database);
  await orchestrator.reconcileOrphanedScans();
  startScheduler({
    reloadSymbols: () => universe.reloadSymbols(),
    runScan: () => orchestrator.runScan(),
  });
  await app.listen({ port: PORT, host: HOST });
  logger.info({ port: PORT, host: HOST }, 'server listening');
}

async function shutdownServer(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  console.log(`Received ${signal}; shutting down gracefully`);
  stopScheduler();

  const forceExitTimer = setTimeout(() => {
    console.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimer.unref();

  try {
    await app.close();
    await closeDatabase();
    clearTimeout(forceExitTimer);
    process.exit(0);
  } catch (err: unknown) {
    console.error(`Graceful shutdown failed: ${describeError(err)}`);
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  void shutdownServer('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdownServer('SIGTERM');
});
process.on('unhandledRejection', (reason) => {
  console.error(`Unhandled rejection: ${describeError(reason)}`);
});
process.on('uncaughtException', (err) => {
  console.error(`Uncaught exception: ${describeError(err)}`);
  void shutdownServer('uncaughtException');
});

start().catch((err: unknown) => {
  console.error(`Startup failed: ${describeError(err)}`);
  process.exit(1);
});
