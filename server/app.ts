import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { IS_PRODUCTION } from './config.js';
import type { ScanStore } from './data/scanStoreTypes.js';
import { httpRequestsTotal, metricsRegistry } from './metrics.js';
import type { ScanOrchestrator } from './orchestrators/scanOrchestrator.js';
import { registerAdminRoutes } from './routes/adminRoutes.js';
import { registerHealthRoutes } from './routes/healthRoutes.js';
import { registerRecommendationRoutes } from './routes/recommendationRoutes.js';
import { registerScanRoutes } from './routes/scanRoutes.js';
import { registerSymbolRoutes } from './routes/symbolRoutes.js';
import { buildHealthPayload, buildReadyPayload } from './services/healthService.js';
import { ScanQueryService } from './services/scanQueryService.js';
import type { UniverseService } from './services/universeService.js';

export interface AppDeps {
  store: ScanStore;
  orchestrator: ScanOrchestrator;
  universe: UniverseService;
  /** Null when no database is configured. */
  pingDatabase: (() => Promise<void>) | null;
  getPoolStats?: () => { total: number; idle: number; waiting: number; max: number } | null;
  isShuttingDown?: () => boolean;
  startedAtMs?: number;
}

/**
 * Builds the HTTP app without listening, so tests can drive it through
 * `app.inject`.
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const { store, orchestrator, universe } = deps;
  const startedAtMs = deps.startedAtMs ?? Date.now();
  const isShuttingDown = deps.isShuttingDown ?? (() => false);

  const app = Fastify({ logger: false });
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.addHook('onResponse', async (request, reply) => {
    httpRequestsTotal.inc({
      method: request.method,
      route: request.routeOptions.url ?? 'unmatched',
      status: String(reply.statusCode),
    });
  });

  app.setErrorHandler<FastifyError>((err, request, reply) => {
    if (err.validation) {
      return reply.code(400).send({ error: err.message });
    }
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      console.error(`[http] ${request.method} ${request.url} failed: ${err.message}`);
    }
    return reply.code(statusCode).send({ error: IS_PRODUCTION && statusCode >= 500 ? 'Internal server error' : err.message });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.code(404).send({ error: 'Route not found' });
  });

  const queries = new ScanQueryService(store, orchestrator.state);

  registerScanRoutes({ app, orchestrator, queries });
  registerSymbolRoutes({ app, universe, queries });
  registerRecommendationRoutes({ app, queries });
  registerAdminRoutes({ app, universe });
  registerHealthRoutes({
    app,
    metricsRegistry,
    getHealthPayload: () =>
      buildHealthPayload({
        isShuttingDown: isShuttingDown(),
        nowIso: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startedAtMs) / 1000),
      }),
    getReadyPayload: async () =>
      buildReadyPayload({
        pingDatabase: deps.pingDatabase,
        isShuttingDown: isShuttingDown(),
        scanRunning: orchestrator.state.isRunning,
        lastScan: deps.pingDatabase ? await store.getLatestScan() : null,
        getPoolStats: deps.getPoolStats,
      }),
  });

  return app;
}
