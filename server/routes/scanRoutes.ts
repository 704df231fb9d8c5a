import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { ScanOrchestrator } from '../orchestrators/scanOrchestrator.js';
import type { ScanQueryService } from '../services/scanQueryService.js';
import {
  ActiveScanResponseSchema,
  DeleteSymbolResponseSchema,
  ErrorResponseSchema,
  RunScanResponseSchema,
  ScanIdParamsSchema,
  ScanLogsResponseSchema,
  ScanStatusResponseSchema,
  ScanSymbolParamsSchema,
  SymbolParamsSchema,
} from './schemas.js';

interface ScanRoutesOptions {
  app: FastifyInstance;
  orchestrator: ScanOrchestrator;
  queries: ScanQueryService;
}

/**
 * Scan lifecycle routes: start, poll, audit logs and per-symbol deletes.
 * Static `latest` paths are registered alongside `:scanId`; the router
 * prefers the static segment.
 */
function registerScanRoutes(options: ScanRoutesOptions): void {
  const { app, orchestrator, queries } = options;

  if (!app) {
    throw new Error('registerScanRoutes requires app');
  }
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.post(
    '/api/scan/run',
    {
      schema: {
        response: {
          200: RunScanResponseSchema,
          409: ErrorResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const started = await orchestrator.startScan();
      if (started.status === 'running') {
        return reply.code(409).send({ error: 'A scan is already running' });
      }
      // `completion` never rejects; the orchestrator logs and records failures itself.
      return reply.send({ scan_id: started.scanId });
    },
  );

  typedApp.get(
    '/api/scan/active',
    {
      schema: {
        response: { 200: ActiveScanResponseSchema },
      },
    },
    async (_request, reply) => reply.send(queries.getActiveScan()),
  );

  typedApp.get(
    '/api/scan/latest/logs',
    {
      schema: {
        response: { 200: ScanLogsResponseSchema },
      },
    },
    async (_request, reply) => reply.send(await queries.getLatestScanLogs()),
  );

  typedApp.get(
    '/api/scan/:scanId/logs',
    {
      schema: {
        params: ScanIdParamsSchema,
        response: { 200: ScanLogsResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await queries.getScanLogs(request.params.scanId);
      if (!result.ok) return reply.code(result.statusCode).send({ error: result.error });
      return reply.send(result.body);
    },
  );

  typedApp.get(
    '/api/scan/:scanId',
    {
      schema: {
        params: ScanIdParamsSchema,
        response: { 200: ScanStatusResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await queries.getScanStatus(request.params.scanId);
      if (!result.ok) return reply.code(result.statusCode).send({ error: result.error });
      return reply.send(result.body);
    },
  );

  typedApp.delete(
    '/api/scan/latest/symbol/:symbol',
    {
      schema: {
        params: SymbolParamsSchema,
        response: { 200: DeleteSymbolResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await queries.deleteSymbolFromLatestScan(request.params.symbol);
      if (!result.ok) return reply.code(result.statusCode).send({ error: result.error });
      return reply.send(result.body);
    },
  );

  typedApp.delete(
    '/api/scan/:scanId/symbol/:symbol',
    {
      schema: {
        params: ScanSymbolParamsSchema,
        response: { 200: DeleteSymbolResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await queries.deleteSymbolFromScan(request.params.scanId, request.params.symbol);
      if (!result.ok) return reply.code(result.statusCode).send({ error: result.error });
      return reply.send(result.body);
    },
  );
}

export { registerScanRoutes };
