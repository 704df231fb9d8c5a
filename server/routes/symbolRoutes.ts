import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { ScanQueryService } from '../services/scanQueryService.js';
import { SymbolsFileNotFoundError, type UniverseService } from '../services/universeService.js';
import {
  ErrorResponseSchema,
  ReloadSymbolsResponseSchema,
  SymbolDetailsQuerySchema,
  SymbolDetailsResponseSchema,
  SymbolParamsSchema,
} from './schemas.js';

interface SymbolRoutesOptions {
  app: FastifyInstance;
  universe: UniverseService;
  queries: ScanQueryService;
}

function registerSymbolRoutes(options: SymbolRoutesOptions): void {
  const { app, universe, queries } = options;

  if (!app) {
    throw new Error('registerSymbolRoutes requires app');
  }
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.post(
    '/api/symbols/reload',
    {
      schema: {
        response: { 200: ReloadSymbolsResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (_request, reply) => {
      try {
        return reply.send(await universe.reloadSymbols());
      } catch (err: unknown) {
        if (err instanceof SymbolsFileNotFoundError) {
          console.error(`[universe] ${err.message}`);
          return reply.code(404).send({ error: err.message });
        }
        throw err;
      }
    },
  );

  // Fundamentals, indicators, signals and chart series for the details view.
  typedApp.get(
    '/api/symbol/:symbol/details',
    {
      schema: {
        params: SymbolParamsSchema,
        querystring: SymbolDetailsQuerySchema,
        response: { 200: SymbolDetailsResponseSchema, 404: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await queries.getSymbolDetails(request.params.symbol, request.query.scan_id);
      if (!result.ok) return reply.code(result.statusCode).send({ error: result.error });
      return reply.send(result.body);
    },
  );
}

export { registerSymbolRoutes };
