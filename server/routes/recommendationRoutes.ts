import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { ScanQueryService } from '../services/scanQueryService.js';
import { LatestRecommendationsResponseSchema, LatestResultsResponseSchema } from './schemas.js';

interface RecommendationRoutesOptions {
  app: FastifyInstance;
  queries: ScanQueryService;
}

/** Both routes read the latest scan and answer with empty lists when there is none. */
function registerRecommendationRoutes(options: RecommendationRoutesOptions): void {
  const { app, queries } = options;

  if (!app) {
    throw new Error('registerRecommendationRoutes requires app');
  }
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    '/api/recommendations/latest',
    { schema: { response: { 200: LatestRecommendationsResponseSchema } } },
    async (_request, reply) => reply.send(await queries.getLatestRecommendations()),
  );

  typedApp.get(
    '/api/recommendations/latest/all',
    { schema: { response: { 200: LatestResultsResponseSchema } } },
    async (_request, reply) => reply.send(await queries.getLatestResults()),
  );
}

export { registerRecommendationRoutes };
