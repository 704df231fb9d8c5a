import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { getSchedulerState, setSchedulerEnabled } from '../services/schedulerService.js';
import type { UniverseService } from '../services/universeService.js';
import {
  ClearAllQuerySchema,
  ClearAllResponseSchema,
  ErrorResponseSchema,
  SchedulerStateResponseSchema,
  SchedulerToggleBodySchema,
} from './schemas.js';

interface AdminRoutesOptions {
  app: FastifyInstance;
  universe: UniverseService;
}

function registerAdminRoutes(options: AdminRoutesOptions): void {
  const { app, universe } = options;

  if (!app) {
    throw new Error('registerAdminRoutes requires app');
  }
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.delete(
    '/api/admin/clear-all',
    {
      schema: {
        querystring: ClearAllQuerySchema,
        response: { 200: ClearAllResponseSchema, 400: ErrorResponseSchema, 409: ErrorResponseSchema },
      },
    },
    async (request, reply) => {
      const confirm = request.query.confirm;
      if (confirm !== 'true' && confirm !== '1') {
        return reply.code(400).send({ error: 'confirm=true is required' });
      }
      const result = await universe.clearAll();
      if (result.status === 'running') {
        return reply.code(409).send({ error: 'A scan is already running' });
      }
      return reply.send({ status: 'ok', deleted: result.deleted });
    },
  );

  typedApp.get(
    '/api/admin/scheduler',
    { schema: { response: { 200: SchedulerStateResponseSchema } } },
    async (_request, reply) => {
      return reply.send(getSchedulerState());
    },
  );

  // Runtime toggle only; SCAN_SCHEDULER_ENABLED applies again on restart.
  typedApp.put(
    '/api/admin/scheduler',
    { schema: { body: SchedulerToggleBodySchema, response: { 200: SchedulerStateResponseSchema } } },
    async (request, reply) => {
      const state = setSchedulerEnabled(request.body.enabled);
      console.log(`[scheduler] ${state.enabled ? 'enabled' : 'disabled'} via admin route`);
      return reply.send(state);
    },
  );
}

export { registerAdminRoutes };
