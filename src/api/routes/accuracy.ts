import type { FastifyInstance } from 'fastify';
import { AccuracyController } from '../controllers/accuracyController';
import { AccuracyService } from '../services/accuracyService';
import type { ApiDependencies } from '../types/api';

export function registerAccuracyRoutes(fastify: FastifyInstance, deps: ApiDependencies) {
  const controller = new AccuracyController(new AccuracyService(deps.store, deps.schema));

  // GET /api/accuracy
  fastify.get('/api/accuracy', async (request, reply) => {
    await controller.getReport(request, reply);
  });
}
