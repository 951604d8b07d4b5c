import type { FastifyInstance } from 'fastify';
import { ReviewController } from '../controllers/reviewController';
import { ReviewService } from '../services/reviewService';
import { requireApiKey } from '../middleware';
import type { ApiDependencies, DocumentParams } from '../types/api';

export function registerReviewRoutes(fastify: FastifyInstance, deps: ApiDependencies) {
  const controller = new ReviewController(new ReviewService(deps.store, deps.schema));

  // POST /api/documents/:documentId/review
  fastify.post<{ Params: DocumentParams; Body: unknown }>(
    '/api/documents/:documentId/review',
    { preHandler: requireApiKey },
    async (request, reply) => {
      await controller.submit(request, reply);
    }
  );
}
