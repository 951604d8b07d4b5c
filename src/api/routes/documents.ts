import type { FastifyInstance } from 'fastify';
import { DocumentsController } from '../controllers/documentsController';
import { DocumentsService } from '../services/documentsService';
import type { ApiDependencies, DocumentParams, DocumentsQuerystring } from '../types/api';

export function registerDocumentsRoutes(fastify: FastifyInstance, deps: ApiDependencies) {
  const controller = new DocumentsController(new DocumentsService(deps.store));

  // GET /api/documents?reviewed=true
  fastify.get<{ Querystring: DocumentsQuerystring }>('/api/documents', async (request, reply) => {
    await controller.getAll(request, reply);
  });

  // GET /api/documents/:documentId/records
  fastify.get<{ Params: DocumentParams }>(
    '/api/documents/:documentId/records',
    async (request, reply) => {
      await controller.getRecords(request, reply);
    }
  );
}
