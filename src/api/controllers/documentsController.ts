import type { FastifyRequest, FastifyReply } from 'fastify';
import { DocumentsService } from '../services/documentsService';
import { createError } from '../middleware/errorHandler';
import type { DocumentParams, DocumentsQuerystring } from '../types/api';

export function parseDocumentId(raw: string): number {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw createError(`Invalid document id: ${raw}`, 400, 'INVALID_DOCUMENT_ID');
  }
  return id;
}

export class DocumentsController {
  constructor(private documentsService: DocumentsService) {}

  async getAll(
    request: FastifyRequest<{ Querystring: DocumentsQuerystring }>,
    reply: FastifyReply
  ) {
    const reviewedOnly = request.query.reviewed === 'true';
    const documents = await this.documentsService.listDocuments(reviewedOnly);
    reply.send({ data: documents });
  }

  async getRecords(
    request: FastifyRequest<{ Params: DocumentParams }>,
    reply: FastifyReply
  ) {
    const documentId = parseDocumentId(request.params.documentId);
    const records = await this.documentsService.getRecords(documentId);
    reply.send({ data: records });
  }
}
