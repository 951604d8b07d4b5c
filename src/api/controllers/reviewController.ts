import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { JsonValueSchema } from '../../schema/recordSchema';
import { ReviewService } from '../services/reviewService';
import { createError } from '../middleware/errorHandler';
import type { DocumentParams } from '../types/api';
import { parseDocumentId } from './documentsController';

const ReviewBodySchema = z.object({
  records: z.array(
    z.object({
      id: z.number().int().positive().nullable().optional(),
      record_id: z.string().nullable().optional(),
      fields: z.record(JsonValueSchema),
    })
  ),
});

export class ReviewController {
  constructor(private reviewService: ReviewService) {}

  async submit(
    request: FastifyRequest<{ Params: DocumentParams; Body: unknown }>,
    reply: FastifyReply
  ) {
    const documentId = parseDocumentId(request.params.documentId);
    const body = ReviewBodySchema.safeParse(request.body);
    if (!body.success) {
      const details = body.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw createError(`Invalid review body: ${details}`, 400, 'INVALID_REVIEW');
    }

    const result = await this.reviewService.submitReview(documentId, body.data.records);
    reply.send({ data: { documentId, ...result } });
  }
}
