import type { PipelineStore } from '../../db/types';
import { ReviewError, saveReview, type ReviewedRecord, type ReviewSaveResult } from '../../review/saveReview';
import type { RecordSchema } from '../../schema/recordSchema';
import { createError } from '../middleware/errorHandler';
import { DocumentsService } from './documentsService';

export class ReviewService {
  private documents: DocumentsService;

  constructor(
    private store: PipelineStore,
    private schema: RecordSchema
  ) {
    this.documents = new DocumentsService(store);
  }

  /** The rows currently stored for the document are the review's originals. */
  async submitReview(documentId: number, records: ReviewedRecord[]): Promise<ReviewSaveResult> {
    await this.documents.requireDocument(documentId);
    const originals = await this.store.getRecords(documentId);

    try {
      return await saveReview(this.store, this.schema, documentId, records, originals);
    } catch (error) {
      if (error instanceof ReviewError) {
        throw createError(error.message, 400, 'INVALID_REVIEW');
      }
      throw error;
    }
  }
}
