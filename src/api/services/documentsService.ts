import type { DocumentRow, PipelineStore, RecordRow } from '../../db/types';
import { createError } from '../middleware/errorHandler';
import type { DocumentSummary } from '../types/api';

function toSummary(document: DocumentRow): DocumentSummary {
  return {
    id: document.id,
    file_name: document.file_name,
    title: document.title,
    first_author_lastname: document.first_author_lastname,
    publication_year: document.publication_year,
    records_extracted: document.records_extracted,
    ocr_status: document.ocr_status,
    metadata_status: document.metadata_status,
    extraction_status: document.extraction_status,
    refinement_status: document.refinement_status,
    reviewed_at: document.reviewed_at,
  };
}

export class DocumentsService {
  constructor(private store: PipelineStore) {}

  async listDocuments(reviewedOnly: boolean): Promise<DocumentSummary[]> {
    const documents = await this.store.listDocuments({ reviewedOnly });
    return documents.map(toSummary);
  }

  async requireDocument(documentId: number): Promise<DocumentRow> {
    const document = await this.store.getDocument(documentId);
    if (!document) {
      throw createError('Document not found', 404, 'DOCUMENT_NOT_FOUND');
    }
    return document;
  }

  async getRecords(documentId: number): Promise<RecordRow[]> {
    await this.requireDocument(documentId);
    return this.store.getRecords(documentId);
  }
}
