import type { PipelineStore } from '../../db/types';
import type { RecordSchema } from '../../schema/recordSchema';

export interface ApiDependencies {
  store: PipelineStore;
  schema: RecordSchema;
}

export interface DocumentSummary {
  id: number;
  file_name: string;
  title: string | null;
  first_author_lastname: string | null;
  publication_year: number | null;
  records_extracted: number | null;
  ocr_status: string | null;
  metadata_status: string | null;
  extraction_status: string | null;
  refinement_status: string | null;
  reviewed_at: string | null;
}

export interface DocumentsQuerystring {
  reviewed?: string;
}

export interface DocumentParams {
  documentId: string;
}
