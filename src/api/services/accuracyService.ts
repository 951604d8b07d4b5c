import type { PipelineStore } from '../../db/types';
import { calculateAccuracy, type AccuracyReport } from '../../review/accuracy';
import type { RecordSchema } from '../../schema/recordSchema';

export class AccuracyService {
  constructor(
    private store: PipelineStore,
    private schema: RecordSchema
  ) {}

  async getReport(): Promise<AccuracyReport> {
    const documents = await this.store.listDocuments({ reviewedOnly: true });
    const ids = documents.map((d) => d.id);
    const [records, edits] = await Promise.all([
      this.store.listRecords(ids),
      this.store.listRecordEdits(ids),
    ]);
    return calculateAccuracy(documents, records, edits, this.schema);
  }
}
