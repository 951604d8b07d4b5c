import { describe, it, expect, beforeEach } from '@jest/globals';
import type { RecordEditRow, RecordRow } from '../src/db/types';
import { calculateAccuracy, ratio } from '../src/review/accuracy';
import { ReviewError, saveReview } from '../src/review/saveReview';
import { parseRecordSchema } from '../src/schema/recordSchema';
import { testSchema } from './utils/fakes';
import { MockPipelineStore, emptyDocument } from './utils/mockStore';

const NOW = new Date('2024-05-01T00:00:00.000Z');

describe('saveReview', () => {
  const schema = testSchema();
  let store: MockPipelineStore;
  let originals: RecordRow[];

  beforeEach(async () => {
    store = new MockPipelineStore(schema);
    const document = await store.createDocument({
      file_name: 'smith.pdf',
      file_path: 'papers/smith.pdf',
      file_hash: 'hash-1',
      file_size: 100,
    });
    await store.updateDocument(document.id, { first_author_lastname: 'Smith', publication_year: 2019 });
    await store.insertRecords(document.id, [
      {
        record_id: 'Smith2019-o1',
        fields: { species: 'Myotis', interaction: 'predation', location: 'Kenya', individual_count: 3 },
        llm_model: 'extract-model',
        prompt_hash: 'p',
        extracted_at: NOW.toISOString(),
      },
      {
        record_id: 'Smith2019-o2',
        fields: { species: 'Eptesicus', interaction: 'roosting' },
        llm_model: 'extract-model',
        prompt_hash: 'p',
        extracted_at: NOW.toISOString(),
      },
      {
        record_id: 'Smith2019-o3',
        fields: { species: 'Nyctalus', interaction: 'pollination' },
        llm_model: 'extract-model',
        prompt_hash: 'p',
        extracted_at: NOW.toISOString(),
      },
    ]);
    originals = await store.getRecords(document.id);
  });

  function original(id: number): RecordRow {
    const row = originals.find((r) => r.id === id);
    if (!row) throw new Error(`no record ${id}`);
    return row;
  }

  it('logs edits, soft-deletes missing rows and inserts added rows', async () => {
    const result = await saveReview(
      store,
      schema,
      1,
      [
        { id: 1, fields: { ...original(1).fields, location: 'Tanzania', individual_count: '4' } },
        { id: 2, record_id: 'Smith2019-custom', fields: original(2).fields },
        { fields: { species: 'Rhinolophus', interaction: 'roosting' } },
      ],
      originals,
      NOW
    );

    expect(result).toEqual({ edited: 2, added: 1, deleted: 1, edits: 3 });
    expect(store.edits).toEqual([
      {
        id: 1,
        document_id: 1,
        record_id: 1,
        column_name: 'location',
        original_value: 'Kenya',
        new_value: 'Tanzania',
        edited_at: '2024-05-01T00:00:00.000Z',
      },
      {
        id: 2,
        document_id: 1,
        record_id: 1,
        column_name: 'individual_count',
        original_value: '3',
        new_value: '4',
        edited_at: '2024-05-01T00:00:00.000Z',
      },
      {
        id: 3,
        document_id: 1,
        record_id: 2,
        column_name: 'record_id',
        original_value: 'Smith2019-o2',
        new_value: 'Smith2019-custom',
        edited_at: '2024-05-01T00:00:00.000Z',
      },
    ]);

    const rows = await store.getRecords(1);
    const byId = new Map(rows.map((r) => [r.id, r]));
    expect(byId.get(1)?.fields.location).toBe('Tanzania');
    expect(byId.get(1)?.fields.individual_count).toBe(4);
    expect(byId.get(1)?.human_edited).toBe(true);
    expect(byId.get(2)?.record_id).toBe('Smith2019-custom');
    expect(byId.get(2)?.human_edited).toBe(true);
    expect(byId.get(3)?.deleted_by_user).toBe(true);
    expect(byId.get(3)?.human_edited).toBe(false);
    expect(byId.get(4)).toMatchObject({
      record_id: 'Smith2019-o4',
      added_by_user: true,
      llm_model: null,
      fields: {
        species: 'Rhinolophus',
        interaction: 'roosting',
        location: null,
        individual_count: null,
        sentences: null,
        confirmed: null,
      },
    });
    expect((await store.getDocument(1))?.reviewed_at).toBe('2024-05-01T00:00:00.000Z');
  });

  it('records nothing for an unchanged submission but marks the review', async () => {
    const result = await saveReview(
      store,
      schema,
      1,
      originals.map((r) => ({ id: r.id, record_id: r.record_id, fields: r.fields })),
      originals,
      NOW
    );
    expect(result).toEqual({ edited: 0, added: 0, deleted: 0, edits: 0 });
    expect(store.edits).toEqual([]);
    expect((await store.getDocument(1))?.reviewed_at).toBe('2024-05-01T00:00:00.000Z');
  });

  it('only marks the document reviewed without originals', async () => {
    const result = await saveReview(store, schema, 1, [], undefined, NOW);
    expect(result).toEqual({ edited: 0, added: 0, deleted: 0, edits: 0 });
    expect((await store.getRecords(1)).every((r) => !r.deleted_by_user)).toBe(true);
    expect((await store.getDocument(1))?.reviewed_at).toBe('2024-05-01T00:00:00.000Z');
  });

  it('rejects ids from another document', async () => {
    await expect(
      saveReview(store, schema, 1, [{ id: 99, fields: {} }], originals, NOW)
    ).rejects.toThrow(new ReviewError('Record 99 does not belong to document 1'));
    expect((await store.getDocument(1))?.reviewed_at).toBeNull();
  });

  it('feeds the accuracy report', async () => {
    await saveReview(
      store,
      schema,
      1,
      [
        { id: 1, fields: { location: 'Tanzania', individual_count: 4 } },
        { id: 2, record_id: 'Smith2019-custom', fields: {} },
        { fields: { species: 'Rhinolophus', interaction: 'roosting' } },
      ],
      originals,
      NOW
    );
    const documents = await store.listDocuments({ reviewedOnly: true });
    const report = calculateAccuracy(documents, await store.listRecords([1]), await store.listRecordEdits([1]), schema);

    expect(report.model_extracted).toBe(3);
    expect(report.deleted).toBe(1);
    expect(report.human_added).toBe(1);
    expect(report.total_edits).toBe(2);
    expect(report.major_edits).toBe(1);
    expect(report.records_with_edits).toBe(1);
  });
});

describe('calculateAccuracy', () => {
  // 8 fields: 4 unique, 2 required, 2 optional
  const schema = parseRecordSchema({
    properties: {
      records: {
        type: 'array',
        items: {
          properties: { u1: {}, u2: {}, u3: {}, u4: {}, r1: {}, r2: {}, o1: {}, o2: {} },
          required: ['r1', 'r2'],
          'x-unique-fields': ['u1', 'u2', 'u3', 'u4'],
        },
      },
    },
  });

  function record(id: number, documentId: number, flags: Partial<RecordRow> = {}): RecordRow {
    return {
      id,
      document_id: documentId,
      record_id: `R-o${id}`,
      fields: {},
      added_by_user: false,
      deleted_by_user: false,
      human_edited: false,
      llm_model: 'm',
      prompt_hash: null,
      extracted_at: null,
      ...flags,
    };
  }

  function edit(id: number, recordId: number, column: string, documentId = 1): RecordEditRow {
    return {
      id,
      document_id: documentId,
      record_id: recordId,
      column_name: column,
      original_value: 'a',
      new_value: 'b',
      edited_at: NOW.toISOString(),
    };
  }

  const reviewed = {
    ...emptyDocument(1, { file_name: 'a.pdf', file_path: null, file_hash: 'a', file_size: null }),
    reviewed_at: NOW.toISOString(),
  };
  const unreviewed = emptyDocument(2, { file_name: 'b.pdf', file_path: null, file_hash: 'b', file_size: null });

  // 12 model rows (2 deleted), 1 row added by the reviewer
  const records: RecordRow[] = [
    ...Array.from({ length: 10 }, (_, i) => record(i + 1, 1, i >= 8 ? { human_edited: true } : {})),
    record(11, 1, { deleted_by_user: true }),
    record(12, 1, { deleted_by_user: true }),
    record(13, 1, { added_by_user: true, llm_model: null }),
    record(20, 2),
  ];
  const edits: RecordEditRow[] = [
    edit(1, 9, 'o1'),
    edit(2, 9, 'o2'),
    edit(3, 9, 'o1'),
    edit(4, 10, 'u1'),
    edit(5, 11, 'u2'),
    edit(6, 10, 'record_id'),
    edit(7, 20, 'u1', 2),
  ];

  it('computes detection and field metrics from the edit log', () => {
    const report = calculateAccuracy([reviewed, unreviewed], records, edits, schema);

    expect(report.verified_documents).toBe(1);
    expect(report.verified_records).toBe(11);
    expect(report.model_extracted).toBe(12);
    expect(report.human_added).toBe(1);
    expect(report.deleted).toBe(2);
    expect(report.num_fields).toBe(8);
    expect(report.records_with_edits).toBe(2);
    expect(report.column_edits).toEqual({ u1: 1, u2: 0, u3: 0, u4: 0, r1: 0, r2: 0, o1: 1, o2: 1 });
    expect(report.total_edits).toBe(3);
    expect(report.major_edits).toBe(1);
    expect(report.minor_edits).toBe(2);

    expect(report.records_found).toBe(10);
    expect(report.records_missed).toBe(1);
    expect(report.records_hallucinated).toBe(2);
    expect(report.detection_precision).toBeCloseTo(10 / 12);
    expect(report.detection_recall).toBeCloseTo(10 / 11);
    expect(report.perfect_record_rate).toBeCloseTo(8 / 10);

    expect(report.total_fields).toBe(96);
    expect(report.correct_fields).toBe(77);
    expect(report.true_fields).toBe(88);
    expect(report.field_precision).toBeCloseTo(77 / 96);
    expect(report.field_recall).toBeCloseTo(77 / 88);
    const p = 77 / 96;
    const r = 77 / 88;
    expect(report.field_f1).toBeCloseTo((2 * p * r) / (p + r));

    expect(report.column_accuracy.u1).toBeCloseTo(11 / 12);
    expect(report.column_accuracy.u2).toBe(1);
    expect(report.major_edit_rate).toBeCloseTo(1 / 3);
    expect(report.avg_edits_per_document).toBe(3);
  });

  it('reports null ratios when nothing was reviewed', () => {
    const report = calculateAccuracy([unreviewed], records, edits, schema);
    expect(report.verified_documents).toBe(0);
    expect(report.model_extracted).toBe(0);
    expect(report.detection_precision).toBeNull();
    expect(report.field_f1).toBeNull();
    expect(report.major_edit_rate).toBeNull();
    expect(report.column_accuracy.u1).toBeNull();
  });

  it('divides safely', () => {
    expect(ratio(1, 0)).toBeNull();
    expect(ratio(1, 4)).toBe(0.25);
  });
});
