import { describe, it, expect, beforeEach } from '@jest/globals';
import { Response } from 'node-fetch';
import { CrossrefClient } from '../src/ingest/crossref/client';
import type { OcrPages, OcrProvider } from '../src/ocr/ocr';
import type { PipelineContext } from '../src/pipeline/context';
import { processDocument, runPipeline, type PipelineFile } from '../src/pipeline/runPipeline';
import { mergeMetadata } from '../src/pipeline/stages/metadataStage';
import { isSuccessfulOutcome } from '../src/pipeline/status';
import { NO_FORCE, type ForceOptions } from '../src/pipeline/types';
import { FakeOcrProvider, RoleLlmProvider, createTestContext, testSchema } from './utils/fakes';
import { MockPipelineStore, emptyDocument } from './utils/mockStore';

class UnwritableStore extends MockPipelineStore {
  async updateDocument(): Promise<void> {
    throw new Error('connection reset');
  }
}

const FILE: PipelineFile = { path: 'papers/smith2019.pdf', content: Buffer.from('%PDF-1.4 smith 2019') };

const NO_FORCE_OPTIONS: ForceOptions = {
  ocr: NO_FORCE,
  metadata: NO_FORCE,
  extraction: NO_FORCE,
  refine: NO_FORCE,
};

function force(overrides: Partial<ForceOptions>): ForceOptions {
  return { ...NO_FORCE_OPTIONS, ...overrides };
}

const METADATA = {
  title: 'Bats of the savanna',
  first_author_lastname: 'Smith',
  authors: ['Smith', 'Jones'],
  publication_year: 2019,
};

const EXTRACTED = {
  records: [
    { species: 'Myotis myotis', interaction: 'predation', location: 'Kenya', individual_count: 3 },
    { species: 'Eptesicus fuscus', interaction: 'roosting', location: 'Kenya' },
  ],
};

describe('processDocument', () => {
  let store: MockPipelineStore;
  let llm: RoleLlmProvider;
  let ctx: PipelineContext;

  beforeEach(() => {
    store = new MockPipelineStore(testSchema());
    llm = new RoleLlmProvider({
      metadata: () => METADATA,
      extraction: () => EXTRACTED,
    });
    ctx = createTestContext({ store, llm });
  });

  async function firstRun(): Promise<void> {
    await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });
    store.documentUpdates.length = 0;
  }

  it('runs every governed stage for a new document', async () => {
    const result = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });

    expect(result).toEqual({
      file: 'papers/smith2019.pdf',
      documentId: 1,
      ocr: 'completed',
      metadata: 'completed',
      extraction: 'completed',
      refinement: 'skipped',
      recordsInserted: 2,
      duplicatesRemoved: 0,
      recordsRefined: 0,
    });

    const document = await store.getDocument(1);
    expect(document).toMatchObject({
      file_name: 'smith2019.pdf',
      document_content: 'Page one text\n\n--- PAGE 1 ---\n\nPage two text\n\n--- PAGE 2 ---',
      ocr_provider: 'fake-ocr',
      ocr_log: null,
      title: 'Bats of the savanna',
      first_author_lastname: 'Smith',
      authors: '["Smith","Jones"]',
      publication_year: 2019,
      metadata_llm_model: 'meta-model',
      extraction_llm_model: 'extract-model',
      records_extracted: 2,
      ocr_status: 'completed',
      metadata_status: 'completed',
      extraction_status: 'completed',
      refinement_status: null,
    });

    const records = await store.getRecords(1);
    expect(records.map((r) => r.record_id)).toEqual(['Smith2019-o1', 'Smith2019-o2']);
    expect(records[0]?.fields).toEqual({
      species: 'Myotis myotis',
      interaction: 'predation',
      location: 'Kenya',
      individual_count: 3,
      sentences: null,
      confirmed: null,
    });
    expect(records[0]?.llm_model).toBe('extract-model');
  });

  it('skips everything on a second run of the same file', async () => {
    await firstRun();
    const result = await processDocument(ctx, { ...FILE, path: 'elsewhere/copy.pdf' }, { force: NO_FORCE_OPTIONS });

    expect(result.documentId).toBe(1);
    expect([result.ocr, result.metadata, result.extraction, result.refinement]).toEqual([
      'skipped',
      'skipped',
      'skipped',
      'skipped',
    ]);
    expect(llm.countFor('metadata')).toBe(1);
    expect(llm.countFor('extraction')).toBe(1);
    expect(store.records.size).toBe(2);
    expect(store.documentUpdates).toEqual([]);
  });

  it('cascades a forced metadata run into extraction', async () => {
    await firstRun();
    const result = await processDocument(ctx, FILE, { force: force({ metadata: { kind: 'all' } }) });

    expect(result.ocr).toBe('skipped');
    expect(result.metadata).toBe('completed');
    expect(result.extraction).toBe('completed');
    expect(result.recordsInserted).toBe(0);
    expect(result.duplicatesRemoved).toBe(2);
    expect(store.documentUpdates[0]?.patch).toEqual({ extraction_status: null });
    expect(llm.countFor('metadata')).toBe(2);
    expect(llm.countFor('extraction')).toBe(2);
  });

  it('resets and re-runs metadata and extraction when OCR is forced', async () => {
    const ocr = new FakeOcrProvider('fake-ocr', { pages: ['Page one text', 'Page two text'], images: [] });
    ctx = createTestContext({ store, llm, ocrProviders: [ocr] });
    await firstRun();

    const result = await processDocument(ctx, FILE, { force: force({ ocr: { kind: 'all' } }) });

    expect(store.documentUpdates[0]?.patch).toEqual({ metadata_status: null, extraction_status: null });
    expect([result.ocr, result.metadata, result.extraction]).toEqual(['completed', 'completed', 'completed']);
    expect(result.recordsInserted).toBe(0);
    expect(result.duplicatesRemoved).toBe(2);
    expect(ocr.calls).toBe(2);
    expect(llm.countFor('metadata')).toBe(2);
    expect(llm.countFor('extraction')).toBe(2);
    expect(await store.getDocument(1)).toMatchObject({
      ocr_status: 'completed',
      metadata_status: 'completed',
      extraction_status: 'completed',
    });
  });

  it('ignores a force directive naming other documents', async () => {
    await firstRun();
    const result = await processDocument(ctx, FILE, {
      force: force({ ocr: { kind: 'specific', documentIds: new Set([99]) } }),
    });

    expect(result.ocr).toBe('skipped');
    expect(result.metadata).toBe('skipped');
    expect(result.extraction).toBe('skipped');
  });

  it('re-runs OCR and its downstream stages when the OCR text went missing', async () => {
    await firstRun();
    await store.updateDocument(1, { document_content: null });
    store.documentUpdates.length = 0;

    const result = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });

    expect(store.documentUpdates[0]?.patch).toEqual({
      metadata_status: null,
      extraction_status: null,
      ocr_status: 'Desync detected: ocr marked completed but OCR text missing',
    });
    expect(result.ocr).toBe('completed');
    expect(result.metadata).toBe('completed');
    expect(result.extraction).toBe('completed');
    expect(result.duplicatesRemoved).toBe(2);
    expect((await store.getDocument(1))?.ocr_status).toBe('completed');
  });

  it('falls back to the next OCR provider and keeps the failed attempt in the log', async () => {
    ctx = createTestContext({
      store,
      llm,
      ocrProviders: [
        new FakeOcrProvider('broken', new Error('scanner offline')),
        new FakeOcrProvider('backup', { pages: ['Backup page'], images: [] }),
      ],
    });

    const result = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });
    const document = await store.getDocument(1);

    expect(result.ocr).toBe('completed');
    expect(document?.ocr_provider).toBe('backup');
    expect(document?.document_content).toBe('Backup page\n\n--- PAGE 1 ---');
    const log: unknown = JSON.parse(document?.ocr_log ?? '[]');
    expect(Array.isArray(log) && log.length).toBe(1);
  });

  it('records an OCR failure and reports the downstream stages as failed', async () => {
    ctx = createTestContext({
      store,
      llm,
      ocrProviders: [new FakeOcrProvider('broken', new Error('scanner offline'))],
    });

    const result = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });
    const document = await store.getDocument(1);

    expect(result.ocr).toMatch(/^OCR failed: all OCR providers failed \(.+ broken: scanner offline\)$/);
    expect(document?.ocr_status).toBe(result.ocr);
    expect(document?.document_content).toBeNull();
    expect(result.metadata).toBe('Metadata extraction failed: no OCR text available');
    expect(result.extraction).toBe('Extraction failed: no OCR text available');
    expect(llm.requests).toHaveLength(0);
  });

  it('stores an extraction failure and retries it on the next run', async () => {
    llm.handlers.extraction = () => {
      throw new Error('model exploded');
    };

    const failed = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });
    const message =
      'Extraction failed: All 1 model(s) failed for Extraction; last error: Agent Extraction execution failed: model exploded';
    expect(failed.extraction).toBe(message);
    expect(failed.metadata).toBe('completed');

    const document = await store.getDocument(1);
    expect(document?.extraction_status).toBe(message);
    expect(document?.extraction_log).toContain('"model":"extract-model"');
    expect(store.records.size).toBe(0);

    llm.handlers.extraction = () => EXTRACTED;
    const retried = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });

    expect(retried.ocr).toBe('skipped');
    expect(retried.metadata).toBe('skipped');
    expect(retried.extraction).toBe('completed');
    expect(retried.recordsInserted).toBe(2);
  });

  it('re-admits a record removed outside the pipeline on forced extraction', async () => {
    await firstRun();
    store.hardDeleteRecord(2);

    const result = await processDocument(ctx, FILE, { force: force({ extraction: { kind: 'all' } }) });

    expect(result.recordsInserted).toBe(1);
    expect(result.duplicatesRemoved).toBe(1);
    const records = await store.getRecords(1);
    expect(records.map((r) => [r.id, r.record_id, r.fields.species])).toEqual([
      [1, 'Smith2019-o1', 'Myotis myotis'],
      [3, 'Smith2019-o2', 'Eptesicus fuscus'],
    ]);
    expect((await store.getDocument(1))?.records_extracted).toBe(2);
  });

  it('does not re-insert a record a reviewer deleted', async () => {
    await firstRun();
    await store.updateRecord(2, { deleted_by_user: true });

    const result = await processDocument(ctx, FILE, { force: force({ extraction: { kind: 'all' } }) });

    expect(result.recordsInserted).toBe(0);
    expect(result.duplicatesRemoved).toBe(2);
    expect((await store.getDocument(1))?.records_extracted).toBe(1);
  });

  describe('refinement', () => {
    beforeEach(() => {
      llm.handlers.refinement = () => ({
        records: [
          { record_id: 'Smith2019-o1', location: 'Kenya, Tsavo' },
          { record_id: 'Smith2019-o9', species: 'Ghost' },
          { record_id: 'Smith2019-o2', location: null },
        ],
      });
    });

    it('only runs when requested', async () => {
      await firstRun();
      expect(llm.countFor('refinement')).toBe(0);
    });

    it('updates matched rows in place and drops unknown keys', async () => {
      await firstRun();
      const result = await processDocument(ctx, FILE, { force: force({ refine: { kind: 'all' } }) });

      expect(result.ocr).toBe('skipped');
      expect(result.refinement).toBe('completed');
      expect(result.recordsRefined).toBe(1);
      expect(store.records.size).toBe(2);

      const [first, second] = await store.getRecords(1);
      expect(first?.fields.location).toBe('Kenya, Tsavo');
      expect(first?.llm_model).toBe('refine-model');
      expect(second?.fields.location).toBe('Kenya');
      expect(second?.llm_model).toBe('extract-model');

      const document = await store.getDocument(1);
      expect(document?.refinement_status).toBe('completed');
      expect(document?.refinement_llm_model).toBe('refine-model');
    });

    it('changes nothing on a repeated pass with the same answer', async () => {
      await firstRun();
      await processDocument(ctx, FILE, { force: force({ refine: { kind: 'all' } }) });
      const again = await processDocument(ctx, FILE, { force: force({ refine: { kind: 'all' } }) });

      expect(again.refinement).toBe('completed');
      expect(again.recordsRefined).toBe(0);
    });

    it('leaves rows a reviewer edited untouched', async () => {
      await firstRun();
      await store.updateRecord(1, { human_edited: true });

      const result = await processDocument(ctx, FILE, { force: force({ refine: { kind: 'all' } }) });

      expect(result.recordsRefined).toBe(0);
      expect((await store.getRecords(1))[0]?.fields.location).toBe('Kenya');
    });

    it('is skipped for documents outside the requested ids', async () => {
      await firstRun();
      const result = await processDocument(ctx, FILE, {
        force: force({ refine: { kind: 'specific', documentIds: new Set([2]) } }),
      });

      expect(result.refinement).toBe('skipped');
      expect(llm.countFor('refinement')).toBe(0);
    });

    it('is skipped when the document has no records', async () => {
      llm.handlers.extraction = () => ({ records: [] });
      const result = await processDocument(ctx, FILE, { force: force({ refine: { kind: 'all' } }) });

      expect(result.extraction).toBe('completed');
      expect(result.refinement).toBe('skipped');
      expect(llm.countFor('refinement')).toBe(0);
    });
  });

  describe('cancellation', () => {
    it('runs no stage once the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await processDocument(ctx, FILE, {
        force: force({ refine: { kind: 'all' } }),
        signal: controller.signal,
      });

      expect(result.documentId).toBe(1);
      expect([result.ocr, result.metadata, result.extraction, result.refinement]).toEqual([
        'cancelled',
        'cancelled',
        'cancelled',
        'cancelled',
      ]);
      expect(isSuccessfulOutcome(result.ocr)).toBe(false);
      expect(llm.requests).toHaveLength(0);
      expect((await store.getDocument(1))?.ocr_status).toBeNull();
    });

    it('does not mark a stage completed when cancelled while it ran', async () => {
      const controller = new AbortController();
      const aborting: OcrProvider = {
        name: 'aborting',
        async extract(): Promise<OcrPages> {
          controller.abort();
          return { pages: ['Some text'], images: [] };
        },
      };
      ctx = createTestContext({ store, llm, ocrProviders: [aborting] });

      const result = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS, signal: controller.signal });
      const document = await store.getDocument(1);

      expect(result.ocr).toBe('cancelled');
      expect(result.metadata).toBe('cancelled');
      expect(result.extraction).toBe('cancelled');
      expect(result.refinement).toBe('skipped');
      expect(document?.ocr_status).toBeNull();
      expect(document?.document_content).toBeNull();
      expect(llm.requests).toHaveLength(0);
    });
  });

  describe('store errors outside a stage', () => {
    beforeEach(() => {
      store = new UnwritableStore(testSchema());
      ctx = createTestContext({ store, llm });
    });

    it('fails the governed stages but not an unrequested refinement', async () => {
      const result = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });

      expect(result.ocr).toBe('OCR failed: connection reset');
      expect(result.metadata).toBe('Metadata extraction failed: connection reset');
      expect(result.extraction).toBe('Extraction failed: connection reset');
      expect(result.refinement).toBe('skipped');
    });

    it('fails a requested refinement as well', async () => {
      const result = await processDocument(ctx, FILE, { force: force({ refine: { kind: 'all' } }) });

      expect(result.refinement).toBe('Refinement failed: connection reset');
    });
  });

  describe('CrossRef enrichment', () => {
    it('fills the journal the model left empty without overriding its title', async () => {
      const searches: string[] = [];
      ctx.enrichment = new CrossrefClient({
        fetchImpl: async (url) => {
          searches.push(new URL(url).searchParams.get('query.bibliographic') ?? '');
          const work = { DOI: '10.1000/bats.2019.7', title: ['Bats of the Savanna'], 'container-title': ['J. Mammal.'] };
          return new Response(JSON.stringify({ message: { items: [work] } }), { status: 200 });
        },
      });

      const result = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });

      expect(result.metadata).toBe('completed');
      expect(searches).toEqual(['Bats of the savanna Smith']);
      expect(await store.getDocument(1)).toMatchObject({
        title: 'Bats of the savanna',
        authors: '["Smith","Jones"]',
        journal: 'J. Mammal.',
        doi: '10.1000/bats.2019.7',
      });
    });

    it('still completes the metadata stage when the lookup fails', async () => {
      ctx.enrichment = new CrossrefClient({
        fetchImpl: async () => new Response('upstream down', { status: 503 }),
      });

      const result = await processDocument(ctx, FILE, { force: NO_FORCE_OPTIONS });

      expect(result.metadata).toBe('completed');
      expect((await store.getDocument(1))?.journal).toBeNull();
    });
  });

  it('reports an unreadable file as an OCR failure', async () => {
    const result = await processDocument(ctx, { path: '/nonexistent/dir/missing.pdf' }, { force: NO_FORCE_OPTIONS });

    expect(result.documentId).toBeNull();
    expect(result.ocr).toMatch(/^OCR failed: ENOENT/);
    expect(result.metadata).toBe('skipped');
    expect(store.documents.size).toBe(0);
  });
});

describe('runPipeline', () => {
  it('returns one result per file in input order', async () => {
    const store = new MockPipelineStore(testSchema());
    const llm = new RoleLlmProvider({ metadata: () => METADATA, extraction: () => EXTRACTED });
    const ctx = createTestContext({ store, llm });
    const files: PipelineFile[] = [
      { path: 'a.pdf', content: Buffer.from('first') },
      { path: 'b.pdf', content: Buffer.from('second') },
      { path: 'c.pdf', content: Buffer.from('third') },
    ];

    const results = await runPipeline(ctx, files, { force: NO_FORCE_OPTIONS, concurrency: 2 });

    expect(results.map((r) => r.file)).toEqual(['a.pdf', 'b.pdf', 'c.pdf']);
    expect(new Set(results.map((r) => r.documentId))).toEqual(new Set([1, 2, 3]));
    expect(results.every((r) => r.extraction === 'completed' && r.recordsInserted === 2)).toBe(true);
    expect(store.records.size).toBe(6);
  });
});

describe('mergeMetadata', () => {
  it('keeps stored values the model left empty', () => {
    const document = {
      ...emptyDocument(1, { file_name: 'x.pdf', file_path: 'x.pdf', file_hash: 'h', file_size: 1 }),
      title: 'Old title',
      doi: '10.1000/old',
    };

    const patch = mergeMetadata(document, {
      title: '  ',
      doi: null,
      publication_year: 2020,
      authors: ['Adams'],
      volume: 12,
    });

    expect(patch).toMatchObject({
      title: 'Old title',
      doi: '10.1000/old',
      publication_year: 2020,
      authors: '["Adams"]',
      volume: '12',
      journal: null,
    });
  });
});
