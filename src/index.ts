#!/usr/bin/env node
import 'dotenv/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationError } from './agents/errors';
import { loadPipelineConfig } from './config/pipelineConfig';
import { createPipelineContext } from './pipeline/createContext';
import { parseForceDirective } from './pipeline/forceDirective';
import { runPipeline, type PipelineFile } from './pipeline/runPipeline';
import { isSuccessfulOutcome } from './pipeline/status';
import type { ForceOptions, PipelineResult } from './pipeline/types';
import { loadRecordSchema } from './schema/recordSchema';
import { errorMessage } from './utils/logger';

const USAGE = [
  'Usage: npm run dev -- <pdf-or-directory> [options]',
  '',
  'Options:',
  '  --force-ocr[=all|id,id]         re-run OCR',
  '  --force-metadata[=all|id,id]    re-run metadata extraction',
  '  --force-extraction[=all|id,id]  re-run record extraction',
  '  --refine[=all|id,id]            run the refinement pass',
  '  --concurrency=<n>               documents processed in parallel',
].join('\n');

export interface CliArguments {
  input: string;
  force: ForceOptions;
  concurrency?: number;
}

const FORCE_FLAGS = {
  '--force-ocr': 'ocr',
  '--force-metadata': 'metadata',
  '--force-extraction': 'extraction',
  '--refine': 'refine',
} as const satisfies Record<string, keyof ForceOptions>;

function isForceFlag(flag: string): flag is keyof typeof FORCE_FLAGS {
  return Object.prototype.hasOwnProperty.call(FORCE_FLAGS, flag);
}

/** A bare flag means every document; `--flag=3,7` names documents by id. */
export function parseCliArguments(argv: string[]): CliArguments {
  const raw: Partial<Record<keyof ForceOptions, unknown>> = {};
  let input: string | undefined;
  let concurrency: number | undefined;

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      if (input !== undefined) {
        throw new ConfigurationError(`Unexpected argument: ${arg}`);
      }
      input = arg;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? undefined : arg.slice(eq + 1);

    if (flag === '--concurrency') {
      concurrency = Number(value);
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigurationError(`--concurrency must be a positive integer, got "${value ?? ''}"`);
      }
    } else if (isForceFlag(flag)) {
      raw[FORCE_FLAGS[flag]] = value ?? true;
    } else {
      throw new ConfigurationError(`Unknown option: ${flag}`);
    }
  }

  if (input === undefined) {
    throw new ConfigurationError('No PDF file or directory given');
  }

  return {
    input,
    concurrency,
    force: {
      ocr: parseForceDirective(raw.ocr, '--force-ocr'),
      metadata: parseForceDirective(raw.metadata, '--force-metadata'),
      extraction: parseForceDirective(raw.extraction, '--force-extraction'),
      refine: parseForceDirective(raw.refine, '--refine'),
    },
  };
}

/** A single PDF, or every PDF directly inside a directory, sorted by name. */
export async function collectPdfFiles(input: string): Promise<PipelineFile[]> {
  const stat = await fs.stat(input);
  if (stat.isFile()) {
    return [{ path: input }];
  }

  const entries = await fs.readdir(input, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({ path: path.join(input, name) }));
}

export function formatResults(results: PipelineResult[]): string {
  const lines = results.map((r) =>
    [
      `${path.basename(r.file)} (document ${r.documentId ?? '-'})`,
      `  ocr:        ${r.ocr}`,
      `  metadata:   ${r.metadata}`,
      `  extraction: ${r.extraction} (+${r.recordsInserted} records, ${r.duplicatesRemoved} duplicates)`,
      `  refinement: ${r.refinement}${r.recordsRefined > 0 ? ` (${r.recordsRefined} records updated)` : ''}`,
    ].join('\n')
  );
  return lines.join('\n\n');
}

/** True when every stage of every document completed or was skipped. */
export function allSucceeded(results: PipelineResult[]): boolean {
  return results.every((r) => [r.ocr, r.metadata, r.extraction, r.refinement].every(isSuccessfulOutcome));
}

async function main(): Promise<void> {
  let args: CliArguments;
  try {
    args = parseCliArguments(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    process.exit(1);
  }

  try {
    const config = loadPipelineConfig();
    const schema = await loadRecordSchema(config.schemaFile);
    const ctx = createPipelineContext(config, schema);

    const files = await collectPdfFiles(args.input);
    if (files.length === 0) {
      console.error(`No PDF files found in ${args.input}`);
      process.exit(1);
    }

    const controller = new AbortController();
    process.once('SIGINT', () => {
      console.error('Interrupted; stopping after the current stage, whose result is discarded');
      controller.abort();
    });

    const results = await runPipeline(ctx, files, {
      force: args.force,
      signal: controller.signal,
      concurrency: args.concurrency ?? config.concurrency,
    });

    console.log(formatResults(results));
    const stats = await ctx.store.getStats();
    console.log(
      `\nDatabase: ${stats.documents} documents, ${stats.records} records, ${stats.reviewedDocuments} reviewed`
    );
    if (!allSucceeded(results)) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error('Fatal error:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export { runPipeline, processDocument } from './pipeline/runPipeline';
export { createPipelineContext } from './pipeline/createContext';
export { loadPipelineConfig } from './config/pipelineConfig';
export { loadRecordSchema, parseRecordSchema } from './schema/recordSchema';
export { deduplicate } from './dedup/deduplicate';
export { calculateAccuracy } from './review/accuracy';
export { saveReview } from './review/saveReview';
export { createDatabaseClient } from './db/client';
export * from './pipeline/types';
