import type { DocumentPatch } from '../../db/types';
import { runOcr } from '../../ocr/ocr';
import type { PipelineContext } from '../context';

export async function runOcrStage(
  ctx: PipelineContext,
  file: Buffer,
  fileName: string
): Promise<DocumentPatch> {
  const result = await runOcr(file, fileName, ctx.ocr.providers, ctx.ocr.timeoutMs, ctx.logger);
  return {
    document_content: result.content,
    ocr_images: JSON.stringify(result.images),
    ocr_provider: result.provider,
    ocr_log: result.log.length > 0 ? JSON.stringify(result.log) : null,
  };
}
