import type { LlmProvider } from '../agents/llmProvider';
import { TimeoutError } from '../agents/errors';
import { limit } from '../utils/limiter';
import { createConsoleLogger, errorMessage, type Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { joinPages, splitPages } from './pages';

const defaultLogger = createConsoleLogger('OCR');

export interface OcrImage {
  page: number;
  description: string;
}

export interface OcrPages {
  pages: string[];
  images: OcrImage[];
}

export interface OcrProvider {
  readonly name: string;
  extract(file: Buffer, fileName: string): Promise<OcrPages>;
}

export interface OcrOutput {
  content: string;
  images: OcrImage[];
  provider: string;
  /** One line per failed provider attempt. */
  log: string[];
}

export class OcrError extends Error {
  constructor(
    message: string,
    public readonly attempts: string[] = []
  ) {
    super(message);
    this.name = 'OcrError';
  }
}

interface PdfTextItem {
  str?: string;
  transform: number[];
}

interface PdfPageData {
  getTextContent(options?: Record<string, boolean>): Promise<{ items: PdfTextItem[] }>;
}

function pageText(items: PdfTextItem[]): string {
  let lastY: number | undefined;
  let text = '';
  for (const item of items) {
    if (item.str === undefined) continue;
    const y = item.transform[5];
    if (lastY === y || lastY === undefined) {
      text += item.str;
    } else {
      text += '\n' + item.str;
    }
    lastY = y;
  }
  return text;
}

/** Heuristic quality of a PDF text layer in [0, 1]. */
export function textLayerConfidence(pages: string[]): number {
  const text = pages.join('\n');
  const textLength = text.trim().length;
  if (textLength === 0 || pages.length === 0) return 0.0;

  let confidence = 1.0;
  const avgCharsPerPage = textLength / pages.length;
  if (avgCharsPerPage < 100) {
    confidence *= 0.5;
  } else if (avgCharsPerPage < 500) {
    confidence *= 0.7;
  }

  const whitespaceRatio = (text.match(/\s/g) || []).length / text.length;
  if (whitespaceRatio > 0.5) {
    confidence *= 0.6;
  }

  const hasManyNewlines = (text.match(/\n\n\n+/g) || []).length > pages.length * 2;
  if (hasManyNewlines) {
    confidence *= 0.7;
  }

  return Math.min(confidence, 1.0);
}

/** Reads the embedded text layer; rejects scans whose text layer looks unusable. */
export class PdfTextOcrProvider implements OcrProvider {
  readonly name = 'pdf-text';

  constructor(private readonly confidenceThreshold = 0.8) {}

  async extract(file: Buffer): Promise<OcrPages> {
    const { default: pdfParse } = await import('pdf-parse');
    const pending: Array<Promise<string>> = [];

    await pdfParse(file, {
      pagerender: (pageData: PdfPageData) => {
        pending.push(
          pageData.getTextContent({ normalizeWhitespace: true }).then((content) => pageText(content.items))
        );
        return '';
      },
    });

    const pages = await Promise.all(pending);
    const confidence = textLayerConfidence(pages);
    if (confidence < this.confidenceThreshold) {
      throw new OcrError(
        `text layer confidence ${confidence.toFixed(2)} is below ${this.confidenceThreshold}`
      );
    }
    return { pages, images: [] };
  }
}

const GEMINI_OCR_PROMPT = `Transcribe this PDF to Markdown.

- Keep headings, paragraphs, lists and tables (as Markdown tables).
- After the content of each page write a line "--- PAGE n ---" where n is the page number starting at 1.
- For each figure write a line "[Figure: short description]" where it appears.
- Output only the transcription.`;

/** Sends the PDF inline to a multimodal model. */
export class GeminiOcrProvider implements OcrProvider {
  readonly name = 'gemini';

  constructor(
    private readonly provider: LlmProvider,
    private readonly model: string,
    private readonly maxOutputTokens = 65536
  ) {}

  async extract(file: Buffer): Promise<OcrPages> {
    const response = await this.provider.generate({
      model: this.model,
      prompt: GEMINI_OCR_PROMPT,
      maxOutputTokens: this.maxOutputTokens,
      temperature: 0.0,
      json: false,
      attachments: [{ mimeType: 'application/pdf', data: file.toString('base64') }],
    });

    if (response.blockReason) {
      throw new OcrError(`${this.model} refused the document (${response.blockReason})`);
    }

    const pages = splitPages(response.text);
    const images: OcrImage[] = [];
    pages.forEach((text, i) => {
      for (const match of text.matchAll(/\[Figure:\s*([^\]]+)\]/g)) {
        const description = match[1];
        if (description) images.push({ page: i + 1, description: description.trim() });
      }
    });
    return { pages, images };
  }
}

/**
 * Tries each provider in order and returns the first non-empty transcription.
 * Every failed attempt is logged and kept for the document's OCR log.
 */
export async function runOcr(
  file: Buffer,
  fileName: string,
  providers: readonly OcrProvider[],
  timeoutMs: number,
  logger: Logger = defaultLogger
): Promise<OcrOutput> {
  const log: string[] = [];

  for (const provider of providers) {
    try {
      const result = await limit('ocr', () =>
        withTimeout(provider.extract(file, fileName), timeoutMs, () => new TimeoutError(`OCR (${provider.name})`, timeoutMs))
      );
      const content = joinPages(result.pages);
      if (result.pages.every((p) => p.trim() === '')) {
        throw new OcrError('provider returned no text');
      }
      logger.info(`${fileName}: ${result.pages.length} page(s) via ${provider.name}`);
      return { content, images: result.images, provider: provider.name, log };
    } catch (error) {
      const line = `${new Date().toISOString()} ${provider.name}: ${errorMessage(error)}`;
      log.push(line);
      logger.warn(`${fileName}: ${provider.name} failed`, { error: errorMessage(error) });
    }
  }

  throw new OcrError(
    providers.length === 0 ? 'no OCR providers configured' : `all OCR providers failed (${log.join('; ')})`,
    log
  );
}
