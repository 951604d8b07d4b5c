import fetch, { type RequestInit, type Response } from 'node-fetch';
import { z } from 'zod';
import { TimeoutError } from '../../agents/errors';
import { limit } from '../../utils/limiter';
import { withTimeout } from '../../utils/timeout';

const DateSchema = z.object({
  'date-parts': z.array(z.array(z.number().nullable())),
});

const WorkSchema = z.object({
  DOI: z.string(),
  title: z.array(z.string()).optional(),
  'container-title': z.array(z.string()).optional(),
  author: z
    .array(
      z.object({
        given: z.string().optional(),
        family: z.string().optional(),
        name: z.string().optional(),
      })
    )
    .optional(),
  'published-print': DateSchema.optional(),
  'published-online': DateSchema.optional(),
  issued: DateSchema.optional(),
  volume: z.string().optional(),
  issue: z.string().optional(),
  page: z.string().optional(),
  ISSN: z.array(z.string()).optional(),
  publisher: z.string().optional(),
});

const WorkResponseSchema = z.object({ message: WorkSchema });
const SearchResponseSchema = z.object({ message: z.object({ items: z.array(WorkSchema) }) });

export type CrossrefWork = z.infer<typeof WorkSchema>;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface CrossrefClientOptions {
  /** Contact address sent with each call (CrossRef's polite pool). */
  mailto?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class CrossrefClient {
  private baseUrl = 'https://api.crossref.org';
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: CrossrefClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private url(pathname: string, params: Record<string, string> = {}): string {
    const query = new URLSearchParams(params);
    if (this.options.mailto) query.set('mailto', this.options.mailto);
    const qs = query.toString();
    return `${this.baseUrl}${pathname}${qs ? `?${qs}` : ''}`;
  }

  private get<T>(url: string, read: (res: Response) => Promise<T>): Promise<T> {
    return limit('crossref', () =>
      withTimeout(
        this.fetchImpl(url, { headers: { Accept: 'application/json' } }).then(read),
        this.timeoutMs,
        () => new TimeoutError('CrossRef', this.timeoutMs)
      )
    );
  }

  /** The registered work for `doi`, or null when CrossRef does not know it. */
  async getWork(doi: string): Promise<CrossrefWork | null> {
    return this.get(this.url(`/works/${encodeURIComponent(doi)}`), async (res) => {
      if (res.status === 404) return null;
      if (!res.ok) throw new Error(`CrossRef getWork failed: ${res.status} ${await res.text()}`);
      return WorkResponseSchema.parse(await res.json()).message;
    });
  }

  async searchWorks(query: string, rows = 5): Promise<CrossrefWork[]> {
    return this.get(this.url('/works', { 'query.bibliographic': query, rows: String(rows) }), async (res) => {
      if (!res.ok) throw new Error(`CrossRef search failed: ${res.status} ${await res.text()}`);
      return SearchResponseSchema.parse(await res.json()).message.items;
    });
  }
}
