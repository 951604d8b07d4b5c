import type { DocumentPatch } from '../../db/types';
import type { CrossrefClient, CrossrefWork } from '../../ingest/crossref/client';
import { canonicalize } from '../../utils/canonicalize';
import { errorMessage, type Logger } from '../../utils/logger';

const ENRICHABLE_COLUMNS = [
  'title',
  'first_author_lastname',
  'authors',
  'publication_year',
  'doi',
  'journal',
  'volume',
  'issue',
  'pages',
  'issn',
  'publisher',
] as const;

type EnrichableColumn = (typeof ENRICHABLE_COLUMNS)[number];

export type PublicationMetadata = Pick<Required<DocumentPatch>, EnrichableColumn>;

function first(values: string[] | undefined): string | null {
  const value = values?.find((v) => v.trim() !== '');
  return value ? value.trim() : null;
}

function publicationYear(work: CrossrefWork): number | null {
  for (const date of [work['published-print'], work['published-online'], work.issued]) {
    const year = date?.['date-parts'][0]?.[0];
    if (typeof year === 'number') return year;
  }
  return null;
}

function authorName(author: NonNullable<CrossrefWork['author']>[number]): string | null {
  const parts = [author.given, author.family].filter((p): p is string => !!p && p.trim() !== '');
  if (parts.length > 0) return parts.join(' ');
  return author.name?.trim() || null;
}

function lastname(work: CrossrefWork): string | null {
  const author = work.author?.[0];
  const raw = author?.family ?? author?.given ?? null;
  const letters = raw ? raw.replace(/[^\p{L}]/gu, '') : '';
  return letters === '' ? null : letters;
}

export function workToMetadata(work: CrossrefWork): PublicationMetadata {
  const authors = (work.author ?? []).map(authorName).filter((a): a is string => a !== null);
  return {
    title: first(work.title),
    first_author_lastname: lastname(work),
    authors: authors.length > 0 ? JSON.stringify(authors) : null,
    publication_year: publicationYear(work),
    doi: work.DOI,
    journal: first(work['container-title']),
    volume: work.volume ?? null,
    issue: work.issue ?? null,
    pages: work.page ?? null,
    issn: first(work.ISSN),
    publisher: work.publisher ?? null,
  };
}

/** Values from `found` for the columns `current` leaves empty. */
export function fillMissing(current: DocumentPatch, found: PublicationMetadata): DocumentPatch {
  const patch: DocumentPatch = {};
  for (const column of ENRICHABLE_COLUMNS) {
    const value = found[column];
    if (value === null) continue;
    const existing = current[column];
    if (existing === null || existing === undefined) {
      Object.assign(patch, { [column]: value });
    }
  }
  return patch;
}

function comparableTitle(title: string): string {
  return canonicalize(title)
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

async function findWork(client: CrossrefClient, metadata: DocumentPatch): Promise<CrossrefWork | null> {
  if (metadata.doi) {
    const work = await client.getWork(metadata.doi);
    if (work) return work;
  }

  const title = metadata.title;
  const author = metadata.first_author_lastname;
  if (!title || !author) return null;

  const [best] = await client.searchWorks(`${title} ${author}`);
  const bestTitle = best ? first(best.title) : null;
  // a search hit only counts when it is the same paper
  if (!best || !bestTitle || comparableTitle(bestTitle) !== comparableTitle(title)) return null;
  return best;
}

/**
 * Looks the paper up on CrossRef, by DOI first and then by title and first
 * author, and returns values for the metadata columns still empty. A failed
 * lookup is logged and yields an empty patch.
 */
export async function enrichMetadata(
  client: CrossrefClient,
  metadata: DocumentPatch,
  logger: Logger
): Promise<DocumentPatch> {
  try {
    const work = await findWork(client, metadata);
    if (!work) {
      logger.info('No CrossRef match', { doi: metadata.doi ?? null, title: metadata.title ?? null });
      return {};
    }
    return fillMissing(metadata, workToMetadata(work));
  } catch (error) {
    logger.warn('CrossRef lookup failed', { error: errorMessage(error) });
    return {};
  }
}
