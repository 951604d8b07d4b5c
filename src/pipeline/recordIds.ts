const SEQUENCE_SUFFIX = /-o(\d+)$/;

/** `{Author}{Year}` part of a business key. */
export function recordIdPrefix(
  firstAuthorLastname: string | null | undefined,
  publicationYear: number | null | undefined
): string {
  const author = (firstAuthorLastname ?? '').replace(/[^A-Za-z]/g, '') || 'Author';
  const year = publicationYear === null || publicationYear === undefined ? 'XXXX' : String(publicationYear);
  return `${author}${year}`;
}

export function highestSequence(existingRecordIds: Iterable<string>): number {
  let highest = 0;
  for (const id of existingRecordIds) {
    const match = id.match(SEQUENCE_SUFFIX);
    if (match?.[1]) {
      highest = Math.max(highest, Number(match[1]));
    }
  }
  return highest;
}

export function formatRecordId(prefix: string, sequence: number): string {
  return `${prefix}-o${sequence}`;
}

/**
 * Business keys for `count` new records, numbered after the highest suffix
 * already used by the document so a key is never handed out twice.
 */
export function generateRecordIds(
  prefix: string,
  existingRecordIds: Iterable<string>,
  count: number
): string[] {
  const start = highestSequence(existingRecordIds);
  return Array.from({ length: count }, (_, i) => formatRecordId(prefix, start + i + 1));
}
