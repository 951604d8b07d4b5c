export function pageMarker(pageNumber: number): string {
  return `--- PAGE ${pageNumber} ---`;
}

const MARKER_PATTERN = /^\s*--- PAGE (\d+) ---\s*$/m;

/** Joins page texts, each followed by its `--- PAGE n ---` marker. */
export function joinPages(pages: string[]): string {
  return pages.map((text, i) => `${text.trim()}\n\n${pageMarker(i + 1)}`).join('\n\n');
}

/** Inverse of joinPages; text after the last marker becomes a final page. */
export function splitPages(content: string): string[] {
  const pages: string[] = [];
  let rest = content;
  let match = rest.match(MARKER_PATTERN);
  while (match && match.index !== undefined) {
    pages.push(rest.slice(0, match.index).trim());
    rest = rest.slice(match.index + match[0].length);
    match = rest.match(MARKER_PATTERN);
  }
  if (rest.trim() !== '') pages.push(rest.trim());
  return pages;
}

/**
 * Keeps everything up to and including the marker of page `n`. Content with
 * fewer pages, or without markers, is returned unchanged.
 */
export function limitToFirstPages(content: string, n: number): string {
  const marker = pageMarker(n);
  const at = content.indexOf(marker);
  if (at === -1) return content;
  return content.slice(0, at + marker.length);
}
