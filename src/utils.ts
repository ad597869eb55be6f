/**
 * Small helpers shared by services and tools
 */

import type { PaperAuthor } from './models.js';

const ARXIV_ID_PATTERN = '(\\d{4}\\.\\d{4,5}(?:v\\d+)?|[a-z-]+(?:\\.[A-Z]{2})?/\\d{7}(?:v\\d+)?)';

/**
 * Split a list into consecutive chunks of at most `size` items
 */
export function chunkList<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) {
    throw new RangeError(`Chunk size must be positive, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Replace characters that are invalid in file names
 */
export function sanitizeFilename(filename: string): string {
  return filename.replace(/[<>:"/\\|?*]/g, '_').trim();
}

/**
 * arXiv id from an arxiv.org URL or a bare id; null when neither matches
 *
 * @example
 * extractArxivId('https://arxiv.org/abs/2301.12345v2') // '2301.12345v2'
 * extractArxivId('hep-th/9901001') // 'hep-th/9901001'
 */
export function extractArxivId(urlOrId: string): string | null {
  const candidate = urlOrId.trim();

  if (candidate.includes('arxiv.org')) {
    const match = candidate.match(new RegExp(ARXIV_ID_PATTERN));
    return match ? match[1] : null;
  }

  const bare = candidate.replace(/^arxiv:/i, '');
  return new RegExp(`^${ARXIV_ID_PATTERN}$`).test(bare) ? bare : null;
}

/**
 * "A, B, C" for up to three authors, "A, B, C, et al." beyond that
 */
export function formatAuthors(authors: ReadonlyArray<PaperAuthor | string>): string {
  const names = authors
    .map((author) => (typeof author === 'string' ? author : author.name))
    .filter((name) => name.length > 0);

  if (names.length === 0) {
    return 'Unknown';
  }
  if (names.length <= 3) {
    return names.join(', ');
  }
  return `${names.slice(0, 3).join(', ')}, et al.`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Local time as "YYYYMMDD_HHMMSS", for file names
 */
export function fileTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Identifier in a form the Semantic Scholar paper endpoints accept: arXiv ids
 * and arxiv.org URLs become "ARXIV:<id>", other URLs "URL:<url>"; prefixed ids
 * (DOI:, CorpusId:, ...) and bare S2 ids pass through.
 */
export function toSemanticScholarId(identifier: string): string {
  const trimmed = identifier.trim();
  const isUrl = /^https?:\/\//i.test(trimmed);

  if (!isUrl && /^[A-Za-z]+:/.test(trimmed)) {
    return trimmed;
  }

  const arxivId = extractArxivId(trimmed);
  if (arxivId) {
    return `ARXIV:${arxivId.replace(/v\d+$/, '')}`;
  }
  return isUrl ? `URL:${trimmed}` : trimmed;
}
