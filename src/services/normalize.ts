/**
 * Response Normalizer
 *
 * Maps Semantic Scholar JSON and arXiv Atom XML onto the canonical records in
 * models.ts. Source keys are renamed through static tables, then the renamed
 * object is validated field by field; unknown keys are dropped and missing
 * values take the documented defaults.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { Logger } from 'pino';
import { z } from 'zod';

import type { ArxivPaper, AuthorInfo, Paper, SearchResult } from '../models.js';

/**
 * Semantic Scholar paper key -> canonical key
 */
export const PAPER_FIELD_MAP = {
  paperId: 'id',
  title: 'title',
  abstract: 'abstract',
  authors: 'authors',
  year: 'year',
  venue: 'venue',
  url: 'url',
  citationCount: 'citationCount',
  referenceCount: 'referenceCount',
  influentialCitationCount: 'influentialCitationCount',
  arxivId: 'arxivId',
  doi: 'doi',
  corpusId: 'corpusId',
  externalIds: 'externalIds',
  publicationTypes: 'publicationTypes',
  publicationDate: 'publicationDate',
  journal: 'journal',
  tldr: 'tldr',
  embedding: 'embedding'
} as const satisfies Record<string, keyof Paper>;

/**
 * Semantic Scholar author key -> canonical key
 */
export const AUTHOR_FIELD_MAP = {
  authorId: 'id',
  name: 'name',
  aliases: 'aliases',
  affiliations: 'affiliations',
  homepage: 'homepage',
  paperCount: 'paperCount',
  citationCount: 'citationCount',
  hIndex: 'hIndex'
} as const satisfies Record<string, keyof AuthorInfo>;

const nullableString = z
  .union([z.string(), z.number()])
  .nullish()
  .catch(null)
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const nullableNumber = z.number().nullish().catch(null).transform((value) => value ?? null);

const count = z.number().nullish().catch(null).transform((value) => value ?? 0);

const stringList = z
  .array(z.unknown())
  .nullish()
  .catch(null)
  .transform((values) => (values ?? []).filter((value): value is string => typeof value === 'string'));

const authorRef = z.object({
  authorId: z.union([z.string(), z.number()]).nullish(),
  name: z.string().nullish()
});

const PaperSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().min(1)),
  title: z.string().nullish().catch(null).transform((value) => value ?? ''),
  abstract: nullableString,
  authors: z
    .array(z.unknown())
    .nullish()
    .catch(null)
    .transform((values) =>
      (values ?? []).flatMap((value) => {
        const parsed = authorRef.safeParse(value);
        if (!parsed.success || !parsed.data.name) {
          return [];
        }
        const id = parsed.data.authorId;
        return [{ id: id === null || id === undefined ? null : String(id), name: parsed.data.name }];
      })
    ),
  year: nullableNumber,
  venue: nullableString.transform((value) => (value === '' ? null : value)),
  url: nullableString,
  citationCount: count,
  referenceCount: count,
  influentialCitationCount: count,
  arxivId: nullableString,
  doi: nullableString,
  corpusId: nullableString,
  externalIds: z
    .record(z.unknown())
    .nullish()
    .catch(null)
    .transform((ids) => {
      const result: Record<string, string> = {};
      for (const [key, value] of Object.entries(ids ?? {})) {
        if (typeof value === 'string' || typeof value === 'number') {
          result[key] = String(value);
        }
      }
      return result;
    }),
  publicationTypes: stringList,
  publicationDate: nullableString,
  journal: z
    .object({
      name: nullableString,
      volume: nullableString,
      pages: nullableString
    })
    .nullish()
    .catch(null)
    .transform((journal) => journal ?? null),
  tldr: z
    .object({ text: z.string().nullish() })
    .nullish()
    .catch(null)
    .transform((tldr) => tldr?.text ?? null),
  embedding: z
    .object({ model: z.string(), vector: z.array(z.number()) })
    .nullish()
    .catch(null)
    .transform((embedding) => embedding ?? null)
});

const AuthorSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().min(1)),
  name: z.string().nullish().catch(null).transform((value) => value ?? ''),
  aliases: stringList,
  affiliations: stringList,
  homepage: nullableString,
  paperCount: nullableNumber,
  citationCount: nullableNumber,
  hIndex: nullableNumber
});

const SearchEnvelopeSchema = z.object({
  total: z.number().nullish().catch(null),
  offset: z.number().nullish().catch(null),
  next: z.number().nullish().catch(null),
  data: z.array(z.unknown()).nullish().catch(null)
});

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy the keys named in `table` under their canonical names; drop the rest
 */
export function renameFields(source: Record<string, unknown>, table: Record<string, string>): Record<string, unknown> {
  const renamed: Record<string, unknown> = {};
  for (const [sourceKey, canonicalKey] of Object.entries(table)) {
    if (sourceKey in source) {
      renamed[canonicalKey] = source[sourceKey];
    }
  }
  return renamed;
}

const ARRAY_TAGS = new Set(['entry', 'author', 'link', 'category']);

const atomParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && ARRAY_TAGS.has(tagName)
});

function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') {
    return node;
  }
  if (typeof node === 'number') {
    return String(node);
  }
  if (isRecord(node)) {
    const text = node['#text'];
    if (typeof text === 'string' || typeof text === 'number') {
      return String(text);
    }
    return '';
  }
  return undefined;
}

function asList(node: unknown): unknown[] {
  if (node === undefined || node === null) {
    return [];
  }
  return Array.isArray(node) ? node : [node];
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Response normalizer for both upstream sources
 */
export class ResponseNormalizer {
  constructor(private readonly logger: Logger) {}

  /**
   * Semantic Scholar paper object -> Paper, or null without a usable paperId
   */
  paper(payload: unknown): Paper | null {
    if (!isRecord(payload)) {
      this.logger.debug({ reason: 'malformed' }, 'Paper payload is not an object');
      return null;
    }

    const parsed = PaperSchema.safeParse(renameFields(payload, PAPER_FIELD_MAP));
    if (!parsed.success) {
      this.logger.debug({ reason: 'malformed', issues: parsed.error.issues.length }, 'Dropping paper without identifier');
      return null;
    }

    const paper = parsed.data;
    const ids = paper.externalIds;
    return {
      ...paper,
      arxivId: paper.arxivId ?? ids.ArXiv ?? null,
      doi: paper.doi ?? ids.DOI ?? null,
      corpusId: paper.corpusId ?? ids.CorpusId ?? null
    };
  }

  papers(payloads: unknown[]): Paper[] {
    return payloads.flatMap((payload) => {
      const paper = this.paper(payload);
      return paper ? [paper] : [];
    });
  }

  author(payload: unknown): AuthorInfo | null {
    if (!isRecord(payload)) {
      this.logger.debug({ reason: 'malformed' }, 'Author payload is not an object');
      return null;
    }

    const parsed = AuthorSchema.safeParse(renameFields(payload, AUTHOR_FIELD_MAP));
    if (!parsed.success) {
      this.logger.debug({ reason: 'malformed' }, 'Dropping author without identifier');
      return null;
    }
    return parsed.data;
  }

  authors(payloads: unknown[]): AuthorInfo[] {
    return payloads.flatMap((payload) => {
      const author = this.author(payload);
      return author ? [author] : [];
    });
  }

  /**
   * `{ data, total, offset, next }` list envelope -> the raw entries, or null
   */
  listData(payload: unknown): unknown[] | null {
    const parsed = SearchEnvelopeSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    return parsed.data.data ?? [];
  }

  searchResult(payload: unknown): SearchResult | null {
    const parsed = SearchEnvelopeSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.debug({ reason: 'malformed' }, 'Unexpected search response shape');
      return null;
    }

    const { total, offset, next, data } = parsed.data;
    return {
      total: total ?? 0,
      offset: offset ?? 0,
      nextOffset: next ?? null,
      papers: this.papers(data ?? [])
    };
  }

  /**
   * Parsed Atom <entry> -> ArxivPaper, or null when it is not an element
   */
  arxivEntry(entry: unknown): ArxivPaper | null {
    if (!isRecord(entry)) {
      this.logger.debug({ reason: 'malformed' }, 'Skipping arXiv entry without structure');
      return null;
    }

    const rawTitle = textOf(entry.title);
    const title = rawTitle ? collapseWhitespace(rawTitle) : '';

    const authors = asList(entry.author).flatMap((author) => {
      const name = isRecord(author) ? textOf(author.name)?.trim() : undefined;
      return name ? [name] : [];
    });

    const summary = textOf(entry.summary);

    const idUrl = textOf(entry.id) ?? '';
    const id = idUrl.includes('/abs/') ? idUrl.split('/abs/').pop() ?? '' : '';

    const pdfLink = asList(entry.link).find((link) => isRecord(link) && link['@_type'] === 'application/pdf');
    const pdfUrl = isRecord(pdfLink) ? textOf(pdfLink['@_href']) ?? '' : '';

    const categories = asList(entry.category).flatMap((category) => {
      const term = isRecord(category) ? textOf(category['@_term']) : undefined;
      return term ? [term] : [];
    });

    return {
      id,
      title: title || 'Unknown Title',
      authors,
      abstract: summary ? collapseWhitespace(summary) : '',
      publishedDate: textOf(entry.published) ?? '',
      pdfUrl,
      categories
    };
  }

  /**
   * Every entry of an Atom feed; [] for malformed XML
   */
  arxivFeed(xml: string): ArxivPaper[] {
    const entries = this.atomEntries(xml);
    if (entries === null) {
      return [];
    }

    const papers = entries.flatMap((entry) => {
      const paper = this.arxivEntry(entry);
      return paper ? [paper] : [];
    });
    this.logger.debug({ count: papers.length }, 'Parsed arXiv feed');
    return papers;
  }

  /**
   * First entry of an Atom document; null for malformed XML or no entry
   */
  arxivDocument(xml: string): ArxivPaper | null {
    const entries = this.atomEntries(xml);
    if (entries === null || entries.length === 0) {
      this.logger.debug({ reason: entries === null ? 'malformed' : 'not_found' }, 'No entry in arXiv response');
      return null;
    }
    return this.arxivEntry(entries[0]);
  }

  private atomEntries(xml: string): unknown[] | null {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      this.logger.debug({ reason: 'malformed', error: validation.err.msg }, 'Error parsing arXiv XML');
      return null;
    }

    const document: unknown = atomParser.parse(xml);
    if (!isRecord(document)) {
      return null;
    }
    if (isRecord(document.feed)) {
      return asList(document.feed.entry);
    }
    // A bare <entry> document
    return asList(document.entry);
  }
}
