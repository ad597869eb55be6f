/**
 * Canonical records produced by the response normalizers.
 *
 * Every key is always present; absent upstream values become `null`, `0`,
 * `""` or an empty list/object, so records survive a JSON round trip intact.
 */

export interface PaperAuthor {
  id: string | null;
  name: string;
}

export interface Journal {
  name: string | null;
  volume: string | null;
  pages: string | null;
}

export interface PaperEmbedding {
  model: string;
  vector: number[];
}

/**
 * Semantic Scholar paper
 */
export interface Paper {
  id: string;
  title: string;
  abstract: string | null;
  authors: PaperAuthor[];
  year: number | null;
  venue: string | null;
  url: string | null;
  citationCount: number;
  referenceCount: number;
  influentialCitationCount: number;
  arxivId: string | null;
  doi: string | null;
  corpusId: string | null;
  externalIds: Record<string, string>;
  publicationTypes: string[];
  publicationDate: string | null;
  journal: Journal | null;
  tldr: string | null;
  embedding: PaperEmbedding | null;
}

/**
 * Semantic Scholar author
 */
export interface AuthorInfo {
  id: string;
  name: string;
  aliases: string[];
  affiliations: string[];
  homepage: string | null;
  paperCount: number | null;
  citationCount: number | null;
  hIndex: number | null;
}

/**
 * arXiv preprint, straight from an Atom entry
 */
export interface ArxivPaper {
  /** Path suffix after /abs/, version included (e.g. "2301.12345v1") */
  id: string;
  title: string;
  authors: string[];
  abstract: string;
  publishedDate: string;
  pdfUrl: string;
  categories: string[];
}

export interface SearchResult {
  total: number;
  offset: number;
  nextOffset: number | null;
  papers: Paper[];
}

export interface AuthorPapers {
  author: AuthorInfo;
  papers: Paper[];
}

export interface CitationAnalysis {
  mainPaper: Paper;
  citingPapers: Paper[];
  referencedPapers: Paper[];
  totalCitations: number;
  totalReferences: number;
  recommendations: Paper[];
  analyzedAt: string;
}

export function emptySearchResult(offset = 0): SearchResult {
  return { total: 0, offset, nextOffset: null, papers: [] };
}
