/**
 * Semantic Scholar API Service
 *
 * Graph API and recommendations API client. Every operation is throttled,
 * retried on 429 and normalized; failures come back as null or empty results.
 */

import type { Logger } from 'pino';

import {
  AUTHOR_FIELDS,
  CITATION_FIELDS,
  PAPER_FIELDS,
  getApiHeaders,
  type SemanticScholarConfig
} from '../config.js';
import {
  emptySearchResult,
  type AuthorInfo,
  type AuthorPapers,
  type CitationAnalysis,
  type Paper,
  type PaperEmbedding,
  type SearchResult
} from '../models.js';
import { chunkList } from '../utils.js';
import { RateLimitedClient, type ServiceOverrides } from './httpClient.js';
import { isRecord, ResponseNormalizer } from './normalize.js';

export interface PageOptions {
  limit?: number;
  offset?: number;
  fields?: readonly string[];
}

export interface PaperSearchOptions extends PageOptions {
  /** Single year or range, e.g. "2023" or "2019-2023" */
  year?: string;
  venue?: string[];
  fieldsOfStudy?: string[];
  publicationTypes?: string[];
  minCitationCount?: number;
}

const RELATED_PAPERS_LIMIT = 1000;
const DEFAULT_LIST_LIMIT = 100;
const TOP_RECOMMENDATIONS = 10;

function joinFields(fields: readonly string[]): string {
  return fields.join(',');
}

/**
 * Semantic Scholar API Service
 */
export class SemanticScholarService {
  private readonly client: RateLimitedClient;
  private readonly normalizer: ResponseNormalizer;
  private readonly logger: Logger;

  constructor(
    private readonly config: SemanticScholarConfig,
    logger: Logger,
    overrides: ServiceOverrides = {}
  ) {
    this.logger = logger.child({ component: 'semantic-scholar' });
    this.normalizer = new ResponseNormalizer(this.logger);
    this.client = new RateLimitedClient(
      {
        ...config,
        name: 'semantic-scholar',
        baseURL: config.baseUrl,
        headers: getApiHeaders(config),
        adapter: overrides.adapter,
        sleep: overrides.sleep
      },
      this.logger
    );
  }

  get hasApiKey(): boolean {
    return Boolean(this.config.apiKey);
  }

  /**
   * Paper by any supported identifier (S2 id, "arXiv:<id>", "DOI:<doi>", ...)
   */
  async getPaper(paperId: string, fields: readonly string[] = PAPER_FIELDS): Promise<Paper | null> {
    this.logger.debug({ paperId }, 'Fetching paper details');

    const outcome = await this.client.request('getPaper', {
      method: 'GET',
      url: `/paper/${encodeURIComponent(paperId)}`,
      params: { fields: joinFields(fields) }
    });
    return outcome.ok ? this.normalizer.paper(outcome.data) : null;
  }

  async getPaperAuthors(paperId: string, fields: readonly string[] = AUTHOR_FIELDS): Promise<AuthorInfo[]> {
    this.logger.debug({ paperId }, 'Fetching paper authors');

    const outcome = await this.client.request('getPaperAuthors', {
      method: 'GET',
      url: `/paper/${encodeURIComponent(paperId)}/authors`,
      params: { fields: joinFields(fields) }
    });
    if (!outcome.ok) {
      return [];
    }
    return this.normalizer.authors(this.normalizer.listData(outcome.data) ?? []);
  }

  /**
   * Papers citing `paperId`
   */
  async getPaperCitations(paperId: string, options: PageOptions = {}): Promise<Paper[]> {
    return this.relatedPapers(paperId, 'citations', 'citingPaper', options);
  }

  /**
   * Papers cited by `paperId`
   */
  async getPaperReferences(paperId: string, options: PageOptions = {}): Promise<Paper[]> {
    return this.relatedPapers(paperId, 'references', 'citedPaper', options);
  }

  /**
   * Relevance search with optional filters
   */
  async searchPapers(query: string, options: PaperSearchOptions = {}): Promise<SearchResult> {
    const {
      fields = PAPER_FIELDS,
      limit = this.config.maxSearchResults,
      offset = 0,
      year,
      venue,
      fieldsOfStudy,
      publicationTypes,
      minCitationCount
    } = options;

    this.logger.debug({ query }, 'Searching papers');

    const params: Record<string, string | number> = {
      query,
      limit: Math.min(limit, this.config.maxSearchResults),
      offset,
      fields: joinFields(fields)
    };
    if (year) params.year = year;
    if (venue?.length) params.venue = venue.join(',');
    if (fieldsOfStudy?.length) params.fieldsOfStudy = fieldsOfStudy.join(',');
    if (publicationTypes?.length) params.publicationTypes = publicationTypes.join(',');
    if (minCitationCount !== undefined) params.minCitationCount = minCitationCount;

    const outcome = await this.client.request('searchPapers', {
      method: 'GET',
      url: '/paper/search',
      params
    });
    if (!outcome.ok) {
      return emptySearchResult();
    }
    return this.normalizer.searchResult(outcome.data) ?? emptySearchResult();
  }

  /**
   * Search restricted to one field of study; the field doubles as the query
   * when none is given
   */
  async searchPapersByField(
    fieldOfStudy: string,
    query?: string,
    options: Omit<PaperSearchOptions, 'fieldsOfStudy'> = {}
  ): Promise<SearchResult> {
    return this.searchPapers(query?.trim() || fieldOfStudy, { ...options, fieldsOfStudy: [fieldOfStudy] });
  }

  /**
   * Many papers through POST /paper/batch, in chunks of the upstream ceiling.
   * Unknown ids and failed chunks are omitted.
   */
  async getPapersBulk(paperIds: readonly string[], fields: readonly string[] = PAPER_FIELDS): Promise<Paper[]> {
    const chunks = chunkList(paperIds, this.config.batchSize);
    this.logger.debug({ total: paperIds.length, chunks: chunks.length }, 'Fetching papers in bulk');

    const papers: Paper[] = [];
    for (const [index, ids] of chunks.entries()) {
      const outcome = await this.client.request('getPapersBulk', {
        method: 'POST',
        url: '/paper/batch',
        params: { fields: joinFields(fields) },
        data: { ids, fields }
      });

      if (!outcome.ok) {
        this.logger.warn({ chunk: index + 1, reason: outcome.reason }, 'Skipping failed batch chunk');
        continue;
      }
      if (!Array.isArray(outcome.data)) {
        this.logger.warn({ chunk: index + 1, reason: 'malformed' }, 'Batch response is not an array');
        continue;
      }

      const slots: unknown[] = outcome.data;
      const found = slots.filter((slot) => slot !== null);
      papers.push(...this.normalizer.papers(found));
      this.logger.debug(
        { chunk: index + 1, requested: ids.length, found: found.length },
        'Processed batch chunk'
      );
    }

    this.logger.debug({ count: papers.length }, 'Bulk fetch complete');
    return papers;
  }

  async getAuthor(authorId: string, fields: readonly string[] = AUTHOR_FIELDS): Promise<AuthorInfo | null> {
    this.logger.debug({ authorId }, 'Fetching author details');

    const outcome = await this.client.request('getAuthor', {
      method: 'GET',
      url: `/author/${encodeURIComponent(authorId)}`,
      params: { fields: joinFields(fields) }
    });
    return outcome.ok ? this.normalizer.author(outcome.data) : null;
  }

  async getAuthorPapers(authorId: string, options: PageOptions = {}): Promise<Paper[]> {
    const { fields = PAPER_FIELDS, limit = DEFAULT_LIST_LIMIT, offset = 0 } = options;
    this.logger.debug({ authorId }, 'Fetching author papers');

    const outcome = await this.client.request('getAuthorPapers', {
      method: 'GET',
      url: `/author/${encodeURIComponent(authorId)}/papers`,
      params: { fields: joinFields(fields), limit, offset }
    });
    if (!outcome.ok) {
      return [];
    }
    return this.normalizer.papers(this.normalizer.listData(outcome.data) ?? []);
  }

  async searchAuthors(query: string, options: PageOptions = {}): Promise<AuthorInfo[]> {
    const { fields = AUTHOR_FIELDS, limit = DEFAULT_LIST_LIMIT, offset = 0 } = options;
    this.logger.debug({ query }, 'Searching authors');

    const outcome = await this.client.request('searchAuthors', {
      method: 'GET',
      url: '/author/search',
      params: { query, fields: joinFields(fields), limit, offset }
    });
    if (!outcome.ok) {
      return [];
    }
    return this.normalizer.authors(this.normalizer.listData(outcome.data) ?? []);
  }

  /**
   * Best author match for `authorName` and their papers; null when no author
   * matches
   */
  async searchPapersByAuthor(authorName: string, limit = DEFAULT_LIST_LIMIT): Promise<AuthorPapers | null> {
    const [author] = await this.searchAuthors(authorName, { limit: 1 });
    if (!author) {
      this.logger.debug({ authorName, reason: 'not_found' }, 'No author matched');
      return null;
    }

    const papers = await this.getAuthorPapers(author.id, { limit });
    return { author, papers };
  }

  async getPaperRecommendations(
    paperId: string,
    limit = DEFAULT_LIST_LIMIT,
    fields: readonly string[] = PAPER_FIELDS
  ): Promise<Paper[]> {
    this.logger.debug({ paperId }, 'Fetching recommendations');

    const outcome = await this.client.request('getPaperRecommendations', {
      method: 'GET',
      url: `${this.config.recommendationsUrl}/papers/forpaper/${encodeURIComponent(paperId)}`,
      params: { fields: joinFields(fields), limit }
    });
    if (!outcome.ok) {
      return [];
    }

    const recommended = isRecord(outcome.data) ? outcome.data.recommendedPapers : undefined;
    if (!Array.isArray(recommended)) {
      this.logger.debug({ paperId, reason: 'malformed' }, 'Recommendations response without list');
      return [];
    }
    return this.normalizer.papers(recommended);
  }

  /**
   * SPECTER embedding of a paper, when Semantic Scholar has one
   */
  async getPaperEmbedding(paperId: string): Promise<PaperEmbedding | null> {
    const paper = await this.getPaper(paperId, ['paperId', 'embedding']);
    return paper?.embedding ?? null;
  }

  /**
   * Paper, its citations, references and top recommendations in one record
   */
  async analyzePaperCitations(paperId: string): Promise<CitationAnalysis | null> {
    this.logger.debug({ paperId }, 'Starting citation analysis');

    const mainPaper = await this.getPaper(paperId);
    if (!mainPaper) {
      return null;
    }

    const citingPapers = await this.getPaperCitations(paperId);
    const referencedPapers = await this.getPaperReferences(paperId);
    const recommendations = await this.getPaperRecommendations(paperId);

    this.logger.debug(
      { paperId, citations: citingPapers.length, references: referencedPapers.length },
      'Citation analysis complete'
    );

    return {
      mainPaper,
      citingPapers,
      referencedPapers,
      totalCitations: citingPapers.length,
      totalReferences: referencedPapers.length,
      recommendations: recommendations.slice(0, TOP_RECOMMENDATIONS),
      analyzedAt: new Date().toISOString()
    };
  }

  private async relatedPapers(
    paperId: string,
    edge: 'citations' | 'references',
    key: 'citingPaper' | 'citedPaper',
    options: PageOptions
  ): Promise<Paper[]> {
    const { fields = CITATION_FIELDS, limit = RELATED_PAPERS_LIMIT, offset = 0 } = options;
    this.logger.debug({ paperId, edge }, 'Fetching related papers');

    const outcome = await this.client.request(edge, {
      method: 'GET',
      url: `/paper/${encodeURIComponent(paperId)}/${edge}`,
      params: { fields: joinFields(fields), limit, offset }
    });
    if (!outcome.ok) {
      return [];
    }

    const rows = this.normalizer.listData(outcome.data) ?? [];
    return this.normalizer.papers(rows.map((row) => (isRecord(row) ? row[key] : undefined)));
  }
}
