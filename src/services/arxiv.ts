/**
 * arXiv API Service
 *
 * Atom feed queries against export.arxiv.org. Shares the request discipline
 * of the Semantic Scholar client but has its own limiter.
 */

import type { Logger } from 'pino';

import type { ArxivConfig } from '../config.js';
import type { ArxivPaper } from '../models.js';
import { RateLimitedClient, type ServiceOverrides } from './httpClient.js';
import { ResponseNormalizer } from './normalize.js';

export type ArxivSortBy = 'relevance' | 'lastUpdatedDate' | 'submittedDate';
export type ArxivSortOrder = 'ascending' | 'descending';

export interface ArxivSearchOptions {
  maxResults?: number;
  start?: number;
  sortBy?: ArxivSortBy;
  sortOrder?: ArxivSortOrder;
}

const DEFAULT_MAX_RESULTS = 10;

/**
 * Strip an "arXiv:" prefix and surrounding whitespace
 */
export function cleanArxivId(arxivId: string): string {
  return arxivId.trim().replace(/^arxiv:/i, '').trim();
}

export class ArxivService {
  private readonly client: RateLimitedClient;
  private readonly normalizer: ResponseNormalizer;
  private readonly logger: Logger;

  constructor(config: ArxivConfig, logger: Logger, overrides: ServiceOverrides = {}) {
    this.logger = logger.child({ component: 'arxiv' });
    this.normalizer = new ResponseNormalizer(this.logger);
    this.client = new RateLimitedClient(
      {
        ...config,
        name: 'arxiv',
        baseURL: config.baseUrl,
        headers: { Accept: 'application/atom+xml' },
        adapter: overrides.adapter,
        sleep: overrides.sleep
      },
      this.logger
    );
  }

  /**
   * Single preprint by id; null when arXiv has no such entry
   */
  async getPaper(arxivId: string): Promise<ArxivPaper | null> {
    const id = cleanArxivId(arxivId);
    this.logger.debug({ arxivId: id }, 'Fetching arXiv paper');

    const xml = await this.fetchFeed('getPaper', { id_list: id });
    if (xml === null) {
      return null;
    }

    const paper = this.normalizer.arxivDocument(xml);
    // Unknown ids come back as an error entry without an /abs/ link
    if (paper && paper.id === '') {
      this.logger.debug({ arxivId: id, reason: 'not_found' }, 'arXiv returned an entry without identifier');
      return null;
    }
    return paper;
  }

  /**
   * Keyword search; every word of `query` must match
   */
  async searchPapers(query: string, options: ArxivSearchOptions = {}): Promise<ArxivPaper[]> {
    const terms = query.trim().split(/\s+/).filter(Boolean);
    if (terms.length === 0) {
      return [];
    }
    this.logger.debug({ query }, 'Searching arXiv');
    return this.search('searchPapers', `all:${terms.join(' AND ')}`, options);
  }

  /**
   * Newest submissions by an author
   */
  async searchByAuthor(authorName: string, maxResults = DEFAULT_MAX_RESULTS): Promise<ArxivPaper[]> {
    this.logger.debug({ authorName }, 'Searching arXiv by author');
    return this.search('searchByAuthor', `au:${authorName.trim()}`, {
      maxResults,
      sortBy: 'submittedDate',
      sortOrder: 'descending'
    });
  }

  /**
   * Newest submissions in a category such as "cs.AI"
   */
  async searchByCategory(category: string, maxResults = DEFAULT_MAX_RESULTS): Promise<ArxivPaper[]> {
    this.logger.debug({ category }, 'Searching arXiv by category');
    return this.search('searchByCategory', `cat:${category.trim()}`, {
      maxResults,
      sortBy: 'submittedDate',
      sortOrder: 'descending'
    });
  }

  private async search(operation: string, searchQuery: string, options: ArxivSearchOptions): Promise<ArxivPaper[]> {
    const {
      maxResults = DEFAULT_MAX_RESULTS,
      start = 0,
      sortBy = 'relevance',
      sortOrder = 'descending'
    } = options;

    const xml = await this.fetchFeed(operation, {
      search_query: searchQuery,
      start,
      max_results: maxResults,
      sortBy,
      sortOrder
    });
    return xml === null ? [] : this.normalizer.arxivFeed(xml);
  }

  private async fetchFeed(operation: string, params: Record<string, string | number>): Promise<string | null> {
    const outcome = await this.client.request(operation, {
      method: 'GET',
      params,
      responseType: 'text'
    });
    if (!outcome.ok) {
      return null;
    }
    if (typeof outcome.data !== 'string') {
      this.logger.debug({ operation, reason: 'malformed' }, 'arXiv response body is not text');
      return null;
    }
    return outcome.data;
  }
}
