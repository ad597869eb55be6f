/**
 * arXiv tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { extractArxivId } from '../utils.js';
import type { ToolContext } from './index.js';
import { errorResult, guard, jsonResult } from './results.js';

export function registerArxivTools(server: McpServer, { services, logger }: ToolContext): void {
  const { arxiv } = services;

  // Tool: get_arxiv_paper
  server.registerTool(
    'get_arxiv_paper',
    {
      description: 'Fetch one arXiv paper by id ("2301.12345", "arXiv:2301.12345v2") or arxiv.org URL.',
      inputSchema: {
        arxivId: z.string().min(1).describe('arXiv id or URL')
      }
    },
    async ({ arxivId }): Promise<CallToolResult> =>
      guard(logger, 'get_arxiv_paper', 'Error fetching arXiv paper', async () => {
        const paper = await arxiv.getPaper(extractArxivId(arxivId) ?? arxivId);
        if (!paper) {
          return errorResult(`ArXiv paper "${arxivId}" not found`);
        }
        return jsonResult({ paper });
      })
  );

  // Tool: search_arxiv_papers
  server.registerTool(
    'search_arxiv_papers',
    {
      description: 'Keyword search on arXiv; every word of the query must match.',
      inputSchema: {
        query: z.string().min(1).describe('Search keywords'),
        maxResults: z.number().int().min(1).max(100).default(10).describe('Max results'),
        start: z.number().int().min(0).default(0).describe('Result offset'),
        sortBy: z.enum(['relevance', 'lastUpdatedDate', 'submittedDate']).default('relevance'),
        sortOrder: z.enum(['ascending', 'descending']).default('descending')
      }
    },
    async ({ query, maxResults, start, sortBy, sortOrder }): Promise<CallToolResult> =>
      guard(logger, 'search_arxiv_papers', 'Error searching arXiv', async () => {
        const papers = await arxiv.searchPapers(query, { maxResults, start, sortBy, sortOrder });
        return jsonResult({ query, count: papers.length, papers });
      })
  );

  // Tool: search_arxiv_by_author
  server.registerTool(
    'search_arxiv_by_author',
    {
      description: 'Newest arXiv submissions of an author.',
      inputSchema: {
        authorName: z.string().min(1).describe('Author name'),
        maxResults: z.number().int().min(1).max(100).default(10).describe('Max results')
      }
    },
    async ({ authorName, maxResults }): Promise<CallToolResult> =>
      guard(logger, 'search_arxiv_by_author', 'Error searching arXiv by author', async () => {
        const papers = await arxiv.searchByAuthor(authorName, maxResults);
        return jsonResult({ authorName, count: papers.length, papers });
      })
  );

  // Tool: search_arxiv_by_category
  server.registerTool(
    'search_arxiv_by_category',
    {
      description: 'Newest arXiv submissions in a category such as "cs.AI" or "stat.ML".',
      inputSchema: {
        category: z.string().min(1).describe('arXiv category'),
        maxResults: z.number().int().min(1).max(100).default(10).describe('Max results')
      }
    },
    async ({ category, maxResults }): Promise<CallToolResult> =>
      guard(logger, 'search_arxiv_by_category', 'Error searching arXiv by category', async () => {
        const papers = await arxiv.searchByCategory(category, maxResults);
        return jsonResult({ category, count: papers.length, papers });
      })
  );
}
