/**
 * Semantic Scholar tools: search, details, citations, recommendations
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { sanitizeFilename, toSemanticScholarId } from '../utils.js';
import type { ToolContext } from './index.js';
import { errorResult, guard, jsonResult } from './results.js';

export function registerPaperTools(server: McpServer, { services, logger }: ToolContext): void {
  const { semanticScholar, papers } = services;

  // Tool: analyze_paper_citations
  server.registerTool(
    'analyze_paper_citations',
    {
      description:
        'Citation analysis for a paper: the paper itself, papers citing it, papers it references and the top 10 recommendations. The analysis is also saved as a JSON snapshot.',
      inputSchema: {
        paperIdentifier: z.string().min(1).describe('arXiv id or URL, DOI:<doi>, or Semantic Scholar paper id')
      }
    },
    async ({ paperIdentifier }): Promise<CallToolResult> =>
      guard(logger, 'analyze_paper_citations', 'Error analyzing citations', async () => {
        const paperId = toSemanticScholarId(paperIdentifier);
        const analysis = await semanticScholar.analyzePaperCitations(paperId);
        if (!analysis) {
          return errorResult(`Paper ${paperIdentifier} not found`);
        }

        const savedTo = await papers.saveJson(analysis, `citation_analysis_${sanitizeFilename(paperId)}.json`);
        return jsonResult({ ...analysis, savedTo });
      })
  );

  // Tool: search_papers_by_keywords
  server.registerTool(
    'search_papers_by_keywords',
    {
      description: 'Search Semantic Scholar by keywords, optionally filtered by year, venue and minimum citation count.',
      inputSchema: {
        query: z.string().min(1).describe('Search query (e.g. "graph neural networks")'),
        maxResults: z.number().int().min(1).max(100).default(20).describe('Max results'),
        offset: z.number().int().min(0).default(0).describe('Result offset for paging'),
        year: z.string().optional().describe('Year or range: "2023" or "2020-2023"'),
        venue: z.array(z.string()).optional().describe('Venue names to filter by'),
        minCitationCount: z.number().int().min(0).optional().describe('Minimum citation count')
      }
    },
    async ({ query, maxResults, offset, year, venue, minCitationCount }): Promise<CallToolResult> =>
      guard(logger, 'search_papers_by_keywords', 'Error searching papers', async () => {
        const result = await semanticScholar.searchPapers(query, {
          limit: maxResults,
          offset,
          year,
          venue,
          minCitationCount
        });
        return jsonResult({
          totalFound: result.total,
          returnedCount: result.papers.length,
          papers: result.papers,
          nextOffset: result.nextOffset
        });
      })
  );

  // Tool: search_papers_by_author
  server.registerTool(
    'search_papers_by_author',
    {
      description:
        'Papers of an author. Looks up the best matching author by name, or uses the Semantic Scholar author id when given.',
      inputSchema: {
        authorName: z.string().min(1).describe('Author name to search for'),
        authorId: z.string().optional().describe('Semantic Scholar author id; skips the name lookup'),
        maxResults: z.number().int().min(1).max(1000).default(20).describe('Max papers')
      }
    },
    async ({ authorName, authorId, maxResults }): Promise<CallToolResult> =>
      guard(logger, 'search_papers_by_author', 'Error searching papers by author', async () => {
        if (authorId) {
          const author = await semanticScholar.getAuthor(authorId);
          if (!author) {
            return errorResult(`Author "${authorId}" not found`);
          }
          const authorPapers = await semanticScholar.getAuthorPapers(author.id, { limit: maxResults });
          return jsonResult({ author, paperCount: authorPapers.length, papers: authorPapers });
        }

        const found = await semanticScholar.searchPapersByAuthor(authorName, maxResults);
        if (!found) {
          return errorResult(`Author "${authorName}" not found`);
        }
        return jsonResult({ author: found.author, paperCount: found.papers.length, papers: found.papers });
      })
  );

  // Tool: search_papers_by_field
  server.registerTool(
    'search_papers_by_field',
    {
      description: 'Search papers within one field of study (e.g. "Computer Science", "Medicine").',
      inputSchema: {
        fieldOfStudy: z.string().min(1).describe('Field of study'),
        query: z.string().optional().describe('Keywords; defaults to the field name'),
        maxResults: z.number().int().min(1).max(100).default(20).describe('Max results'),
        year: z.string().optional().describe('Year or range: "2023" or "2020-2023"')
      }
    },
    async ({ fieldOfStudy, query, maxResults, year }): Promise<CallToolResult> =>
      guard(logger, 'search_papers_by_field', 'Error searching papers by field', async () => {
        const result = await semanticScholar.searchPapersByField(fieldOfStudy, query, { limit: maxResults, year });
        return jsonResult({
          fieldOfStudy,
          totalFound: result.total,
          returnedCount: result.papers.length,
          papers: result.papers,
          nextOffset: result.nextOffset
        });
      })
  );

  // Tool: get_paper_details
  server.registerTool(
    'get_paper_details',
    {
      description: 'Details of one paper, optionally with its authors, citations, references, recommendations and embedding.',
      inputSchema: {
        paperId: z.string().min(1).describe('arXiv id or URL, DOI:<doi>, or Semantic Scholar paper id'),
        includeAuthors: z.boolean().default(false).describe('Include full author records'),
        includeCitations: z.boolean().default(false).describe('Include papers citing this paper'),
        includeReferences: z.boolean().default(false).describe('Include papers this paper references'),
        includeRecommendations: z.boolean().default(false).describe('Include recommended similar papers'),
        includeEmbedding: z.boolean().default(false).describe('Include the SPECTER embedding vector')
      }
    },
    async (args): Promise<CallToolResult> =>
      guard(logger, 'get_paper_details', 'Error getting paper details', async () => {
        const paperId = toSemanticScholarId(args.paperId);
        const paper = await semanticScholar.getPaper(paperId);
        if (!paper) {
          return errorResult(`Paper "${args.paperId}" not found`);
        }

        const result: Record<string, unknown> = { paper };
        if (args.includeAuthors) {
          result.authors = await semanticScholar.getPaperAuthors(paperId);
        }
        if (args.includeCitations) {
          const citations = await semanticScholar.getPaperCitations(paperId);
          result.citations = citations;
          result.citationCount = citations.length;
        }
        if (args.includeReferences) {
          const references = await semanticScholar.getPaperReferences(paperId);
          result.references = references;
          result.referenceCount = references.length;
        }
        if (args.includeRecommendations) {
          result.recommendations = await semanticScholar.getPaperRecommendations(paperId);
        }
        if (args.includeEmbedding) {
          result.embedding = await semanticScholar.getPaperEmbedding(paperId);
        }
        return jsonResult(result);
      })
  );

  // Tool: batch_get_papers
  server.registerTool(
    'batch_get_papers',
    {
      description: 'Fetch many papers at once. Ids that Semantic Scholar does not know are left out of the result.',
      inputSchema: {
        paperIds: z.array(z.string().min(1)).min(1).describe('Paper identifiers')
      }
    },
    async ({ paperIds }): Promise<CallToolResult> =>
      guard(logger, 'batch_get_papers', 'Error fetching papers', async () => {
        const found = await semanticScholar.getPapersBulk(paperIds.map(toSemanticScholarId));
        return jsonResult({ requested: paperIds.length, found: found.length, papers: found });
      })
  );

  // Tool: get_paper_recommendations
  server.registerTool(
    'get_paper_recommendations',
    {
      description: 'Papers recommended by Semantic Scholar as similar to the given paper.',
      inputSchema: {
        paperId: z.string().min(1).describe('arXiv id or URL, DOI:<doi>, or Semantic Scholar paper id'),
        maxResults: z.number().int().min(1).max(500).default(10).describe('Max recommendations')
      }
    },
    async ({ paperId, maxResults }): Promise<CallToolResult> =>
      guard(logger, 'get_paper_recommendations', 'Error getting recommendations', async () => {
        const recommendations = await semanticScholar.getPaperRecommendations(
          toSemanticScholarId(paperId),
          maxResults
        );
        return jsonResult({ paperId, recommendationCount: recommendations.length, recommendations });
      })
  );
}
