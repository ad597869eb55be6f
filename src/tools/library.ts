/**
 * Paper library tools: markdown notes, topics and literature reviews
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { DEFAULT_TOPIC } from '../services/paperManager.js';
import { extractArxivId, toSemanticScholarId } from '../utils.js';
import type { ToolContext } from './index.js';
import { errorResult, guard, jsonResult } from './results.js';

const topicSchema = z.string().default(DEFAULT_TOPIC).describe('Topic directory for the note');
const notesSchema = z.string().default('').describe('Personal notes appended to the file');

export function registerLibraryTools(server: McpServer, { services, logger }: ToolContext): void {
  const { semanticScholar, arxiv, papers, reviews } = services;

  // Tool: save_paper_to_markdown
  server.registerTool(
    'save_paper_to_markdown',
    {
      description: 'Fetch a paper from Semantic Scholar and save it as a markdown note under a topic.',
      inputSchema: {
        paperId: z.string().min(1).describe('arXiv id or URL, DOI:<doi>, or Semantic Scholar paper id'),
        topic: topicSchema,
        notes: notesSchema
      }
    },
    async ({ paperId, topic, notes }): Promise<CallToolResult> =>
      guard(logger, 'save_paper_to_markdown', 'Error saving paper', async () => {
        const paper = await semanticScholar.getPaper(toSemanticScholarId(paperId));
        if (!paper) {
          return errorResult(`Paper "${paperId}" not found`);
        }
        const filepath = await papers.savePaper(paper, topic, notes);
        return jsonResult({ title: paper.title, topic, filepath });
      })
  );

  // Tool: save_arxiv_paper_to_markdown
  server.registerTool(
    'save_arxiv_paper_to_markdown',
    {
      description: 'Fetch an arXiv paper and save it as a markdown note under a topic.',
      inputSchema: {
        arxivId: z.string().min(1).describe('arXiv id or URL'),
        topic: topicSchema,
        notes: notesSchema
      }
    },
    async ({ arxivId, topic, notes }): Promise<CallToolResult> =>
      guard(logger, 'save_arxiv_paper_to_markdown', 'Error saving arXiv paper', async () => {
        const paper = await arxiv.getPaper(extractArxivId(arxivId) ?? arxivId);
        if (!paper) {
          return errorResult(`ArXiv paper "${arxivId}" not found`);
        }
        const filepath = await papers.saveArxivPaper(paper, topic, notes);
        return jsonResult({ title: paper.title, topic, filepath });
      })
  );

  // Tool: organize_papers_by_topic
  server.registerTool(
    'organize_papers_by_topic',
    {
      description: 'List saved notes grouped by topic, with per-topic counts.',
      inputSchema: {}
    },
    async (): Promise<CallToolResult> =>
      guard(logger, 'organize_papers_by_topic', 'Error organizing papers', async () => {
        const topics = await papers.organizeByTopic();
        const statistics = await papers.getStatistics();
        return jsonResult({ topics, statistics });
      })
  );

  // Tool: generate_literature_review
  server.registerTool(
    'generate_literature_review',
    {
      description:
        'Write a markdown literature review of the notes saved under a topic, grouped by the given requirements.',
      inputSchema: {
        topic: z.string().min(1).describe('Topic directory to review'),
        requirements: z.array(z.string().min(1)).min(1).describe('Requirements to group papers by'),
        outputFilename: z.string().optional().describe('File name for the review')
      }
    },
    async ({ topic, requirements, outputFilename }): Promise<CallToolResult> =>
      guard(logger, 'generate_literature_review', 'Error generating literature review', async () => {
        const result = await reviews.generateTopicReview(topic, requirements, outputFilename);
        if (result.status !== 'created') {
          return errorResult(result.message, { topic });
        }
        return jsonResult({ topic, filepath: result.filepath, paperCount: result.paperCount });
      })
  );

  // Tool: create_requirement_based_review
  server.registerTool(
    'create_requirement_based_review',
    {
      description:
        'Fetch the given papers from Semantic Scholar and write a markdown review grouped by the given requirements.',
      inputSchema: {
        paperIds: z.array(z.string().min(1)).min(1).describe('Paper identifiers'),
        requirements: z.array(z.string().min(1)).min(1).describe('Requirements to group papers by'),
        outputFilename: z.string().optional().describe('File name for the review')
      }
    },
    async ({ paperIds, requirements, outputFilename }): Promise<CallToolResult> =>
      guard(logger, 'create_requirement_based_review', 'Error creating review', async () => {
        const found = await semanticScholar.getPapersBulk(paperIds.map(toSemanticScholarId));
        if (found.length === 0) {
          return errorResult('No valid papers found', { requested: paperIds.length });
        }
        const filepath = await reviews.createRequirementReview(found, requirements, outputFilename);
        return jsonResult({ filepath, paperCount: found.length, requirementCount: requirements.length });
      })
  );

  // Tool: search_papers_in_collection
  server.registerTool(
    'search_papers_in_collection',
    {
      description: 'Case-insensitive keyword search over the saved markdown notes.',
      inputSchema: {
        keyword: z.string().min(1).describe('Keyword to look for')
      }
    },
    async ({ keyword }): Promise<CallToolResult> =>
      guard(logger, 'search_papers_in_collection', 'Error searching collection', async () => {
        const matches = await papers.searchByKeyword(keyword);
        return jsonResult({ keyword, count: matches.length, matches });
      })
  );
}
