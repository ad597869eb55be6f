/**
 * MCP Tools Registration
 *
 * Registers every paper research tool with the MCP server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Logger } from 'pino';

import type { ArxivService } from '../services/arxiv.js';
import type { PaperManager } from '../services/paperManager.js';
import type { PdfService } from '../services/pdf.js';
import type { LiteratureReviewService } from '../services/reviews.js';
import type { SemanticScholarService } from '../services/semanticScholar.js';
import { registerArxivTools } from './arxiv.js';
import { registerLibraryTools } from './library.js';
import { registerPaperTools } from './papers.js';
import { registerPdfTools } from './pdf.js';
import { registerServiceTools } from './service.js';

export interface ResearchServices {
  semanticScholar: SemanticScholarService;
  arxiv: ArxivService;
  papers: PaperManager;
  reviews: LiteratureReviewService;
  pdf: PdfService;
}

export interface ToolContext {
  services: ResearchServices;
  logger: Logger;
  debugMode: boolean;
}

export function registerTools(server: McpServer, context: ToolContext): void {
  registerPaperTools(server, context);
  registerArxivTools(server, context);
  registerLibraryTools(server, context);
  registerPdfTools(server, context);
  registerServiceTools(server, context);

  context.logger.debug('Registered MCP tools');
}
