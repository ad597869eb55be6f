/**
 * PDF tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { ToolContext } from './index.js';
import { guard, outcomeResult } from './results.js';

const pageSchema = z.number().int().min(0);

export function registerPdfTools(server: McpServer, { services, logger }: ToolContext): void {
  const { pdf } = services;

  // Tool: download_arxiv_pdf
  server.registerTool(
    'download_arxiv_pdf',
    {
      description: 'Download the PDF of an arXiv paper.',
      inputSchema: {
        arxivId: z.string().min(1).describe('arXiv id, abs URL or pdf URL'),
        downloadDir: z.string().optional().describe('Target directory; defaults to DOWNLOAD_DIR'),
        filename: z.string().optional().describe('File name; defaults to the id')
      }
    },
    async ({ arxivId, downloadDir, filename }): Promise<CallToolResult> =>
      guard(logger, 'download_arxiv_pdf', 'Error downloading PDF', async () =>
        outcomeResult(await pdf.downloadArxivPdf(arxivId, downloadDir, filename))
      )
  );

  // Tool: extract_pdf_text
  server.registerTool(
    'extract_pdf_text',
    {
      description: 'Extract the text of a local PDF, optionally limited to a zero-based inclusive page range.',
      inputSchema: {
        pdfPath: z.string().min(1).describe('Path to the PDF file'),
        startPage: pageSchema.optional().describe('First page, zero-based'),
        endPage: pageSchema.optional().describe('Last page, zero-based, inclusive')
      }
    },
    async ({ pdfPath, startPage, endPage }): Promise<CallToolResult> =>
      guard(logger, 'extract_pdf_text', 'Error extracting PDF text', async () =>
        outcomeResult(await pdf.extractText(pdfPath, { startPage, endPage }))
      )
  );

  // Tool: convert_pdf_to_text
  server.registerTool(
    'convert_pdf_to_text',
    {
      description: 'Write the text of a local PDF to a .txt file, by default beside the PDF.',
      inputSchema: {
        pdfPath: z.string().min(1).describe('Path to the PDF file'),
        outputPath: z.string().optional().describe('Path of the text file'),
        startPage: pageSchema.optional().describe('First page, zero-based'),
        endPage: pageSchema.optional().describe('Last page, zero-based, inclusive'),
        includePageNumbers: z.boolean().default(true).describe('Insert "--- Page N ---" markers')
      }
    },
    async ({ pdfPath, outputPath, startPage, endPage, includePageNumbers }): Promise<CallToolResult> =>
      guard(logger, 'convert_pdf_to_text', 'Error converting PDF to text', async () =>
        outcomeResult(await pdf.convertToText(pdfPath, outputPath, { startPage, endPage }, includePageNumbers))
      )
  );

  // Tool: process_arxiv_paper
  server.registerTool(
    'process_arxiv_paper',
    {
      description: 'Download an arXiv PDF, extract its text and optionally save the text beside the PDF.',
      inputSchema: {
        arxivId: z.string().min(1).describe('arXiv id, abs URL or pdf URL'),
        downloadDir: z.string().optional().describe('Target directory; defaults to DOWNLOAD_DIR'),
        extractText: z.boolean().default(true).describe('Extract the text after downloading'),
        saveTextFile: z.boolean().default(true).describe('Save the extracted text as a .txt file')
      }
    },
    async ({ arxivId, downloadDir, extractText, saveTextFile }): Promise<CallToolResult> =>
      guard(logger, 'process_arxiv_paper', 'Error processing arXiv paper', async () =>
        outcomeResult(await pdf.processArxivPaper(arxivId, { downloadDir, extractText, saveTextFile }))
      )
  );
}
