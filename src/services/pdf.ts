/**
 * PDF Service
 *
 * Downloads arXiv PDFs and extracts their text. Every operation reports
 * `{ success: false, error }` instead of throwing.
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';

import type { ClientSettings } from '../config.js';
import { describeError, PdfProcessingError } from '../errors.js';
import { cleanArxivId } from './arxiv.js';
import { RateLimitedClient, type ServiceOverrides } from './httpClient.js';

export interface PdfDocumentText {
  /** Text of each page, in order */
  pages: string[];
  totalPages: number;
}

/**
 * Turns PDF bytes into per-page text
 */
export interface PdfTextExtractor {
  extract(data: Buffer): Promise<PdfDocumentText>;
}

/**
 * PDF.js extractor: reads the text content of one page at a time, so page
 * boundaries come from the document itself
 */
export class PdfJsExtractor implements PdfTextExtractor {
  async extract(data: Buffer): Promise<PdfDocumentText> {
    const { getDocument, VerbosityLevel } = await import('pdfjs-dist/legacy/build/pdf.mjs');

    // PDF.js warnings go to stdout, which carries the stdio transport
    const pdf = await getDocument({ data: new Uint8Array(data), verbosity: VerbosityLevel.ERRORS }).promise;
    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        pages.push(
          content.items.map((item) => ('str' in item ? `${item.str}${item.hasEOL ? '\n' : ''}` : '')).join('')
        );
        page.cleanup();
      }
      return { pages, totalPages: pdf.numPages };
    } finally {
      await pdf.destroy();
    }
  }
}

export interface PageRange {
  /** Zero-based, inclusive */
  startPage?: number;
  /** Zero-based, inclusive */
  endPage?: number;
}

export interface PdfServiceOptions extends ClientSettings {
  pdfBaseUrl: string;
  downloadDir: string;
}

export interface PdfServiceDependencies extends ServiceOverrides {
  extractor?: PdfTextExtractor;
}

interface Failure {
  success: false;
  error: string;
}

export type DownloadResult =
  | {
      success: true;
      arxivId: string;
      pdfUrl: string;
      localPath: string;
      fileSizeBytes: number;
      fileSizeMb: number;
    }
  | (Failure & { arxivId: string });

export type ExtractResult =
  | {
      success: true;
      pdfPath: string;
      totalPages: number;
      extractedPages: number;
      wordCount: number;
      characterCount: number;
      textContent: string;
    }
  | (Failure & { pdfPath: string });

export type ConvertResult =
  | {
      success: true;
      pdfPath: string;
      outputPath: string;
      totalPages: number;
      extractedPages: number;
      wordCount: number;
      characterCount: number;
      outputFileSizeBytes: number;
      includePageNumbers: boolean;
    }
  | (Failure & { pdfPath: string });

export interface ProcessedPaper {
  success: true;
  arxivId: string;
  pdfPath: string;
  pdfSizeMb: number;
  textExtracted?: boolean;
  totalPages?: number;
  wordCount?: number;
  characterCount?: number;
  textContent?: string;
  textFileSaved?: boolean;
  textFilePath?: string;
  textFileSizeBytes?: number;
  textExtractionError?: string;
  textSaveError?: string;
}

export type ProcessResult = ProcessedPaper | (Failure & { arxivId: string });

export interface ProcessOptions {
  downloadDir?: string;
  extractText?: boolean;
  saveTextFile?: boolean;
}

interface RenderedText {
  text: string;
  totalPages: number;
  extractedPages: number;
  wordCount: number;
  characterCount: number;
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * arXiv id from an abs/pdf URL, an "arXiv:" id or a bare id
 */
export function normalizePdfId(input: string): string {
  let id = input.trim();
  if (id.startsWith('http')) {
    if (id.includes('arxiv.org/abs/')) {
      id = id.split('arxiv.org/abs/').pop() ?? id;
    } else if (id.includes('arxiv.org/pdf/')) {
      id = id.split('arxiv.org/pdf/').pop() ?? id;
      if (id.endsWith('.pdf')) {
        id = id.slice(0, -4);
      }
    }
    return id;
  }
  return cleanArxivId(id);
}

/**
 * Join pages with optional "--- Page N ---" markers; pages without text are
 * left out
 */
export function renderPages(pages: string[], firstPageIndex: number, includePageNumbers: boolean): string {
  let text = '';
  pages.forEach((pageText, offset) => {
    if (pageText.trim() === '') {
      return;
    }
    if (includePageNumbers) {
      text += `\n--- Page ${firstPageIndex + offset + 1} ---\n`;
    }
    text += `${pageText}\n`;
  });
  return text.trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function roundMb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}

function toBuffer(data: unknown): Buffer | null {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  return null;
}

export class PdfService {
  private readonly client: RateLimitedClient;
  private readonly extractor: PdfTextExtractor;
  private readonly logger: Logger;

  constructor(
    private readonly options: PdfServiceOptions,
    logger: Logger,
    dependencies: PdfServiceDependencies = {}
  ) {
    this.logger = logger.child({ component: 'pdf' });
    this.extractor = dependencies.extractor ?? new PdfJsExtractor();
    this.client = new RateLimitedClient(
      {
        ...options,
        name: 'arxiv-pdf',
        headers: { Accept: 'application/pdf' },
        adapter: dependencies.adapter,
        sleep: dependencies.sleep
      },
      this.logger
    );
  }

  async downloadArxivPdf(arxivId: string, downloadDir?: string, filename?: string): Promise<DownloadResult> {
    const id = normalizePdfId(arxivId);
    const pdfUrl = `${this.options.pdfBaseUrl}/${id}.pdf`;
    this.logger.debug({ arxivId: id, pdfUrl }, 'Downloading arXiv PDF');

    const outcome = await this.client.request('downloadArxivPdf', {
      method: 'GET',
      url: pdfUrl,
      responseType: 'arraybuffer'
    });

    if (!outcome.ok) {
      let error: string;
      if (outcome.reason === 'not_found') {
        error = `ArXiv paper '${arxivId}' not found. Please check the ID.`;
      } else if (outcome.reason === 'transport') {
        error = `Error downloading PDF: ${outcome.error ?? 'network failure'}`;
      } else {
        error = `HTTP ${outcome.status ?? 'error'}: Failed to download PDF`;
      }
      return { success: false, error, arxivId };
    }

    const bytes = toBuffer(outcome.data);
    if (bytes === null) {
      return { success: false, error: 'Error downloading PDF: unexpected response body', arxivId };
    }

    try {
      const dir = downloadDir ?? this.options.downloadDir;
      await mkdir(dir, { recursive: true });

      let name = filename || id.replaceAll('/', '_');
      if (!name.endsWith('.pdf')) {
        name += '.pdf';
      }
      const localPath = path.join(dir, name);
      await writeFile(localPath, bytes);

      this.logger.info({ localPath, bytes: bytes.length }, 'PDF downloaded');
      return {
        success: true,
        arxivId: id,
        pdfUrl,
        localPath,
        fileSizeBytes: bytes.length,
        fileSizeMb: roundMb(bytes.length)
      };
    } catch (error) {
      return { success: false, error: `Error downloading PDF: ${describeError(error)}`, arxivId };
    }
  }

  async extractText(pdfPath: string, range: PageRange = {}): Promise<ExtractResult> {
    this.logger.debug({ pdfPath }, 'Extracting PDF text');

    try {
      const rendered = await this.render(pdfPath, range, true);
      return {
        success: true,
        pdfPath,
        totalPages: rendered.totalPages,
        extractedPages: rendered.extractedPages,
        wordCount: rendered.wordCount,
        characterCount: rendered.characterCount,
        textContent: rendered.text
      };
    } catch (error) {
      return { success: false, error: this.failureMessage('Error extracting PDF text', error), pdfPath };
    }
  }

  /**
   * Write the text of `pdfPath` to `outputPath`, by default the PDF path with
   * a .txt extension
   */
  async convertToText(
    pdfPath: string,
    outputPath?: string,
    range: PageRange = {},
    includePageNumbers = true
  ): Promise<ConvertResult> {
    this.logger.debug({ pdfPath }, 'Converting PDF to text');

    try {
      const rendered = await this.render(pdfPath, range, includePageNumbers);
      const target = outputPath || this.textPathFor(pdfPath);
      const size = await this.writeText(target, rendered.text);

      return {
        success: true,
        pdfPath,
        outputPath: target,
        totalPages: rendered.totalPages,
        extractedPages: rendered.extractedPages,
        wordCount: rendered.wordCount,
        characterCount: rendered.characterCount,
        outputFileSizeBytes: size,
        includePageNumbers
      };
    } catch (error) {
      return { success: false, error: this.failureMessage('Error converting PDF to text', error), pdfPath };
    }
  }

  /**
   * Download, then optionally extract the text and save it beside the PDF
   */
  async processArxivPaper(arxivId: string, options: ProcessOptions = {}): Promise<ProcessResult> {
    const { downloadDir, extractText = true, saveTextFile = true } = options;

    const download = await this.downloadArxivPdf(arxivId, downloadDir);
    if (!download.success) {
      return download;
    }

    const result: ProcessedPaper = {
      success: true,
      arxivId: download.arxivId,
      pdfPath: download.localPath,
      pdfSizeMb: download.fileSizeMb
    };
    if (!extractText) {
      return result;
    }

    let rendered: RenderedText;
    try {
      rendered = await this.render(download.localPath, {}, true);
    } catch (error) {
      result.textExtracted = false;
      result.textExtractionError = this.failureMessage('Error extracting PDF text', error);
      return result;
    }

    result.textExtracted = true;
    result.totalPages = rendered.totalPages;
    result.wordCount = rendered.wordCount;
    result.characterCount = rendered.characterCount;

    if (!saveTextFile) {
      result.textContent = rendered.text;
      return result;
    }

    const textPath = this.textPathFor(download.localPath);
    try {
      result.textFileSizeBytes = await this.writeText(textPath, rendered.text);
      result.textFileSaved = true;
      result.textFilePath = textPath;
    } catch (error) {
      result.textFileSaved = false;
      result.textSaveError = this.failureMessage('Error converting PDF to text', error);
    }
    return result;
  }

  private async render(pdfPath: string, range: PageRange, includePageNumbers: boolean): Promise<RenderedText> {
    const { startPage, endPage } = range;
    if (startPage !== undefined && endPage !== undefined && endPage < startPage) {
      throw new PdfProcessingError(`Invalid page range: ${startPage}-${endPage}`);
    }

    let data: Buffer;
    try {
      data = await readFile(pdfPath);
    } catch (error) {
      throw new PdfProcessingError(`PDF file not found: ${pdfPath}`, error);
    }

    const document = await this.extractor.extract(data);
    const first = startPage ?? 0;
    const selected = document.pages.slice(first, endPage === undefined ? undefined : endPage + 1);
    const text = renderPages(selected, first, includePageNumbers);

    return {
      text,
      totalPages: document.totalPages,
      extractedPages: selected.length,
      wordCount: countWords(text),
      characterCount: text.length
    };
  }

  private textPathFor(pdfPath: string): string {
    const parsed = path.parse(pdfPath);
    return path.join(parsed.dir, `${parsed.name}.txt`);
  }

  private async writeText(target: string, text: string): Promise<number> {
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, text, 'utf-8');
    return (await stat(target)).size;
  }

  private failureMessage(prefix: string, error: unknown): string {
    const message = error instanceof PdfProcessingError ? error.message : `${prefix}: ${describeError(error)}`;
    this.logger.warn({ error: message }, prefix);
    return message;
  }
}
