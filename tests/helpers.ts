import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { pino, type Logger } from 'pino';

import { loadConfig, type ResearchServerConfig } from '../src/config.js';
import type { ArxivPaper, Paper } from '../src/models.js';
import type { Sleep } from '../src/services/rateLimit.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export interface StubReply {
  status: number;
  data?: unknown;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>;

export interface StubAdapter {
  adapter: AxiosAdapter;
  calls: InternalAxiosRequestConfig[];
}

/**
 * In-process axios adapter; records every request it answers
 */
export function stubAdapter(handler: StubHandler): StubAdapter {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = await handler(config);
    const response: AxiosResponse = {
      data: reply.data ?? null,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config
    };
    return response;
  };
  return { adapter, calls };
}

/**
 * Sleep that resolves at once and records the requested delays
 */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    }
  };
}

export async function makeTempDir(prefix = 'paper-research-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Configuration with no throttling, rooted in `baseDir`
 */
export function testConfig(baseDir: string, env: NodeJS.ProcessEnv = {}): ResearchServerConfig {
  return loadConfig(
    {
      RATE_LIMIT_DELAY_SECONDS: '0',
      SEMANTIC_SCHOLAR_API_KEY: 'test-secret',
      ...env
    },
    baseDir
  );
}

/**
 * Fixed local time: 2024-03-05 14:07:09
 */
export const FIXED_NOW = new Date(2024, 2, 5, 14, 7, 9);

export function rawPaper(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    paperId: 'abc123',
    title: 'Graph Attention Networks',
    abstract: 'We present graph attention networks, a neural architecture for graph data.',
    authors: [
      { authorId: '1', name: 'Ada Lovelace' },
      { authorId: '2', name: 'Alan Turing' }
    ],
    year: 2018,
    venue: 'ICLR',
    url: 'https://www.semanticscholar.org/paper/abc123',
    citationCount: 5,
    referenceCount: 12,
    influentialCitationCount: 1,
    externalIds: { ArXiv: '1710.10903', DOI: '10.1000/gat' },
    ...overrides
  };
}

export function samplePaper(overrides: Partial<Paper> = {}): Paper {
  return {
    id: 'abc123',
    title: 'Graph Attention Networks',
    abstract: 'We present graph attention networks, a neural architecture for graph data.',
    authors: [
      { id: '1', name: 'Ada Lovelace' },
      { id: '2', name: 'Alan Turing' }
    ],
    year: 2018,
    venue: 'ICLR',
    url: 'https://www.semanticscholar.org/paper/abc123',
    citationCount: 5,
    referenceCount: 12,
    influentialCitationCount: 1,
    arxivId: '1710.10903',
    doi: '10.1000/gat',
    corpusId: null,
    externalIds: { ArXiv: '1710.10903', DOI: '10.1000/gat' },
    publicationTypes: [],
    publicationDate: null,
    journal: null,
    tldr: null,
    embedding: null,
    ...overrides
  };
}

export function sampleArxivPaper(overrides: Partial<ArxivPaper> = {}): ArxivPaper {
  return {
    id: '2301.00001v1',
    title: 'Attention Is Everywhere',
    authors: ['Grace Hopper', 'Edsger Dijkstra'],
    abstract: 'An abstract.',
    publishedDate: '2023-01-02T10:00:00Z',
    pdfUrl: 'http://arxiv.org/pdf/2301.00001v1',
    categories: ['cs.LG', 'cs.AI'],
    ...overrides
  };
}

export function atomFeed(entries: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>ArXiv Query</title>
  ${entries.join('\n')}
</feed>`;
}

export function atomEntry(id: string, title: string, extra = ''): string {
  return `<entry>
    <id>http://arxiv.org/abs/${id}</id>
    <published>2023-01-02T10:00:00Z</published>
    <title>${title}</title>
    <summary>  An abstract
      spread over lines.  </summary>
    <author><name>Grace Hopper</name></author>
    <author><name>Edsger Dijkstra</name></author>
    <link href="http://arxiv.org/abs/${id}" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/${id}" rel="related" type="application/pdf"/>
    <category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
    <category term="cs.AI" scheme="http://arxiv.org/schemas/atom"/>
    ${extra}
  </entry>`;
}
