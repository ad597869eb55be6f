/**
 * Configuration for the paper research MCP server
 */

import path from 'node:path';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Shared settings for the rate-limited API clients
 */
export interface ClientSettings {
  /** Minimum spacing between requests, in seconds */
  rateLimitDelaySeconds: number;
  /** Extra attempts after the first one on HTTP 429 or transport failure */
  maxRetries: number;
  /** Base of the exponential backoff, indexed by zero-based attempt */
  backoffFactor: number;
  /** Per-request connection/read timeout */
  timeoutMs: number;
  userAgent: string;
}

export interface SemanticScholarConfig extends ClientSettings {
  apiKey?: string;
  baseUrl: string;
  recommendationsUrl: string;
  /** Upstream ceiling for POST /paper/batch */
  batchSize: number;
  maxSearchResults: number;
}

export interface ArxivConfig extends ClientSettings {
  baseUrl: string;
  pdfBaseUrl: string;
}

export interface ResearchServerConfig {
  semanticScholar: SemanticScholarConfig;
  arxiv: ArxivConfig;
  storage: {
    mdFilesDir: string;
    jsonFilesDir: string;
    downloadDir: string;
  };
  logging: {
    level: LogLevel;
  };
  http: {
    port: number;
    host: string;
  };
}

export const SERVER_NAME = 'paper-research-mcp';
export const SERVER_VERSION = '1.0.0';

/**
 * Paper fields requested from Semantic Scholar
 */
export const PAPER_FIELDS = [
  'paperId',
  'title',
  'abstract',
  'authors',
  'year',
  'citationCount',
  'referenceCount',
  'influentialCitationCount',
  'venue',
  'url',
  'externalIds',
  'publicationTypes',
  'publicationDate',
  'journal',
  'tldr',
  'embedding'
] as const;

/**
 * Author fields requested from Semantic Scholar
 */
export const AUTHOR_FIELDS = [
  'authorId',
  'name',
  'aliases',
  'affiliations',
  'homepage',
  'paperCount',
  'citationCount',
  'hIndex'
] as const;

/**
 * Lighter field set for citing/cited papers
 */
export const CITATION_FIELDS = [
  'paperId',
  'title',
  'abstract',
  'authors',
  'year',
  'citationCount',
  'venue',
  'url',
  'externalIds'
] as const;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  SEMANTIC_SCHOLAR_API_KEY: z.string().optional(),
  SEMANTIC_SCHOLAR_API_URL: z.string().url().default('https://api.semanticscholar.org/graph/v1'),
  SEMANTIC_SCHOLAR_RECOMMENDATIONS_URL: z
    .string()
    .url()
    .default('https://api.semanticscholar.org/recommendations/v1'),
  ARXIV_API_URL: z.string().url().default('http://export.arxiv.org/api/query'),
  ARXIV_PDF_URL: z.string().url().default('https://arxiv.org/pdf'),
  RATE_LIMIT_DELAY_SECONDS: z.coerce.number().min(0).default(1),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  BACKOFF_FACTOR: z.coerce.number().positive().default(2),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  BATCH_SIZE: z.coerce.number().int().min(1).max(500).default(500),
  MAX_SEARCH_RESULTS: z.coerce.number().int().min(1).max(100).default(100),
  MD_FILES_DIR: z.string().default('md_files'),
  JSON_FILES_DIR: z.string().default('json_files'),
  DOWNLOAD_DIR: z.string().default('downloads'),
  DEBUG_MODE: booleanFlag.default('false'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0')
});

/**
 * Build the server configuration from environment variables.
 *
 * Empty strings count as unset, so `SEMANTIC_SCHOLAR_API_KEY=` in a .env file
 * selects the unauthenticated mode.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  baseDir: string = process.cwd()
): ResearchServerConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(defined);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  const client: ClientSettings = {
    rateLimitDelaySeconds: vars.RATE_LIMIT_DELAY_SECONDS,
    maxRetries: vars.MAX_RETRIES,
    backoffFactor: vars.BACKOFF_FACTOR,
    timeoutMs: vars.REQUEST_TIMEOUT_MS,
    userAgent: `${SERVER_NAME}/${SERVER_VERSION}`
  };

  return {
    semanticScholar: {
      ...client,
      apiKey: vars.SEMANTIC_SCHOLAR_API_KEY,
      baseUrl: vars.SEMANTIC_SCHOLAR_API_URL,
      recommendationsUrl: vars.SEMANTIC_SCHOLAR_RECOMMENDATIONS_URL,
      batchSize: vars.BATCH_SIZE,
      maxSearchResults: vars.MAX_SEARCH_RESULTS
    },
    arxiv: {
      ...client,
      baseUrl: vars.ARXIV_API_URL,
      pdfBaseUrl: vars.ARXIV_PDF_URL
    },
    storage: {
      mdFilesDir: path.resolve(baseDir, vars.MD_FILES_DIR),
      jsonFilesDir: path.resolve(baseDir, vars.JSON_FILES_DIR),
      downloadDir: path.resolve(baseDir, vars.DOWNLOAD_DIR)
    },
    logging: {
      level: vars.DEBUG_MODE ? 'debug' : vars.LOG_LEVEL
    },
    http: {
      port: vars.PORT,
      host: vars.HOST
    }
  };
}

/**
 * Headers sent to Semantic Scholar; the API key is optional
 */
export function getApiHeaders(config: Pick<SemanticScholarConfig, 'apiKey' | 'userAgent'>): Record<string, string> {
  return {
    'Accept': 'application/json',
    'User-Agent': config.userAgent,
    ...(config.apiKey && { 'x-api-key': config.apiKey })
  };
}
