/**
 * Paper Research MCP Server
 *
 * Wires configuration, services and tools together, and serves them over
 * Streamable HTTP when asked to. The stdio transport lives in index.ts.
 *
 * @packageDocumentation
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

import { type ResearchServerConfig, SERVER_NAME, SERVER_VERSION } from './config.js';
import { describeError } from './errors.js';
import { ArxivService } from './services/arxiv.js';
import type { ServiceOverrides } from './services/httpClient.js';
import { PaperManager } from './services/paperManager.js';
import { PdfService, type PdfTextExtractor } from './services/pdf.js';
import { LiteratureReviewService } from './services/reviews.js';
import { SemanticScholarService } from './services/semanticScholar.js';
import { registerTools, type ResearchServices, type ToolContext } from './tools/index.js';

export interface ServiceFactoryOverrides extends ServiceOverrides {
  extractor?: PdfTextExtractor;
  now?: () => Date;
}

/**
 * Build every service from the configuration. Overrides replace the network
 * adapter, sleep, PDF extractor and clock, for tests.
 */
export function createServices(
  config: ResearchServerConfig,
  logger: Logger,
  overrides: ServiceFactoryOverrides = {}
): ResearchServices {
  const { extractor, now, ...network } = overrides;

  const papers = new PaperManager(
    { mdFilesDir: config.storage.mdFilesDir, jsonFilesDir: config.storage.jsonFilesDir, now },
    logger
  );

  return {
    semanticScholar: new SemanticScholarService(config.semanticScholar, logger, network),
    arxiv: new ArxivService(config.arxiv, logger, network),
    papers,
    reviews: new LiteratureReviewService(papers, logger),
    pdf: new PdfService(
      { ...config.arxiv, downloadDir: config.storage.downloadDir },
      logger,
      { ...network, extractor }
    )
  };
}

export function createMcpServer(context: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });
  registerTools(server, context);
  return server;
}

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id: null
  });
}

/**
 * Streamable HTTP front end, one MCP server per session
 */
export class ResearchHttpServer {
  private readonly app: express.Application;
  private readonly server: Server;
  private readonly logger: Logger;
  private readonly sessions = new Map<string, StreamableHTTPServerTransport>();

  constructor(
    private readonly config: ResearchServerConfig,
    private readonly context: ToolContext
  ) {
    this.logger = context.logger.child({ component: 'http' });
    this.app = express();
    this.server = createServer(this.app);
    this.setupMiddleware();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    // Request logging
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const requestId = uuidv4().slice(0, 8);
      res.locals.requestId = requestId;
      this.logger.debug({ requestId, method: req.method, path: req.path }, 'Incoming request');
      next();
    });

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: SERVER_VERSION,
        sessions: this.sessions.size
      });
    });

    this.app.all('/mcp', (req: Request, res: Response) => {
      this.handleMcpRequest(req, res).catch((error: unknown) => {
        this.logger.error({ error: describeError(error) }, 'Error handling MCP request');
        if (!res.headersSent) {
          jsonRpcError(res, 500, -32603, 'Internal server error');
        }
      });
    });
  }

  private async handleMcpRequest(req: Request, res: Response): Promise<void> {
    const header = req.headers['mcp-session-id'];
    const sessionId = typeof header === 'string' ? header : undefined;

    if (sessionId) {
      const transport = this.sessions.get(sessionId);
      if (!transport) {
        jsonRpcError(res, 400, -32000, 'Invalid session');
        return;
      }
      await transport.handleRequest(req, res, req.body);
      return;
    }

    if (req.method !== 'POST' || !isInitializeRequest(req.body)) {
      jsonRpcError(res, 400, -32000, 'Missing MCP session ID');
      return;
    }

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => uuidv4(),
      onsessioninitialized: (newSessionId) => {
        this.logger.info({ sessionId: newSessionId }, 'Session initialized');
        this.sessions.set(newSessionId, transport);
      }
    });

    transport.onclose = () => {
      const closedId = transport.sessionId;
      if (closedId && this.sessions.delete(closedId)) {
        this.logger.info({ sessionId: closedId }, 'Session closed');
      }
    };

    await createMcpServer(this.context).connect(transport);
    await transport.handleRequest(req, res, req.body);
  }

  /**
   * Listen on the configured host and port; resolves with the bound port
   */
  async start(): Promise<number> {
    const { host } = this.config.http;

    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.http.port, host, () => {
        const address = this.server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.config.http.port;
        this.logger.info({ host, port }, `${SERVER_NAME} started`);
        this.logger.info(`  MCP: http://${host}:${port}/mcp`);
        this.logger.info(`  Health: http://${host}:${port}/health`);
        resolve(port);
      });
    });
  }

  async stop(): Promise<void> {
    this.logger.info('Shutting down server...');

    for (const [sessionId, transport] of this.sessions) {
      this.logger.debug({ sessionId }, 'Closing session');
      await transport.close();
    }
    this.sessions.clear();

    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Server stopped');
        resolve();
      });
    });
  }
}
