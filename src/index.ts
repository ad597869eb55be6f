#!/usr/bin/env node
/**
 * Paper Research MCP Server
 *
 * Semantic Scholar and arXiv research tools with a local markdown paper
 * library and PDF text extraction. Serves MCP over stdio by default, or over
 * Streamable HTTP with --http.
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { type CliOptions, parseCliArgs, USAGE } from './cli.js';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { createMcpServer, createServices, ResearchHttpServer } from './server.js';
import { formatToolList } from './tools/catalogue.js';
import type { ToolContext } from './tools/index.js';

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n${USAGE}\n`);
    process.exitCode = 2;
    return;
  }

  if (options.listTools) {
    process.stdout.write(`${formatToolList()}\n`);
    return;
  }

  const config = loadConfig();
  if (options.debug) {
    config.logging.level = 'debug';
  }

  const logger = createLogger(config.logging.level);
  const context: ToolContext = {
    services: createServices(config, logger),
    logger,
    debugMode: config.logging.level === 'debug'
  };

  logger.info(
    {
      apiKey: context.services.semanticScholar.hasApiKey,
      mdFilesDir: config.storage.mdFilesDir,
      transport: options.http ? 'http' : 'stdio'
    },
    'Starting paper research server'
  );

  let close: () => Promise<void>;
  if (options.http) {
    const httpServer = new ResearchHttpServer(config, context);
    await httpServer.start();
    close = () => httpServer.stop();
  } else {
    const server = createMcpServer(context);
    await server.connect(new StdioServerTransport());
    close = () => server.close();
  }

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: describeError(error) }, 'Error during shutdown');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${describeError(error)}\n`);
  process.exit(1);
});
