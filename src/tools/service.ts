import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import { SERVER_NAME, SERVER_VERSION } from '../config.js';
import { toolNamesByGroup } from './catalogue.js';
import type { ToolContext } from './index.js';
import { jsonResult } from './results.js';

export function registerServiceTools(server: McpServer, { services, debugMode }: ToolContext): void {
  // Tool: get_service_info
  server.registerTool(
    'get_service_info',
    {
      description: 'Service name, version, configuration flags and the available tools by group.',
      inputSchema: {}
    },
    async (): Promise<CallToolResult> =>
      jsonResult({
        serviceName: SERVER_NAME,
        description: 'Paper research over Semantic Scholar and arXiv, with a local markdown library and PDF text extraction',
        version: SERVER_VERSION,
        availableTools: toolNamesByGroup(),
        pdfProcessingAvailable: true,
        debugMode,
        semanticScholarApiKey: services.semanticScholar.hasApiKey ? 'configured' : 'not configured'
      })
  );
}
