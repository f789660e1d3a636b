import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Logger } from './logger.js';
import type { ToolRouter } from './tool-router.js';
import { registerFinancialTools } from './tools.js';

export const SERVER_NAME = 'financial-datasets';
export const SERVER_VERSION = '0.2.0';

// HTTP transports build one server per session; all of them share the router, and so the cache.
export function createFinancialServer(router: ToolRouter, logger?: Logger): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });
  registerFinancialTools(server, router, logger);
  return server;
}
