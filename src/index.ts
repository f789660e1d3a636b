#!/usr/bin/env node
import type { Server } from 'http';
import * as dotenv from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, type AppConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { createHttpApp, listen } from './http-server.js';
import { createLogger, type Logger } from './logger.js';
import { ResponseCache } from './response-cache.js';
import { createFinancialServer } from './server.js';
import { ToolRouter } from './tool-router.js';
import { createUpstreamClient, type Payload } from './upstream-client.js';

async function main(config: Readonly<AppConfig>, logger: Logger) {
  logger.info('🚀 Starting Financial Datasets MCP Server...');
  logger.info(`Cache enabled with TTL: ${config.cacheTtlMinutes} minutes`);
  logger.info(`Transport type: ${config.transport}`);

  const cache = new ResponseCache<Payload>({ ttlMinutes: config.cacheTtlMinutes, logger });
  if (config.cacheSweepIntervalSeconds > 0) {
    cache.startSweep(config.cacheSweepIntervalSeconds * 1000);
  }
  const client = createUpstreamClient(config, { logger });
  const router = new ToolRouter({ cache, client, logger });
  const createServer = () => createFinancialServer(router, logger);

  let httpServer: Server | null = null;
  const shutdown = (signal: string) => {
    logger.info(`🛑 Received ${signal}, shutting down`);
    cache.dispose();
    if (httpServer) {
      httpServer.close(() => process.exit(0));
    } else {
      process.exit(0);
    }
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  if (config.transport === 'stdio') {
    await createServer().connect(new StdioServerTransport());
    logger.info('✅ MCP server listening on stdio');
    return;
  }

  const app = createHttpApp({ config, cache, client, createServer, logger });
  httpServer = await listen(app, config.host, config.port);
  const endpoint = config.transport === 'sse' ? '/sse' : '/mcp';
  logger.info(`✅ MCP server listening on http://${config.host}:${config.port}${endpoint}`);
}

dotenv.config({ quiet: true });

function readConfig(): Readonly<AppConfig> {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const logger = createLogger('financial-datasets-mcp', config.logLevel);
main(config, logger).catch((error: unknown) => {
  logger.error(`❌ Failed to start server: ${errorMessage(error)}`, error);
  process.exit(1);
});
