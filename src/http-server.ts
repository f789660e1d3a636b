import type { Server } from 'http';
import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { AppConfig } from './config.js';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { CacheStats, ResponseCache } from './response-cache.js';
import { SERVER_VERSION } from './server.js';
import type { HealthStatus, Payload, UpstreamClient } from './upstream-client.js';

export interface HttpAppDeps {
  config: Pick<AppConfig, 'transport' | 'cacheTtlMinutes'>;
  cache: ResponseCache<Payload>;
  client: Pick<UpstreamClient, 'checkHealth'>;
  createServer: () => McpServer;
  logger?: Logger;
  now?: () => number;
}

export interface HealthReport {
  status: 'OK';
  timestamp: number;
  api_status: HealthStatus;
  cache_status: 'OK' | 'ERROR';
  cache_stats: CacheStats | { error: string };
  version: string;
}

const epochSeconds = (now: () => number = () => Date.now()) => now() / 1000;

export async function buildHealthReport(
  deps: Pick<HttpAppDeps, 'cache' | 'client' | 'now'>
): Promise<HealthReport> {
  const apiStatus = await deps.client.checkHealth();

  let cacheStatus: HealthReport['cache_status'] = 'OK';
  let cacheStats: HealthReport['cache_stats'];
  try {
    cacheStats = deps.cache.stats();
  } catch (error) {
    cacheStatus = 'ERROR';
    cacheStats = { error: errorMessage(error) };
  }

  return {
    status: 'OK',
    timestamp: epochSeconds(deps.now),
    api_status: apiStatus,
    cache_status: cacheStatus,
    cache_stats: cacheStats,
    version: SERVER_VERSION
  };
}

export function buildCacheStatus(deps: {
  cache: ResponseCache<Payload>;
  config: Pick<AppConfig, 'cacheTtlMinutes'>;
  now?: () => number;
}) {
  return {
    cache_enabled: true,
    cache_ttl_minutes: deps.config.cacheTtlMinutes,
    statistics: deps.cache.stats(),
    timestamp: epochSeconds(deps.now)
  };
}

export function clearCache(deps: Pick<HttpAppDeps, 'cache' | 'now'>) {
  deps.cache.clear();
  return { message: 'Cache cleared successfully', timestamp: epochSeconds(deps.now) };
}

export function cleanupCache(deps: Pick<HttpAppDeps, 'cache' | 'now'>) {
  const removed = deps.cache.cleanupExpired();
  return {
    message: 'Cache cleanup completed',
    expired_entries_removed: removed,
    timestamp: epochSeconds(deps.now)
  };
}

/**
 * Express app serving the MCP endpoints for the configured HTTP transport
 * plus the health and cache operator routes.
 */
export function createHttpApp(deps: HttpAppDeps): Express {
  const logger = deps.logger ?? silentLogger;
  const app = express();

  app.use(cors({ exposedHeaders: ['Mcp-Session-Id'] }));
  app.use(express.json());

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      res.json(await buildHealthReport(deps));
    } catch (error) {
      logger.error('Health check failed', error);
      res.status(500).json({ error: `Health check failed: ${errorMessage(error)}` });
    }
  });

  app.get('/cache/status', (_req: Request, res: Response) => {
    try {
      res.json(buildCacheStatus(deps));
    } catch (error) {
      logger.error(`Error getting cache status: ${errorMessage(error)}`);
      res.status(500).json({ error: `Failed to get cache status: ${errorMessage(error)}` });
    }
  });

  app.post('/cache/clear', (_req: Request, res: Response) => {
    try {
      const body = clearCache(deps);
      logger.info('Cache cleared manually via API');
      res.json(body);
    } catch (error) {
      logger.error(`Error clearing cache: ${errorMessage(error)}`);
      res.status(500).json({ error: `Failed to clear cache: ${errorMessage(error)}` });
    }
  });

  app.post('/cache/cleanup', (_req: Request, res: Response) => {
    try {
      const body = cleanupCache(deps);
      logger.info(`Cache cleanup completed, removed ${body.expired_entries_removed} expired entries`);
      res.json(body);
    } catch (error) {
      logger.error(`Error cleaning up cache: ${errorMessage(error)}`);
      res.status(500).json({ error: `Failed to cleanup cache: ${errorMessage(error)}` });
    }
  });

  if (deps.config.transport === 'sse') {
    mountSse(app, deps.createServer, logger);
  } else {
    mountStreamableHttp(app, deps.createServer, logger);
  }

  return app;
}

function mountStreamableHttp(app: Express, createServer: () => McpServer, logger: Logger): void {
  // Stateless: every POST gets its own server and transport, torn down with the response.
  app.post('/mcp', async (req: Request, res: Response) => {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      transport.close().catch((error: unknown) => logger.warn(`Transport close failed: ${errorMessage(error)}`));
      server.close().catch((error: unknown) => logger.warn(`Server close failed: ${errorMessage(error)}`));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null
        });
      }
    }
  });

  const methodNotAllowed = (_req: Request, res: Response) => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null
    });
  };
  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);
}

function mountSse(app: Express, createServer: () => McpServer, logger: Logger): void {
  const transports = new Map<string, SSEServerTransport>();

  app.get('/sse', async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport('/messages', res);
    transports.set(transport.sessionId, transport);
    res.on('close', () => {
      transports.delete(transport.sessionId);
      logger.debug(`SSE session closed: ${transport.sessionId}`);
    });

    try {
      await createServer().connect(transport);
      logger.info(`SSE session opened: ${transport.sessionId}`);
    } catch (error) {
      transports.delete(transport.sessionId);
      logger.error('Error opening SSE session', error);
    }
  });

  app.post('/messages', async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : '';
    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(400).send('No transport found for sessionId');
      return;
    }
    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (error) {
      logger.error(`Error handling SSE message for ${sessionId}`, error);
      if (!res.headersSent) res.status(500).send('Internal server error');
    }
  });
}

export function listen(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}
