import { buildCacheKey, type QueryParams } from './cache-key.js';
import type { Operation } from './endpoints.js';
import { silentLogger, type Logger } from './logger.js';
import type { ResponseCache } from './response-cache.js';
import type { Payload, UpstreamClient } from './upstream-client.js';

export interface ToolCall {
  operation: Operation;
  params: QueryParams;
  /** Top-level property of the upstream payload that the tool returns. */
  field: string;
  /** Returned instead of the JSON text when the field is empty; omit to always return the field. */
  emptyMessage?: string;
  /** Real-time quotes skip the cache entirely. */
  useCache: boolean;
}

export interface ToolRouterDeps {
  cache: ResponseCache<Payload>;
  client: UpstreamClient;
  logger?: Logger;
}

export class ToolRouter {
  private readonly cache: ResponseCache<Payload>;
  private readonly client: UpstreamClient;
  private readonly logger: Logger;

  constructor(deps: ToolRouterDeps) {
    this.cache = deps.cache;
    this.client = deps.client;
    this.logger = deps.logger ?? silentLogger;
  }

  async invoke(call: ToolCall, signal?: AbortSignal): Promise<string> {
    const fetchPayload = () => this.client.fetch(call.operation, call.params, { signal });

    let payload: Payload;
    if (call.useCache) {
      payload = await this.cache.getOrFetch(buildCacheKey(call.operation, call.params), fetchPayload);
    } else {
      this.logger.debug(`Bypassing cache for ${call.operation}`);
      payload = await fetchPayload();
    }

    const value = payload[call.field];
    if (call.emptyMessage !== undefined && isEmpty(value)) {
      return call.emptyMessage;
    }
    return JSON.stringify(value ?? [], null, 2);
  }
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}
