import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { compactParams, type QueryParams } from './cache-key.js';
import { ENDPOINTS, type Operation } from './endpoints.js';
import { RequestAbortedError, UpstreamError, UpstreamTimeoutError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export type Payload = Record<string, unknown>;

export type HealthStatus = 'OK' | 'DEGRADED' | 'ERROR';

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface UpstreamClient {
  fetch(operation: Operation, params: QueryParams, options?: FetchOptions): Promise<Payload>;
  checkHealth(): Promise<HealthStatus>;
}

export type UpstreamClientConfig = Pick<
  AppConfig,
  'apiKey' | 'baseUrl' | 'requestTimeoutSeconds' | 'healthCheckTimeoutSeconds'
>;

export interface UpstreamClientOptions {
  http?: AxiosInstance;
  logger?: Logger;
}

const payloadSchema = z.record(z.unknown());

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function createUpstreamClient(
  config: UpstreamClientConfig,
  options: UpstreamClientOptions = {}
): UpstreamClient {
  const http = options.http ?? axios.create();
  const logger = options.logger ?? silentLogger;
  const timeoutMs = Math.round(config.requestTimeoutSeconds * 1000);
  const healthTimeoutMs = Math.round(config.healthCheckTimeoutSeconds * 1000);

  return {
    async fetch(operation, params, fetchOptions = {}) {
      const path = ENDPOINTS[operation];
      logger.info(`Making request to: ${config.baseUrl}${path}`);

      let response: AxiosResponse<unknown>;
      try {
        response = await http.get<unknown>(path, {
          baseURL: config.baseUrl,
          params: compactParams(params),
          headers: { 'X-API-KEY': config.apiKey },
          timeout: timeoutMs,
          signal: fetchOptions.signal,
          validateStatus: () => true
        });
      } catch (error) {
        throw translateError(error, operation, timeoutMs);
      }

      if (response.status < 200 || response.status >= 300) {
        const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
        throw new UpstreamError(`HTTP ${response.status} error: ${body}`, { status: response.status });
      }

      const parsed = payloadSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new UpstreamError(`Malformed response from ${path}: expected a JSON object`, {
          status: response.status
        });
      }

      logger.info(`Successfully retrieved data from ${config.baseUrl}${path}`);
      return parsed.data;
    },

    async checkHealth() {
      try {
        const response = await http.get<unknown>(config.baseUrl, {
          timeout: healthTimeoutMs,
          validateStatus: () => true
        });
        return response.status === 200 ? 'OK' : 'DEGRADED';
      } catch (error) {
        logger.warn(`Health check failed: ${errorMessage(error)}`);
        return 'ERROR';
      }
    }
  };
}

function translateError(error: unknown, operation: Operation, timeoutMs: number): Error {
  if (axios.isCancel(error)) {
    return new RequestAbortedError(operation, { cause: error });
  }
  if (axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
    return new UpstreamTimeoutError(timeoutMs, { cause: error });
  }
  return new UpstreamError(`Unexpected error: ${errorMessage(error)}`, { cause: error });
}
