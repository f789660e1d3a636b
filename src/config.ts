import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const TRANSPORTS = ['stdio', 'sse', 'streamable-http'] as const;
export type TransportType = (typeof TRANSPORTS)[number];

export interface AppConfig {
  apiKey: string;
  baseUrl: string;
  requestTimeoutSeconds: number;
  healthCheckTimeoutSeconds: number;
  logLevel: LogLevel;
  transport: TransportType;
  host: string;
  port: number;
  cacheTtlMinutes: number;
  cacheSweepIntervalSeconds: number;
}

const logLevelSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .transform((value) => (value === 'WARN' ? 'WARNING' : value))
  .pipe(z.enum(LOG_LEVELS));

const envSchema = z.object({
  FINANCIAL_DATASETS_API_KEY: z.string({ required_error: 'is required' }),
  FINANCIAL_DATASETS_API_BASE: z
    .string()
    .url()
    .default('https://api.financialdatasets.ai')
    .transform((value) => value.replace(/\/+$/, '')),
  API_TIMEOUT: z.coerce.number().positive().default(30),
  HEALTH_CHECK_TIMEOUT: z.coerce.number().positive().default(5),
  LOG_LEVEL: logLevelSchema.default('INFO'),
  MCP_TRANSPORT: z.enum(TRANSPORTS).default('stdio'),
  MCP_HOST: z.string().default('127.0.0.1'),
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CACHE_TTL_MINUTES: z.coerce.number().positive().default(10),
  CACHE_SWEEP_INTERVAL_SECONDS: z.coerce.number().min(0).default(0)
});

/**
 * Builds the process-wide settings from environment variables. Call once at
 * startup, after `.env` has been loaded; the result is frozen and nothing
 * re-reads the environment afterwards.
 *
 * @throws ConfigurationError listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const values = parsed.data;
  return Object.freeze({
    apiKey: values.FINANCIAL_DATASETS_API_KEY,
    baseUrl: values.FINANCIAL_DATASETS_API_BASE,
    requestTimeoutSeconds: values.API_TIMEOUT,
    healthCheckTimeoutSeconds: values.HEALTH_CHECK_TIMEOUT,
    logLevel: values.LOG_LEVEL,
    transport: values.MCP_TRANSPORT,
    host: values.MCP_HOST,
    port: values.MCP_PORT,
    cacheTtlMinutes: values.CACHE_TTL_MINUTES,
    cacheSweepIntervalSeconds: values.CACHE_SWEEP_INTERVAL_SECONDS
  });
}
