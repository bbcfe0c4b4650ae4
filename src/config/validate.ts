/**
 * Configuration Validation for SDN Lookup Service
 *
 * Validates all environment variables on startup and maps them onto the
 * typed settings consumed by the dataset engine and the HTTP layer.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { logger } from '../utils/logger';

export const DEFAULT_SDN_SOURCE_URL =
  'https://data.opensanctions.org/datasets/20250806/us_sdn/targets.simple.csv';

// =============================================================================
// ENVIRONMENT SCHEMA
// =============================================================================

const booleanString = z.enum(['true', 'false']).transform(value => value === 'true');

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3020),
  HOST: z.string().default('0.0.0.0'),
  TRUST_PROXY: booleanString.default('false'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),

  // CORS
  CORS_ORIGIN: z.string().default('*'),

  // Dataset source
  SDN_SOURCE_URL: z.string().min(1).default(DEFAULT_SDN_SOURCE_URL),
  SDN_FETCH_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),
  SDN_MAX_DOWNLOAD_BYTES: z.coerce.number().int().min(1024).default(100 * 1024 * 1024),

  // Cache & refresh
  SDN_CACHE_TTL_MS: z.coerce.number().int().min(1000).default(6 * 60 * 60 * 1000),
  SDN_REFRESH_BACKOFF_MS: z.coerce.number().int().min(1000).default(60000),
  SDN_REFRESH_MAX_BACKOFF_MS: z.coerce.number().int().min(1000).default(15 * 60 * 1000),
  SDN_STALE_POLICY: z.enum(['serve-stale', 'wait-for-refresh']).default('serve-stale'),
  SDN_WARM_ON_START: booleanString.default('true'),

  // Parsing & querying
  SDN_MAX_SKIP_RATIO: z.coerce.number().min(0).max(1).default(0.1),
  SDN_RESULT_LIMIT: z.coerce.number().int().min(1).max(10000).default(100)
});

export type EnvConfig = z.infer<typeof envSchema>;

export type StalePolicy = EnvConfig['SDN_STALE_POLICY'];

export interface AppConfig {
  env: EnvConfig['NODE_ENV'];
  port: number;
  host: string;
  trustProxy: boolean;
  corsOrigin: string;
  sdn: {
    sourceUrl: string;
    fetchTimeoutMs: number;
    maxDownloadBytes: number;
    cacheTtlMs: number;
    refreshBackoffMs: number;
    refreshMaxBackoffMs: number;
    stalePolicy: StalePolicy;
    warmOnStart: boolean;
    maxSkipRatio: number;
    resultLimit: number;
  };
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parse an environment map into typed configuration.
 * Throws ConfigurationError listing every offending variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
      code: issue.code
    })));
  }

  const parsed = result.data;

  if (parsed.SDN_REFRESH_MAX_BACKOFF_MS < parsed.SDN_REFRESH_BACKOFF_MS) {
    throw new ConfigurationError([{
      field: 'SDN_REFRESH_MAX_BACKOFF_MS',
      message: 'must be greater than or equal to SDN_REFRESH_BACKOFF_MS'
    }]);
  }

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    trustProxy: parsed.TRUST_PROXY,
    corsOrigin: parsed.CORS_ORIGIN,
    sdn: {
      sourceUrl: parsed.SDN_SOURCE_URL,
      fetchTimeoutMs: parsed.SDN_FETCH_TIMEOUT_MS,
      maxDownloadBytes: parsed.SDN_MAX_DOWNLOAD_BYTES,
      cacheTtlMs: parsed.SDN_CACHE_TTL_MS,
      refreshBackoffMs: parsed.SDN_REFRESH_BACKOFF_MS,
      refreshMaxBackoffMs: parsed.SDN_REFRESH_MAX_BACKOFF_MS,
      stalePolicy: parsed.SDN_STALE_POLICY,
      warmOnStart: parsed.SDN_WARM_ON_START,
      maxSkipRatio: parsed.SDN_MAX_SKIP_RATIO,
      resultLimit: parsed.SDN_RESULT_LIMIT
    }
  };
}

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

let validatedConfig: AppConfig | null = null;

/**
 * Validate environment configuration, exiting the process when it is invalid
 */
export function validateConfig(): AppConfig {
  if (validatedConfig) {
    return validatedConfig;
  }

  let config: AppConfig;
  try {
    config = parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.issues }, 'Configuration validation failed');
    } else {
      logger.fatal({ err: error }, 'Configuration validation failed');
    }
    process.exit(1);
  }

  if (config.env === 'production' && config.corsOrigin === '*') {
    logger.warn('CORS_ORIGIN is "*" in production - ensure this is intentional');
  }

  logger.info('Configuration validated successfully');
  validatedConfig = config;
  return config;
}
