/**
 * API configuration, read from the environment.
 *
 *   PORT              — HTTP port (default: 8080)
 *   HOST              — bind address (default: 0.0.0.0)
 *   QUERY_TIMEOUT_MS  — deadline for one cross-location query (default: 5000)
 *   CORS_ORIGIN       — allowed origin (default: *)
 *   JSON_BODY_LIMIT   — max request body size (default: 1mb)
 *   HTTP_LOG_FORMAT   — morgan format, or "off" (default: combined)
 */

import { z } from 'zod';
import { DEFAULT_QUERY_TIMEOUT_MS } from '../services/aggregation/query-coordinator.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_QUERY_TIMEOUT_MS),
  CORS_ORIGIN: z.string().min(1).default('*'),
  JSON_BODY_LIMIT: z.string().min(1).default('1mb'),
  HTTP_LOG_FORMAT: z.string().min(1).default('combined'),
});

export interface AppConfig {
  port: number;
  host: string;
  queryTimeoutMs: number;
  corsOrigin: string;
  jsonBodyLimit: string;
  /** null when request logging is off */
  httpLogFormat: string | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    queryTimeoutMs: parsed.QUERY_TIMEOUT_MS,
    corsOrigin: parsed.CORS_ORIGIN,
    jsonBodyLimit: parsed.JSON_BODY_LIMIT,
    httpLogFormat: parsed.HTTP_LOG_FORMAT === 'off' ? null : parsed.HTTP_LOG_FORMAT,
  };
}
