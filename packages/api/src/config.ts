/**
 * API configuration from environment
 */

import { z } from 'zod';
import { DEFAULT_MAX_PROJECTED_TRADES } from '@recovery-roadmap/engine';
import { toValidationIssues, type LogLevel } from '@recovery-roadmap/shared';

export const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:3001'];

const ApiEnvSchema = z.object({
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  API_HOST: z.string().min(1).default('0.0.0.0'),
  CORS_ORIGINS: z.string().default(DEFAULT_CORS_ORIGINS.join(',')),
  MAX_PROJECTED_TRADES: z.coerce.number().int().positive().default(DEFAULT_MAX_PROJECTED_TRADES),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['error', 'warn', 'info', 'debug']))
    .default('info'),
  LOG_TO_FILE: z.enum(['true', 'false']).default('true'),
});

export interface ApiConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  maxProjectedTrades: number;
  logLevel: LogLevel;
  logToFile: boolean;
}

/**
 * Load configuration from environment
 *
 * @throws Error listing every invalid variable
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = ApiEnvSchema.safeParse(env);

  if (!parsed.success) {
    const details = toValidationIssues(parsed.error)
      .map((issue) => `${issue.field}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid API configuration: ${details}`);
  }

  const vars = parsed.data;

  return {
    port: vars.API_PORT,
    host: vars.API_HOST,
    corsOrigins: vars.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    maxProjectedTrades: vars.MAX_PROJECTED_TRADES,
    logLevel: vars.LOG_LEVEL,
    logToFile: vars.LOG_TO_FILE === 'true',
  };
}
