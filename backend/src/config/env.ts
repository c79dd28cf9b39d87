/**
 * Environment
 *
 * Parsed once from process.env. Entry points load `dotenv/config` before
 * importing this module; nothing below the entry points reads process.env.
 */

import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const boolFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform(v => (v === undefined ? fallback : v === 'true' || v === '1'));

const optionalSecret = z
  .string()
  .optional()
  .transform(v => (v && v.trim().length > 0 ? v.trim() : undefined));

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  DB_NAME: z.string().default('market_data'),

  BLS_ENABLED: boolFlag(true),
  BLS_API_KEY: optionalSecret,
  METALS_ENABLED: boolFlag(true),
  METALS_API_KEY: optionalSecret,
  FRED_ENABLED: boolFlag(true),
  FRED_API_KEY: optionalSecret,

  INGEST_CRON: z.string().default('15 6 * * *'),
  INGEST_CRON_ENABLED: boolFlag(false),
  INGEST_PARALLEL_SERIES: boolFlag(false),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }
  return parsed.data;
}

let cached: Env | null = null;

export function loadEnv(): Env {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}
