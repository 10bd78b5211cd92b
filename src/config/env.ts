import path from 'path';
import { z } from 'zod';

// Empty strings in .env files mean "not set"
const unsetIfEmpty = (value: unknown): unknown => (value === '' ? undefined : value);

const envSchema = z.object({
  NODE_ENV: z.preprocess(unsetIfEmpty, z.enum(['development', 'production', 'test']).default('development')),
  PORT: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(1).max(65535).default(8000)),
  HOST: z.preprocess(unsetIfEmpty, z.string().default('0.0.0.0')),
  MONGODB_URL: z.preprocess(unsetIfEmpty, z.string().default('mongodb://localhost:27017/streamhub')),
  STATIC_DIR: z.preprocess(unsetIfEmpty, z.string().optional()),
  ASSETS_DIR: z.preprocess(unsetIfEmpty, z.string().optional()),
  PUBLIC_BASE_URL: z.preprocess(unsetIfEmpty, z.string().url('PUBLIC_BASE_URL must be an absolute URL').optional()),
  CORS_ORIGIN: z.preprocess(unsetIfEmpty, z.string().default('*')),
  MAX_BANNER_SIZE_MB: z.preprocess(unsetIfEmpty, z.coerce.number().positive().default(5)),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  host: string;
  mongodbUrl: string;
  /** Directory served under /static/; banners live in its banners/ subdirectory */
  staticDir: string;
  /** Client scripts served under /assets/ */
  assetsDir: string;
  /** Scheme and host used for absolute URLs; null means "take it from the request" */
  publicBaseUrl: string | null;
  corsOrigins: string[] | '*';
  maxBannerSize: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const origins = parsed.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    mongodbUrl: parsed.MONGODB_URL,
    staticDir: path.resolve(process.cwd(), parsed.STATIC_DIR ?? 'static'),
    assetsDir: path.resolve(process.cwd(), parsed.ASSETS_DIR ?? 'public'),
    publicBaseUrl: parsed.PUBLIC_BASE_URL ? parsed.PUBLIC_BASE_URL.replace(/\/+$/, '') : null,
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
    maxBannerSize: Math.round(parsed.MAX_BANNER_SIZE_MB * 1024 * 1024),
  };
}
