// Environment validation using Zod
import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((v) => v === 'true');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Swagger/metadata
  SWAGGER_TITLE: z.string().default('Ze Partners API'),
  SWAGGER_VERSION: z.string().default('0.1.0'),

  // Partner storage
  PARTNERS_STORE: z.enum(['file', 'memory']).default('file'),
  PARTNERS_DATA_FILE: z.string().min(1).default('partners.json'),
  SPATIAL_CELL_DEGREES: z.coerce.number().positive().max(90).default(1),

  // Cache
  REDIS_URL: z.string().url().optional(),
  CACHE_ENABLED: booleanFlag,
  CACHE_NS_VERSION: z.string().default('v1'),
  CACHE_TTL_NEAREST: z.coerce.number().int().nonnegative().default(120),

  // HTTP
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000,http://127.0.0.1:3000')
    .transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean)),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  // Logger is not available yet: it is configured from this module.
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.flattenError(parsed.error).fieldErrors);
  throw new Error('ENV validation failed');
}

export const config = {
  ...parsed.data,
};

export type AppConfig = typeof config;
