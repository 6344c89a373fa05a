import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),

  // Price sources
  PRICECHARTING_API_KEY: optionalSecret,
  SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Disambiguation oracle
  GEMINI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  DISAMBIGUATION_THRESHOLD: z.coerce.number().int().nonnegative().default(3),
  DISAMBIGUATION_MAX_CANDIDATES: z.coerce.number().int().positive().default(20),

  // Currency
  FX_API_URL: z.string().url().default('https://api.frankfurter.app'),
  FX_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  FX_FALLBACK_RATE: z.coerce.number().positive().default(150),
  SOURCE_CURRENCY: z.string().length(3).default('USD'),
  TARGET_CURRENCY: z.string().length(3).default('JPY'),

  // Cache + batch
  APPRAISAL_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  BATCH_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1_100),
  BATCH_PROGRESS_EVERY: z.coerce.number().int().positive().default(500),
  PRICE_TRACKER_TIMEZONE: z.string().default('Asia/Tokyo'),
});

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
