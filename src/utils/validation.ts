import { z } from 'zod';

// Environment variables validation schema
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(val => parseInt(val, 10)).default('3000'),

  // Redis
  REDIS_URL: z.string().url(),

  // OAuth2 Credentials
  GOOGLE_CLIENT_ID: z.string().min(1),
  GOOGLE_CLIENT_SECRET: z.string().min(1),
  GOOGLE_REDIRECT_URI: z.string().url().optional(),

  // Security
  ENCRYPTION_KEY: z.string().min(32, 'Encryption key must be at least 32 characters'),
  JWT_SECRET: z.string().min(32, 'JWT secret must be at least 32 characters'),

  // Scan Configuration
  FETCH_CONCURRENCY: z.string().transform(val => parseInt(val, 10)).pipe(z.number().int().min(1).max(50)).default('10'),
  SCAN_PAGE_SIZE: z.string().transform(val => parseInt(val, 10)).pipe(z.number().int().min(1).max(500)).default('100'),
  SCAN_MAX_MESSAGES: z.string().transform(val => parseInt(val, 10)).pipe(z.number().int().min(1)).default('2000'),
  SCAN_TTL_SECONDS: z.string().transform(val => parseInt(val, 10)).pipe(z.number().int().min(60)).default('3600'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Environment = z.infer<typeof envSchema>;

export type ScanDefaults = Pick<Environment, 'FETCH_CONCURRENCY' | 'SCAN_PAGE_SIZE' | 'SCAN_MAX_MESSAGES' | 'SCAN_TTL_SECONDS'>;

const scanDefaultsSchema = envSchema.pick({
  FETCH_CONCURRENCY: true,
  SCAN_PAGE_SIZE: true,
  SCAN_MAX_MESSAGES: true,
  SCAN_TTL_SECONDS: true,
});

/**
 * Scan settings from the environment. Any invalid value makes all four fall
 * back to their defaults; startup validation reports it separately.
 */
export function getScanDefaults(env: NodeJS.ProcessEnv = process.env): ScanDefaults {
  const result = scanDefaultsSchema.safeParse(env);
  return result.success ? result.data : scanDefaultsSchema.parse({});
}

// Request validation schemas
export const schemas = {
  accountId: z.object({
    accountId: z.string().email('Invalid account ID format'),
  }),

  // OAuth callback query
  oauthCallback: z.object({
    code: z.string().optional(),
    state: z.string(),
    error: z.string().optional(),
    error_description: z.string().optional(),
  }),
};
