import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

// Prepended verbatim to every decoded source URL
const sourceUrlPrefix = z
  .string()
  .default('')
  .refine(
    (value) => value === '' || (/^https?:\/\//i.test(value) && URL.canParse(value)),
    'must be empty or an absolute http(s) URL prefix',
  );

const hexString = z
  .string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/, 'must be an even-length hex string')
  .default('');

export const envSchema = z
  .object({
    // Core
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // Server
    CONCURRENCY: z.coerce.number().int().min(1).default(16),
    WRITE_TIMEOUT: z.coerce.number().positive().default(10),
    DOWNLOAD_TIMEOUT: z.coerce.number().positive().default(5),
    TTL: z.coerce.number().int().min(0).default(3600),

    // Security
    SECRET: z.string().default(''),
    KEY: hexString,
    SALT: hexString,
    MAX_SRC_DIMENSION: z.coerce.number().int().min(1).default(8192),
    MAX_SRC_RESOLUTION: z.coerce.number().positive().default(16.8),
    MAX_SRC_FILE_SIZE_MB: z.coerce.number().positive().default(10),

    // Processing
    QUALITY: z.coerce.number().int().min(1).max(100).default(80),
    GZIP_COMPRESSION: z.coerce.number().int().min(0).max(9).default(5),
    JPEG_PROGRESSIVE: booleanFlag,
    PNG_INTERLACED: booleanFlag,
    USE_ETAG: booleanFlag,
    IMAGE_BASE_URL: sourceUrlPrefix,
  })
  .refine((env) => (env.KEY === '') === (env.SALT === ''), {
    message: 'KEY and SALT must be set together',
    path: ['KEY'],
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
