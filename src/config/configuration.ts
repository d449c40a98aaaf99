/**
 * Application Configuration
 *
 * Loads environment variables, validates them with the zod schema in
 * `validation.schema.ts` and maps them into the typed {@link AppConfig}.
 * The result is loaded once by `@nestjs/config` and never mutated afterwards.
 *
 * ## Usage:
 * ```typescript
 * constructor(@Inject(ConfigService) private config: ConfigService<AppConfig, true>) {}
 *
 * const { concurrency } = this.config.get('server', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  /**
   * Request handling limits.
   *
   * ### concurrency (Environment: CONCURRENCY)
   * - Number of requests allowed inside the processing pipeline at once
   * - Requests beyond it wait for a slot; there is no separate queue limit
   * - **Recommended**: 2x the CPU count available to the container
   *
   * ### writeTimeoutMs (Environment: WRITE_TIMEOUT, seconds)
   * - Total budget of a request, measured from arrival
   * - Checked between pipeline stages; an in-flight fetch or transform is not interrupted
   *
   * ### downloadTimeoutMs (Environment: DOWNLOAD_TIMEOUT, seconds)
   * - Headers and body timeout of the source download
   *
   * ### ttlSeconds (Environment: TTL)
   * - Lifetime advertised through `Expires` and `Cache-Control`
   */
  server: {
    concurrency: number;
    writeTimeoutMs: number;
    downloadTimeoutMs: number;
    ttlSeconds: number;
  };
  security: {
    secret: string;
    key: Buffer;
    salt: Buffer;
    maxSrcDimension: number;
    maxSrcResolution: number;
    maxSrcFileSizeBytes: number;
  };
  processing: {
    quality: number;
    gzipCompression: number;
    jpegProgressive: boolean;
    pngInterlaced: boolean;
    etagEnabled: boolean;
    baseUrl: string;
  };
}

export function buildAppConfig(env: EnvConfig): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    server: {
      concurrency: env.CONCURRENCY,
      writeTimeoutMs: Math.round(env.WRITE_TIMEOUT * 1000),
      downloadTimeoutMs: Math.round(env.DOWNLOAD_TIMEOUT * 1000),
      ttlSeconds: env.TTL,
    },
    security: {
      secret: env.SECRET,
      key: Buffer.from(env.KEY, 'hex'),
      salt: Buffer.from(env.SALT, 'hex'),
      maxSrcDimension: env.MAX_SRC_DIMENSION,
      // Megapixels
      maxSrcResolution: Math.round(env.MAX_SRC_RESOLUTION * 1_000_000),
      maxSrcFileSizeBytes: Math.round(env.MAX_SRC_FILE_SIZE_MB * 1024 * 1024),
    },
    processing: {
      quality: env.QUALITY,
      gzipCompression: env.GZIP_COMPRESSION,
      jpegProgressive: env.JPEG_PROGRESSIVE,
      pngInterlaced: env.PNG_INTERLACED,
      etagEnabled: env.USE_ETAG,
      baseUrl: env.IMAGE_BASE_URL,
    },
  };
}

export default (): AppConfig => buildAppConfig(validateEnv(process.env));
