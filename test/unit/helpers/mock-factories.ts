import { ConfigService } from '@nestjs/config';
import { AppConfig, buildAppConfig } from '../../../src/config/configuration';
import { validateEnv } from '../../../src/config/validation.schema';
import { encodeBase64Url } from '../../../src/shared/encoding/base64url';
import { PinoLoggerService, createPinoLogger } from '../../../src/shared/logging/pino-logger.service';

/**
 * Test factories shared across unit specs
 */

/**
 * Create a ConfigService backed by the validated environment schema.
 * Unset variables fall back to the schema defaults.
 */
export function createTestConfigService(
  env: Record<string, string> = {},
): ConfigService<AppConfig, true> {
  const config = buildAppConfig(
    validateEnv({ NODE_ENV: 'test', LOG_LEVEL: 'silent', ...env }),
  );
  return new ConfigService<AppConfig, true>(config);
}

/**
 * Create a silent logger. Spy on its methods to assert on log calls; loggers
 * derived through `withContext` and `forRequest` inherit the spies.
 */
export function createTestLogger(
  config: ConfigService<AppConfig, true> = createTestConfigService(),
): PinoLoggerService {
  return new PinoLoggerService(createPinoLogger(config));
}

export interface ProcessingPathParts {
  token?: string;
  resize?: string;
  width?: string;
  height?: string;
  gravity?: string;
  enlarge?: string;
  sourceUrl?: string;
  extension?: string;
}

/**
 * Build `/<token>/<resize>/<width>/<height>/<gravity>/<enlarge>/<b64url>[.<ext>]`
 */
export function buildProcessingPath(parts: ProcessingPathParts = {}): string {
  const {
    token = 'test-token',
    resize = 'fit',
    width = '100',
    height = '100',
    gravity = 'ce',
    enlarge = '0',
    sourceUrl = 'https://images.example.com/cat.jpg',
    extension,
  } = parts;

  const encoded = encodeBase64Url(Buffer.from(sourceUrl));
  const filename = extension === undefined ? encoded : `${encoded}.${extension}`;

  return `/${token}/${resize}/${width}/${height}/${gravity}/${enlarge}/${filename}`;
}

/**
 * Resolve on the next macrotask, after pending promise callbacks have run.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * A promise whose settlement is driven by the test.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
