import { describe, it, expect } from 'vitest';
import { buildAppConfig } from '../../../src/config/configuration';
import { validateEnv } from '../../../src/config/validation.schema';

describe('Environment configuration', () => {
  describe('validateEnv', () => {
    it('should apply defaults for every unset variable', () => {
      const env = validateEnv({});

      expect(env).toMatchObject({
        NODE_ENV: 'development',
        PORT: 8080,
        LOG_LEVEL: 'info',
        CONCURRENCY: 16,
        WRITE_TIMEOUT: 10,
        DOWNLOAD_TIMEOUT: 5,
        TTL: 3600,
        SECRET: '',
        KEY: '',
        SALT: '',
        QUALITY: 80,
        GZIP_COMPRESSION: 5,
        JPEG_PROGRESSIVE: false,
        PNG_INTERLACED: false,
        USE_ETAG: false,
        IMAGE_BASE_URL: '',
      });
    });

    it('should coerce numbers and boolean flags', () => {
      const env = validateEnv({
        CONCURRENCY: '4',
        USE_ETAG: 'true',
        JPEG_PROGRESSIVE: '1',
        PNG_INTERLACED: '0',
      });

      expect(env.CONCURRENCY).toBe(4);
      expect(env.USE_ETAG).toBe(true);
      expect(env.JPEG_PROGRESSIVE).toBe(true);
      expect(env.PNG_INTERLACED).toBe(false);
    });

    it('should ignore unrelated variables', () => {
      expect(() => validateEnv({ HOME: '/root', PATH: '/usr/bin' })).not.toThrow();
    });

    it('should ignore a generic BASE_URL set by the surrounding tooling', () => {
      expect(validateEnv({ BASE_URL: '/' }).IMAGE_BASE_URL).toBe('');
    });

    it('should accept an absolute http(s) source prefix', () => {
      expect(validateEnv({ IMAGE_BASE_URL: 'https://cdn.example.com/' }).IMAGE_BASE_URL).toBe(
        'https://cdn.example.com/',
      );
    });

    it.each([
      ['a bare slash', '/'],
      ['a relative prefix', 'images/'],
      ['a non-http scheme', 'ftp://files.example.com/'],
    ])('should reject %s as the source prefix', (_name, prefix) => {
      expect(() => validateEnv({ IMAGE_BASE_URL: prefix })).toThrow(
        'IMAGE_BASE_URL: must be empty or an absolute http(s) URL prefix',
      );
    });

    it.each([
      ['a zero concurrency', { CONCURRENCY: '0' }, 'CONCURRENCY'],
      ['an out-of-range gzip level', { GZIP_COMPRESSION: '10' }, 'GZIP_COMPRESSION'],
      ['a non-numeric timeout', { WRITE_TIMEOUT: 'soon' }, 'WRITE_TIMEOUT'],
      ['a malformed boolean', { USE_ETAG: 'yes' }, 'USE_ETAG'],
      ['a non-hex key', { KEY: 'zz', SALT: '00' }, 'KEY'],
    ])('should reject %s', (_name, input, field) => {
      expect(() => validateEnv(input)).toThrow(`  - ${field}:`);
    });

    it('should require KEY and SALT together', () => {
      expect(() => validateEnv({ KEY: '736563726574' })).toThrow(
        'KEY: KEY and SALT must be set together',
      );
    });
  });

  describe('buildAppConfig', () => {
    it('should convert units', () => {
      const config = buildAppConfig(
        validateEnv({
          WRITE_TIMEOUT: '2.5',
          DOWNLOAD_TIMEOUT: '1',
          MAX_SRC_RESOLUTION: '16.8',
          MAX_SRC_FILE_SIZE_MB: '10',
        }),
      );

      expect(config.server.writeTimeoutMs).toBe(2500);
      expect(config.server.downloadTimeoutMs).toBe(1000);
      expect(config.security.maxSrcResolution).toBe(16_800_000);
      expect(config.security.maxSrcFileSizeBytes).toBe(10_485_760);
    });

    it('should decode hex key and salt', () => {
      const config = buildAppConfig(validateEnv({ KEY: '736563726574', SALT: '68656c6c6f' }));

      expect(config.security.key.toString('utf8')).toBe('secret');
      expect(config.security.salt.toString('utf8')).toBe('hello');
    });
  });
});
