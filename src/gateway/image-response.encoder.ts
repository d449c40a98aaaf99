import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FastifyReply } from 'fastify';
import { promisify } from 'util';
import { gzip } from 'zlib';
import { ProcessImageResult } from '../application/ports/input/process-image.port';
import { AppConfig } from '../config/configuration';
import { IMAGE_MIME_TYPES } from '../domain/value-objects/image-format.vo';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { REQUEST_ID_HEADER } from '../shared/logging/request-id';

const gzipAsync = promisify(gzip);

/**
 * Whether `Accept-Encoding` lists gzip (or `*`) with a non-zero quality.
 */
export function acceptsGzip(acceptEncoding: string | undefined): boolean {
  if (!acceptEncoding) {
    return false;
  }

  return acceptEncoding.split(',').some((entry) => {
    const [coding, ...params] = entry.trim().toLowerCase().split(';');
    if (coding.trim() !== 'gzip' && coding.trim() !== '*') {
      return false;
    }

    const quality = params
      .map((param) => param.trim())
      .find((param) => param.startsWith('q='));

    return quality === undefined || Number.parseFloat(quality.slice(2)) > 0;
  });
}

/**
 * Image Response Encoder
 * Writes caching headers, negotiates gzip and sends the processed image
 */
@Injectable()
export class ImageResponseEncoder {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService<AppConfig, true>,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.logger = logger.withContext(ImageResponseEncoder.name);
  }

  async send(
    reply: FastifyReply,
    result: ProcessImageResult,
    acceptEncoding: string | undefined,
  ): Promise<void> {
    const { ttlSeconds } = this.configService.get('server', { infer: true });
    const { gzipCompression } = this.configService.get('processing', { infer: true });

    reply.header('Expires', new Date(Date.now() + ttlSeconds * 1000).toUTCString());
    reply.header('Cache-Control', `max-age=${ttlSeconds}, public`);
    reply.header('Content-Type', IMAGE_MIME_TYPES[result.format]);
    reply.header(REQUEST_ID_HEADER, result.requestId);
    if (result.etag !== undefined) {
      reply.header('ETag', result.etag);
    }

    let body = result.data;
    if (gzipCompression > 0 && acceptsGzip(acceptEncoding)) {
      body = await gzipAsync(result.data, { level: gzipCompression });
      reply.header('Content-Encoding', 'gzip');
      reply.header('Vary', 'Accept-Encoding');
    }

    reply.code(200).send(body);

    this.logger.info(
      {
        requestId: result.requestId,
        status: 200,
        durationMs: result.durationMs,
        sourceUrl: result.sourceUrl,
        options: result.options,
      },
      'Processed image',
    );
  }
}
