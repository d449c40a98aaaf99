import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { FingerprintPort } from '../../../application/ports/output/fingerprint.port';
import { AppConfig } from '../../../config/configuration';
import {
  ProcessingOptions,
  serializeProcessingOptions,
} from '../../../domain/value-objects/processing-options.vo';

/**
 * SHA-256 Fingerprint Adapter
 *
 * ETag = quoted hex SHA-256 over the source digest, the serialized options
 * and the encoder settings that change the output bytes.
 */
@Injectable()
export class Sha256FingerprintAdapter implements FingerprintPort {
  private readonly encoderSettings: string;

  constructor(
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
  ) {
    const processing = configService.get('processing', { infer: true });
    this.encoderSettings = [
      `quality:${processing.quality}`,
      `progressive:${processing.jpegProgressive ? 1 : 0}`,
      `interlaced:${processing.pngInterlaced ? 1 : 0}`,
    ].join(';');
  }

  compute(data: Buffer, options: ProcessingOptions): string {
    const sourceDigest = createHash('sha256').update(data).digest();

    const digest = createHash('sha256')
      .update(sourceDigest)
      .update(serializeProcessingOptions(options))
      .update(this.encoderSettings)
      .digest('hex');

    return `"${digest}"`;
  }
}
