import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  FetchedSource,
  SourceFetcherPort,
} from '../../../application/ports/output/source-fetcher.port';
import { AppConfig } from '../../../config/configuration';
import { detectImageFormat } from '../../../domain/value-objects/image-format.vo';
import { HttpClientService } from '../../../shared/http/http-client.service';

/**
 * HTTP Source Fetcher Adapter
 * Implements SourceFetcherPort with the shared undici client
 */
@Injectable()
export class HttpSourceFetcherAdapter implements SourceFetcherPort {
  private readonly logger = new Logger(HttpSourceFetcherAdapter.name);

  constructor(
    @Inject(HttpClientService) private readonly httpClient: HttpClientService,
    @Inject(ConfigService) private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async fetch(url: string): Promise<FetchedSource> {
    const { downloadTimeoutMs } = this.configService.get('server', { infer: true });
    const { maxSrcFileSizeBytes } = this.configService.get('security', { infer: true });

    this.logger.debug(`Downloading source image: ${url}`);

    const response = await this.httpClient.downloadToBuffer(url, {
      timeout: downloadTimeoutMs,
      maxBytes: maxSrcFileSizeBytes,
      headers: { 'user-agent': 'image-gateway' },
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new Error(`Can't download image; status: ${response.statusCode}`);
    }

    const format = detectImageFormat(response.body);
    if (format === undefined) {
      throw new Error('Source image type not supported');
    }

    return { data: response.body, format };
  }
}
