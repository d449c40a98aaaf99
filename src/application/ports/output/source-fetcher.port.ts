import { ImageFormat } from '../../../domain/value-objects/image-format.vo';

export const SOURCE_FETCHER_PORT = 'SourceFetcherPort';

/**
 * Fetched Source
 */
export interface FetchedSource {
  data: Buffer;
  format: ImageFormat;
}

/**
 * Source Fetcher Port (Driven Port)
 * Downloads the source image. Rejects when the source is unreachable,
 * answers with a non-2xx status, is too large or is not a known image type.
 */
export interface SourceFetcherPort {
  fetch(url: string): Promise<FetchedSource>;
}
