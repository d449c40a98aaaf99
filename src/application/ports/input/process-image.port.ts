import { ImageFormat } from '../../../domain/value-objects/image-format.vo';
import { ProcessingOptions } from '../../../domain/value-objects/processing-options.vo';

/**
 * Process Image Command
 */
export interface ProcessImageCommand {
  requestId: string;
  /** Request path without the query string */
  path: string;
  authorization?: string;
  ifNoneMatch?: string;
  /** Sets a header on the 304 rendered for a cache hit */
  setHeader: (name: string, value: string) => void;
  /** Writes the 200 response; runs inside the admission slot */
  respond: (result: ProcessImageResult) => Promise<void>;
}

/**
 * Process Image Result
 */
export interface ProcessImageResult {
  requestId: string;
  data: Buffer;
  format: ImageFormat;
  /** Present when ETags are enabled */
  etag?: string;
  sourceUrl: string;
  options: ProcessingOptions;
  durationMs: number;
}

/**
 * Process Image Port (Driving Port / Use Case Interface)
 * Authenticates, admits, decodes, fetches, checks the cache, transforms and responds
 */
export interface ProcessImagePort {
  /**
   * Resolves once `respond` has written the 200; rejects with an
   * ImageProxyError for every other outcome
   */
  execute(command: ProcessImageCommand): Promise<ProcessImageResult>;
}
