import { ImageFormat } from '../../../domain/value-objects/image-format.vo';
import { ProcessingOptions } from '../../../domain/value-objects/processing-options.vo';

export const IMAGE_TRANSFORMER_PORT = 'ImageTransformerPort';

/**
 * Image Transformer Port (Driven Port)
 * Resizes and re-encodes image bytes
 */
export interface ImageTransformerPort {
  /**
   * Output formats this transformer can encode
   */
  readonly savableFormats: ReadonlySet<ImageFormat>;

  transform(data: Buffer, sourceFormat: ImageFormat, options: ProcessingOptions): Promise<Buffer>;
}
