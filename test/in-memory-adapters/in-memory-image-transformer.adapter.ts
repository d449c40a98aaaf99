import { Injectable } from '@nestjs/common';
import { ImageTransformerPort } from '../../src/application/ports/output/image-transformer.port';
import { ImageFormat } from '../../src/domain/value-objects/image-format.vo';
import { ProcessingOptions } from '../../src/domain/value-objects/processing-options.vo';

export interface TransformCall {
  data: Buffer;
  sourceFormat: ImageFormat;
  options: ProcessingOptions;
}

/**
 * In-Memory Image Transformer Adapter
 * Produces `transformed:<format>:<width>x<height>` instead of real pixels
 */
@Injectable()
export class InMemoryImageTransformerAdapter implements ImageTransformerPort {
  readonly savableFormats: ReadonlySet<ImageFormat> = new Set([
    ImageFormat.JPEG,
    ImageFormat.PNG,
    ImageFormat.WEBP,
  ]);

  readonly calls: TransformCall[] = [];

  /** Runs before each transform completes; used to simulate slow encodes */
  onTransform?: (options: ProcessingOptions) => void;

  private failure?: Error;

  async transform(
    data: Buffer,
    sourceFormat: ImageFormat,
    options: ProcessingOptions,
  ): Promise<Buffer> {
    this.calls.push({ data, sourceFormat, options });
    this.onTransform?.(options);

    if (this.failure) {
      throw this.failure;
    }

    return Buffer.from(`transformed:${options.format}:${options.width}x${options.height}`);
  }

  // Test helper methods

  failWith(error: Error): void {
    this.failure = error;
  }

  clearFailure(): void {
    this.failure = undefined;
  }
}
