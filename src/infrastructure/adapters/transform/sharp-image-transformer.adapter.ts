import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp, { Sharp } from 'sharp';
import { ImageTransformerPort } from '../../../application/ports/output/image-transformer.port';
import { AppConfig } from '../../../config/configuration';
import { ImageFormat } from '../../../domain/value-objects/image-format.vo';
import {
  Gravity,
  ProcessingOptions,
  ResizeType,
} from '../../../domain/value-objects/processing-options.vo';

const SHARP_POSITIONS: Record<Gravity, string | number> = {
  [Gravity.CENTER]: 'centre',
  [Gravity.NORTH]: 'north',
  [Gravity.EAST]: 'east',
  [Gravity.SOUTH]: 'south',
  [Gravity.WEST]: 'west',
  [Gravity.SMART]: sharp.strategy.attention,
};

interface Region {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Region of `width`x`height` inside the source, anchored at `gravity`.
 * Smart gravity has no meaning without scaling and falls back to center.
 */
export function cropRegion(
  sourceWidth: number,
  sourceHeight: number,
  options: Pick<ProcessingOptions, 'width' | 'height' | 'gravity'>,
): Region {
  const width = Math.min(options.width || sourceWidth, sourceWidth);
  const height = Math.min(options.height || sourceHeight, sourceHeight);

  const centerLeft = Math.floor((sourceWidth - width) / 2);
  const centerTop = Math.floor((sourceHeight - height) / 2);

  switch (options.gravity) {
    case Gravity.NORTH:
      return { left: centerLeft, top: 0, width, height };
    case Gravity.SOUTH:
      return { left: centerLeft, top: sourceHeight - height, width, height };
    case Gravity.EAST:
      return { left: sourceWidth - width, top: centerTop, width, height };
    case Gravity.WEST:
      return { left: 0, top: centerTop, width, height };
    case Gravity.CENTER:
    case Gravity.SMART:
      return { left: centerLeft, top: centerTop, width, height };
  }
}

/**
 * Sharp Image Transformer Adapter
 * Implements ImageTransformerPort with libvips through sharp
 */
@Injectable()
export class SharpImageTransformerAdapter implements ImageTransformerPort {
  private readonly logger = new Logger(SharpImageTransformerAdapter.name);

  readonly savableFormats: ReadonlySet<ImageFormat> = new Set([
    ImageFormat.JPEG,
    ImageFormat.PNG,
    ImageFormat.WEBP,
  ]);

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  async transform(
    data: Buffer,
    sourceFormat: ImageFormat,
    options: ProcessingOptions,
  ): Promise<Buffer> {
    const security = this.configService.get('security', { infer: true });

    const image = sharp(data, { limitInputPixels: security.maxSrcResolution, failOn: 'error' });
    const metadata = await image.metadata();

    if (metadata.format !== sourceFormat) {
      throw new Error(
        `Source image declared as ${sourceFormat} decodes as ${metadata.format ?? 'unknown'}`,
      );
    }

    const sourceWidth = metadata.width ?? 0;
    const sourceHeight = metadata.height ?? 0;

    if (sourceWidth === 0 || sourceHeight === 0) {
      throw new Error('Source image has no dimensions');
    }
    if (sourceWidth > security.maxSrcDimension || sourceHeight > security.maxSrcDimension) {
      throw new Error(`Source image is too big: ${sourceWidth}x${sourceHeight}`);
    }
    if (sourceWidth * sourceHeight > security.maxSrcResolution) {
      throw new Error(`Source image resolution is too big: ${sourceWidth}x${sourceHeight}`);
    }

    this.logger.debug(
      `Transforming ${sourceFormat} ${sourceWidth}x${sourceHeight} → ${options.resizeType} ${options.width}x${options.height} ${options.format}`,
    );

    const resized = this.resize(image, options, sourceWidth, sourceHeight);
    return this.encode(resized, options.format).toBuffer();
  }

  private resize(image: Sharp, options: ProcessingOptions, sourceWidth: number, sourceHeight: number): Sharp {
    if (options.resizeType === ResizeType.CROP) {
      return image.extract(cropRegion(sourceWidth, sourceHeight, options));
    }

    if (options.width === 0 && options.height === 0) {
      return image;
    }

    const bothSides = options.width > 0 && options.height > 0;

    return image.resize({
      width: options.width || undefined,
      height: options.height || undefined,
      fit: options.resizeType === ResizeType.FILL && bothSides ? 'cover' : 'inside',
      position: SHARP_POSITIONS[options.gravity],
      withoutEnlargement: !options.enlarge,
    });
  }

  private encode(image: Sharp, format: ImageFormat): Sharp {
    const processing = this.configService.get('processing', { infer: true });

    switch (format) {
      case ImageFormat.JPEG:
        return image.jpeg({ quality: processing.quality, progressive: processing.jpegProgressive });
      case ImageFormat.PNG:
        return image.png({ progressive: processing.pngInterlaced });
      case ImageFormat.WEBP:
        return image.webp({ quality: processing.quality });
      case ImageFormat.GIF:
        throw new Error(`Resulting image type not supported: ${format}`);
    }
  }
}
