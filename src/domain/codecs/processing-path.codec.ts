import { ImageProxyError } from '../errors/image-proxy.error';
import {
  DEFAULT_IMAGE_FORMAT,
  IMAGE_FORMAT_EXTENSIONS,
  ImageFormat,
} from '../value-objects/image-format.vo';
import {
  GRAVITY_TYPES,
  ProcessingOptions,
  RESIZE_TYPES,
  createProcessingOptions,
} from '../value-objects/processing-options.vo';
import { decodeBase64Url } from '../../shared/encoding/base64url';

/**
 * Result of decoding `/{token}/{resize}/{width}/{height}/{gravity}/{enlarge}/{source}[.{ext}]`
 */
export interface DecodedPath {
  readonly token: string;
  /** The raw path with the leading `/{token}` removed; this is what the token signs. */
  readonly signedPath: string;
  readonly options: ProcessingOptions;
  readonly sourceUrl: string;
}

const MIN_SEGMENTS = 7;
const NON_NEGATIVE_INTEGER = /^\d+$/;

function parseDimension(field: 'width' | 'height', value: string): number {
  const parsed = NON_NEGATIVE_INTEGER.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed)) {
    throw ImageProxyError.invalidUrl(`Invalid ${field}: ${value}`);
  }
  return parsed;
}

/**
 * Decode a request path into processing options and a source URL.
 *
 * Every failure is an {@link ImageProxyError} with status 404.
 *
 * @param savableFormats formats the transformer can produce
 */
export function decodeProcessingPath(
  path: string,
  savableFormats: ReadonlySet<ImageFormat>,
): DecodedPath {
  const parts = path.replace(/^\//, '').split('/');

  if (parts.length < MIN_SEGMENTS) {
    throw ImageProxyError.invalidUrl('Invalid path');
  }

  const [token, resize, width, height, gravityValue, enlarge] = parts;

  const resizeType = RESIZE_TYPES.get(resize);
  if (resizeType === undefined) {
    throw ImageProxyError.invalidUrl(`Invalid resize type: ${resize}`);
  }

  const parsedWidth = parseDimension('width', width);
  const parsedHeight = parseDimension('height', height);

  const gravity = GRAVITY_TYPES.get(gravityValue);
  if (gravity === undefined) {
    throw ImageProxyError.invalidUrl(`Invalid gravity: ${gravityValue}`);
  }

  const filenameParts = parts.slice(6).join('').split('.');

  let format: ImageFormat;
  if (filenameParts.length < 2) {
    format = DEFAULT_IMAGE_FORMAT;
  } else {
    const extension = filenameParts[1];
    const resolved = IMAGE_FORMAT_EXTENSIONS.get(extension);
    if (resolved === undefined) {
      throw ImageProxyError.invalidUrl(`Invalid image format: ${extension}`);
    }
    format = resolved;
  }

  if (!savableFormats.has(format)) {
    throw ImageProxyError.invalidUrl('Resulting image type not supported');
  }

  const sourceUrl = decodeBase64Url(filenameParts[0]);
  if (sourceUrl === undefined) {
    throw ImageProxyError.invalidUrl('Invalid filename encoding');
  }

  const tokenPrefix = path.startsWith('/') ? `/${token}` : token;

  return {
    token,
    signedPath: path.slice(tokenPrefix.length),
    options: createProcessingOptions({
      resizeType,
      width: parsedWidth,
      height: parsedHeight,
      gravity,
      enlarge: enlarge !== '0',
      format,
    }),
    sourceUrl: sourceUrl.toString('utf8'),
  };
}
