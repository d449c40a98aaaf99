/**
 * Image Format Value Object
 * Formats the gateway can recognize, either as a source or as an output
 */
export enum ImageFormat {
  JPEG = 'jpeg',
  PNG = 'png',
  WEBP = 'webp',
  GIF = 'gif',
}

export const DEFAULT_IMAGE_FORMAT = ImageFormat.JPEG;

/**
 * Path extension → format. A Map so inherited object keys never resolve.
 */
export const IMAGE_FORMAT_EXTENSIONS: ReadonlyMap<string, ImageFormat> = new Map([
  ['jpg', ImageFormat.JPEG],
  ['jpeg', ImageFormat.JPEG],
  ['png', ImageFormat.PNG],
  ['webp', ImageFormat.WEBP],
  ['gif', ImageFormat.GIF],
]);

export const IMAGE_MIME_TYPES: Readonly<Record<ImageFormat, string>> = {
  [ImageFormat.JPEG]: 'image/jpeg',
  [ImageFormat.PNG]: 'image/png',
  [ImageFormat.WEBP]: 'image/webp',
  [ImageFormat.GIF]: 'image/gif',
};

function startsWith(data: Buffer, signature: readonly number[], offset = 0): boolean {
  if (data.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, index) => data[offset + index] === byte);
}

/**
 * Detect the format of encoded image bytes from their magic numbers.
 */
export function detectImageFormat(data: Buffer): ImageFormat | undefined {
  if (startsWith(data, [0xff, 0xd8, 0xff])) {
    return ImageFormat.JPEG;
  }
  if (startsWith(data, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return ImageFormat.PNG;
  }
  // "RIFF" .... "WEBP"
  if (startsWith(data, [0x52, 0x49, 0x46, 0x46]) && startsWith(data, [0x57, 0x45, 0x42, 0x50], 8)) {
    return ImageFormat.WEBP;
  }
  // "GIF8"
  if (startsWith(data, [0x47, 0x49, 0x46, 0x38])) {
    return ImageFormat.GIF;
  }
  return undefined;
}
