import { describe, it, expect } from 'vitest';
import { decodeProcessingPath } from '../../../src/domain/codecs/processing-path.codec';
import { ImageProxyError } from '../../../src/domain/errors/image-proxy.error';
import { ImageFormat } from '../../../src/domain/value-objects/image-format.vo';
import { Gravity, ResizeType } from '../../../src/domain/value-objects/processing-options.vo';
import { encodeBase64Url } from '../../../src/shared/encoding/base64url';
import { buildProcessingPath } from '../helpers/mock-factories';

describe('decodeProcessingPath', () => {
  const savable: ReadonlySet<ImageFormat> = new Set([
    ImageFormat.JPEG,
    ImageFormat.PNG,
    ImageFormat.WEBP,
  ]);

  const sourceUrl = 'https://images.example.com/cat.jpg';
  const encodedSource = encodeBase64Url(sourceUrl);

  const decodeFailure = (path: string): ImageProxyError => {
    try {
      decodeProcessingPath(path, savable);
    } catch (error) {
      if (error instanceof ImageProxyError) {
        return error;
      }
      throw error;
    }
    throw new Error(`Expected ${path} to be rejected`);
  };

  describe('Valid Paths', () => {
    it('should decode every segment of a full path', () => {
      const path = `/sig/fill/300/200/no/1/${encodedSource}.png`;

      const decoded = decodeProcessingPath(path, savable);

      expect(decoded).toEqual({
        token: 'sig',
        signedPath: `/fill/300/200/no/1/${encodedSource}.png`,
        options: {
          resizeType: ResizeType.FILL,
          width: 300,
          height: 200,
          gravity: Gravity.NORTH,
          enlarge: true,
          format: ImageFormat.PNG,
        },
        sourceUrl,
      });
    });

    it('should default to JPEG when there is no extension', () => {
      const decoded = decodeProcessingPath(buildProcessingPath({ sourceUrl }), savable);

      expect(decoded.options.format).toBe(ImageFormat.JPEG);
      expect(decoded.sourceUrl).toBe(sourceUrl);
    });

    it('should map both jpg and jpeg to JPEG', () => {
      expect(
        decodeProcessingPath(buildProcessingPath({ extension: 'jpg' }), savable).options.format,
      ).toBe(ImageFormat.JPEG);
      expect(
        decodeProcessingPath(buildProcessingPath({ extension: 'jpeg' }), savable).options.format,
      ).toBe(ImageFormat.JPEG);
    });

    it('should treat any enlarge value other than "0" as true', () => {
      expect(decodeProcessingPath(buildProcessingPath({ enlarge: '0' }), savable).options.enlarge).toBe(false);
      expect(decodeProcessingPath(buildProcessingPath({ enlarge: '1' }), savable).options.enlarge).toBe(true);
      expect(decodeProcessingPath(buildProcessingPath({ enlarge: 'yes' }), savable).options.enlarge).toBe(true);
    });

    it('should accept zero dimensions', () => {
      const decoded = decodeProcessingPath(
        buildProcessingPath({ width: '0', height: '0' }),
        savable,
      );

      expect(decoded.options.width).toBe(0);
      expect(decoded.options.height).toBe(0);
    });

    it('should accept a path without the leading slash', () => {
      const decoded = decodeProcessingPath(`sig/crop/10/10/sm/0/${encodedSource}`, savable);

      expect(decoded.token).toBe('sig');
      expect(decoded.signedPath).toBe(`/crop/10/10/sm/0/${encodedSource}`);
      expect(decoded.options.gravity).toBe(Gravity.SMART);
    });

    it('should decode the same path to equal results every time', () => {
      const path = buildProcessingPath({ extension: 'webp' });

      expect(decodeProcessingPath(path, savable)).toEqual(decodeProcessingPath(path, savable));
    });

    it('should return frozen options', () => {
      const decoded = decodeProcessingPath(buildProcessingPath(), savable);

      expect(Object.isFrozen(decoded.options)).toBe(true);
    });
  });

  describe('Invalid Paths', () => {
    it.each([
      ['too few segments', `/sig/fit/100/100/ce/0`, 'Invalid path'],
      ['an unknown resize type', buildProcessingPath({ resize: 'zoom' }), 'Invalid resize type: zoom'],
      ['a non-numeric width', buildProcessingPath({ width: 'abc' }), 'Invalid width: abc'],
      ['a negative width', buildProcessingPath({ width: '-5' }), 'Invalid width: -5'],
      ['a fractional height', buildProcessingPath({ height: '1.5' }), 'Invalid height: 1.5'],
      ['an unknown gravity', buildProcessingPath({ gravity: 'xyz' }), 'Invalid gravity: xyz'],
      ['an inherited object key as gravity', buildProcessingPath({ gravity: 'constructor' }), 'Invalid gravity: constructor'],
      ['an unknown extension', buildProcessingPath({ extension: 'bmp' }), 'Invalid image format: bmp'],
      ['an unsavable output format', buildProcessingPath({ extension: 'gif' }), 'Resulting image type not supported'],
      ['characters outside the base64url alphabet', '/sig/fit/100/100/ce/0/abc$', 'Invalid filename encoding'],
      ['padded base64', '/sig/fit/100/100/ce/0/YQ==', 'Invalid filename encoding'],
    ])('should reject %s', (_description, path, message) => {
      const error = decodeFailure(path);

      expect(error.message).toBe(message);
      expect(error.statusCode).toBe(404);
      expect(error.publicMessage).toBe('Invalid image url');
    });

    it('should check the resize type before the dimensions', () => {
      const error = decodeFailure(buildProcessingPath({ resize: 'zoom', width: 'abc' }));

      expect(error.message).toBe('Invalid resize type: zoom');
    });
  });
});
