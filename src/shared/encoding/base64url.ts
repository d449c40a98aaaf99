const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

/**
 * Strict base64url (RFC 4648 §5, unpadded) decoding.
 *
 * `Buffer.from(value, 'base64url')` skips characters outside the alphabet,
 * so the input is checked first. Returns undefined when the input is not a
 * canonical unpadded encoding.
 */
export function decodeBase64Url(value: string): Buffer | undefined {
  if (!BASE64URL_ALPHABET.test(value) || value.length % 4 === 1) {
    return undefined;
  }

  const decoded = Buffer.from(value, 'base64url');

  // Reject non-zero trailing bits, which would make several inputs decode identically
  if (decoded.toString('base64url') !== value) {
    return undefined;
  }

  return decoded;
}

export function encodeBase64Url(data: Buffer | string): string {
  return Buffer.from(data).toString('base64url');
}
