export const SIGNATURE_VERIFIER_PORT = 'SignatureVerifierPort';

/**
 * Signature Verifier Port (Driven Port)
 * Checks that `token` authorizes `signedPath`; throws otherwise
 */
export interface SignatureVerifierPort {
  verify(token: string, signedPath: string): void;
}
