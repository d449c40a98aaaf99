import { SignatureVerifierPort } from '../../src/application/ports/output/signature-verifier.port';

/**
 * Signature verifier that accepts everything unless told otherwise
 */
export class StubSignatureVerifierAdapter implements SignatureVerifierPort {
  readonly calls: Array<{ token: string; signedPath: string }> = [];

  private rejection?: Error;

  verify(token: string, signedPath: string): void {
    this.calls.push({ token, signedPath });
    if (this.rejection) {
      throw this.rejection;
    }
  }

  rejectWith(error: Error): void {
    this.rejection = error;
  }
}
