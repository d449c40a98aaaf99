import { ProcessingOptions } from '../../../domain/value-objects/processing-options.vo';

export const FINGERPRINT_PORT = 'FingerprintPort';

/**
 * Fingerprint Port (Driven Port)
 * Computes the ETag of a response. Must be a pure function of its inputs.
 */
export interface FingerprintPort {
  compute(data: Buffer, options: ProcessingOptions): string;
}
