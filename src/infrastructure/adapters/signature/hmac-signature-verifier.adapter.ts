import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, timingSafeEqual } from 'crypto';
import { SignatureVerifierPort } from '../../../application/ports/output/signature-verifier.port';
import { AppConfig } from '../../../config/configuration';
import { decodeBase64Url, encodeBase64Url } from '../../../shared/encoding/base64url';

/**
 * Token for `signedPath`: base64url(HMAC-SHA256(key, salt + signedPath)).
 */
export function signPath(key: Buffer, salt: Buffer, signedPath: string): string {
  return encodeBase64Url(createHmac('sha256', key).update(salt).update(signedPath).digest());
}

/**
 * HMAC Signature Verifier Adapter
 * Implements SignatureVerifierPort. Without KEY and SALT verification is disabled.
 */
@Injectable()
export class HmacSignatureVerifierAdapter implements SignatureVerifierPort {
  private readonly logger = new Logger(HmacSignatureVerifierAdapter.name);
  private readonly key: Buffer;
  private readonly salt: Buffer;

  constructor(
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
  ) {
    const security = configService.get('security', { infer: true });
    this.key = security.key;
    this.salt = security.salt;

    if (!this.isEnabled()) {
      this.logger.warn('KEY and SALT are not set; URL signature verification is disabled');
    }
  }

  isEnabled(): boolean {
    return this.key.length > 0 && this.salt.length > 0;
  }

  verify(token: string, signedPath: string): void {
    if (!this.isEnabled()) {
      return;
    }

    const presented = decodeBase64Url(token);
    if (presented === undefined) {
      throw new Error('Invalid token encoding');
    }

    const expected = createHmac('sha256', this.key).update(this.salt).update(signedPath).digest();

    if (presented.length !== expected.length || !timingSafeEqual(presented, expected)) {
      throw new Error('Invalid token');
    }
  }
}
