import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { HttpModule } from '../shared/http/http.module';
import { LoggingModule } from '../shared/logging/logging.module';
import {
  CLOCK_PORT,
  FINGERPRINT_PORT,
  IMAGE_TRANSFORMER_PORT,
  SIGNATURE_VERIFIER_PORT,
  SOURCE_FETCHER_PORT,
} from '../application/ports/output';

// Adapters (implementations)
import { HttpSourceFetcherAdapter } from './adapters/fetch/http-source-fetcher.adapter';
import { SharpImageTransformerAdapter } from './adapters/transform/sharp-image-transformer.adapter';
import { Sha256FingerprintAdapter } from './adapters/fingerprint/sha256-fingerprint.adapter';
import { HmacSignatureVerifierAdapter } from './adapters/signature/hmac-signature-verifier.adapter';
import { SystemClockAdapter } from './adapters/clock/system-clock.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for the output ports of the pipeline
 *
 * This module:
 * 1. Imports shared infrastructure (HTTP client, logging)
 * 2. Creates adapters that implement ports
 * 3. Exports the port tokens so use cases depend on interfaces only
 */
@Module({
  imports: [ConfigModule, LoggingModule, HttpModule],
  providers: [
    // Source download
    HttpSourceFetcherAdapter,
    {
      provide: SOURCE_FETCHER_PORT,
      useExisting: HttpSourceFetcherAdapter,
    },

    // Pixel pipeline
    SharpImageTransformerAdapter,
    {
      provide: IMAGE_TRANSFORMER_PORT,
      useExisting: SharpImageTransformerAdapter,
    },

    // Conditional caching
    Sha256FingerprintAdapter,
    {
      provide: FINGERPRINT_PORT,
      useExisting: Sha256FingerprintAdapter,
    },

    // URL signatures
    HmacSignatureVerifierAdapter,
    {
      provide: SIGNATURE_VERIFIER_PORT,
      useExisting: HmacSignatureVerifierAdapter,
    },

    SystemClockAdapter,
    {
      provide: CLOCK_PORT,
      useExisting: SystemClockAdapter,
    },
  ],
  exports: [
    SOURCE_FETCHER_PORT,
    IMAGE_TRANSFORMER_PORT,
    FINGERPRINT_PORT,
    SIGNATURE_VERIFIER_PORT,
    CLOCK_PORT,
  ],
})
export class InfrastructureModule {}
