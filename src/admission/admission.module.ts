import { Module } from '@nestjs/common';
import { ADMISSION_PORT } from '../application/ports/output/admission.port';
import { LoggingModule } from '../shared/logging/logging.module';
import { AdmissionControllerService } from './admission-controller.service';

/**
 * Process-wide admission gate. `useExisting` keeps the port and the
 * concrete service on the same instance, so there is exactly one pool.
 */
@Module({
  imports: [LoggingModule],
  providers: [
    AdmissionControllerService,
    {
      provide: ADMISSION_PORT,
      useExisting: AdmissionControllerService,
    },
  ],
  exports: [AdmissionControllerService, ADMISSION_PORT],
})
export class AdmissionModule {}
