import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { AdmissionModule } from '../admission/admission.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import { ProcessImageUseCase } from './use-cases';

/**
 * Application Module
 * Contains the use cases of the gateway
 *
 * Use cases depend on output ports (injection tokens), not on adapters.
 * The adapters are provided by the InfrastructureModule and AdmissionModule.
 */
@Module({
  imports: [ConfigModule, AdmissionModule, InfrastructureModule],
  providers: [ProcessImageUseCase],
  exports: [ProcessImageUseCase],
})
export class ApplicationModule {}
