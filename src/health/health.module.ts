import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { AdmissionHealthIndicator } from './indicators/admission.health';
import { AdmissionModule } from '../admission/admission.module';

@Module({
  imports: [TerminusModule, AdmissionModule],
  controllers: [HealthController],
  providers: [AdmissionHealthIndicator],
})
export class HealthModule {}
