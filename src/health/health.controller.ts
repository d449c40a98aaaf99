import { Controller, Get, Header, Inject } from '@nestjs/common';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { AdmissionHealthIndicator } from './indicators/admission.health';

export const HEALTH_BODY = 'Image gateway is running';

/**
 * Health endpoints. They sit outside the image pipeline: no secret check,
 * no admission slot and no request budget.
 */
@Controller('health')
export class HealthController {
  constructor(
    @Inject(HealthCheckService) private readonly health: HealthCheckService,
    @Inject(MemoryHealthIndicator) private readonly memory: MemoryHealthIndicator,
    @Inject(AdmissionHealthIndicator) private readonly admissionHealth: AdmissionHealthIndicator,
  ) {}

  @Get()
  @Header('Content-Type', 'text/plain; charset=utf-8')
  status(): string {
    return HEALTH_BODY;
  }

  @Get('live')
  @HealthCheck()
  liveness() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', 1024 * 1024 * 1024), // 1GB
    ]);
  }

  @Get('ready')
  @HealthCheck()
  readiness() {
    return this.health.check([() => this.admissionHealth.isHealthy('admission')]);
  }
}
