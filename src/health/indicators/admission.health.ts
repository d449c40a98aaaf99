import { Inject, Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { AdmissionControllerService } from '../../admission/admission-controller.service';

@Injectable()
export class AdmissionHealthIndicator extends HealthIndicator {
  constructor(
    @Inject(AdmissionControllerService) private readonly admission: AdmissionControllerService,
  ) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const stats = this.admission.getStats();

    const details = {
      capacity: stats.capacity,
      inUse: stats.inUse,
      waiting: stats.waiting,
      admittedTotal: stats.admittedTotal,
    };

    if (!stats.isShuttingDown) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      'Admission controller is shutting down',
      this.getStatus(key, false, details),
    );
  }
}
