import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import {
  AdmissionPort,
  AdmissionSlot,
  AdmissionStats,
} from '../application/ports/output/admission.port';
import { ImageProxyError } from '../domain/errors/image-proxy.error';

/**
 * Caller waiting for a slot, with its Promise handlers.
 */
interface Waiter {
  resolve: (slot: AdmissionSlot) => void;
  reject: (error: Error) => void;
  queuedAt: number;
}

/**
 * Admission Controller Service
 *
 * Counting semaphore bounding how many requests run inside the processing
 * pipeline at once.
 *
 * ## Behaviour:
 *
 * - `acquire()` resolves immediately while `inUse < capacity`, otherwise the
 *   caller waits in a FIFO queue. There is no queue depth limit.
 * - A slot is handed directly from the releasing request to the next waiter,
 *   so capacity is never exceeded between a release and the next admission.
 * - `release()` is idempotent: a slot frees its unit of capacity once.
 * - On shutdown, waiters are rejected with a 503 and new acquisitions fail.
 */
@Injectable()
export class AdmissionControllerService implements AdmissionPort, OnModuleDestroy {
  private readonly capacity: number;

  private readonly logger: PinoLoggerService;

  private inUse = 0;

  private admittedTotal = 0;

  /**
   * FIFO queue of callers waiting for a slot.
   */
  private waiters: Waiter[] = [];

  private isShuttingDown = false;

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService<AppConfig, true>,
    @Inject(PinoLoggerService) logger: PinoLoggerService,
  ) {
    this.capacity = this.configService.get('server', { infer: true }).concurrency;
    this.logger = logger.withContext(AdmissionControllerService.name);
  }

  onModuleDestroy(): void {
    this.shutdown();
  }

  acquire(): Promise<AdmissionSlot> {
    if (this.isShuttingDown) {
      return Promise.reject(
        ImageProxyError.shuttingDown('Admission controller is shutting down'),
      );
    }

    if (this.inUse < this.capacity) {
      this.inUse++;
      return Promise.resolve(this.admit());
    }

    return new Promise<AdmissionSlot>((resolve, reject) => {
      this.waiters.push({ resolve, reject, queuedAt: Date.now() });
      this.logger.debug(
        { inUse: this.inUse, waiting: this.waiters.length },
        'Admission capacity reached, request queued',
      );
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const slot = await this.acquire();
    try {
      return await task();
    } finally {
      slot.release();
    }
  }

  getStats(): AdmissionStats {
    return {
      capacity: this.capacity,
      inUse: this.inUse,
      waiting: this.waiters.length,
      admittedTotal: this.admittedTotal,
      isShuttingDown: this.isShuttingDown,
    };
  }

  shutdown(): void {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    const pending = this.waiters;
    this.waiters = [];

    if (pending.length > 0) {
      this.logger.warn({ waiting: pending.length }, 'Rejecting queued requests on shutdown');
    }

    for (const waiter of pending) {
      waiter.reject(ImageProxyError.shuttingDown('Admission controller is shutting down'));
    }
  }

  /**
   * Create a slot for capacity already accounted in `inUse`.
   */
  private admit(): AdmissionSlot {
    this.admittedTotal++;

    let released = false;
    return {
      get released() {
        return released;
      },
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.handOver();
      },
    };
  }

  private handOver(): void {
    const next = this.waiters.shift();

    if (next) {
      // Capacity moves straight to the next waiter; inUse is unchanged
      this.logger.debug(
        { waitedMs: Date.now() - next.queuedAt, waiting: this.waiters.length },
        'Queued request admitted',
      );
      next.resolve(this.admit());
    } else {
      this.inUse--;
    }
  }
}
