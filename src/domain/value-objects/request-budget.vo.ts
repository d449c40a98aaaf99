import { ImageProxyError } from '../errors/image-proxy.error';
import { PipelineStage } from './pipeline-stage.vo';

export type Clock = () => number;

/**
 * Request Budget Value Object
 *
 * Per-request stopwatch against the configured total time budget. The
 * orchestrator calls {@link checkpoint} before starting each stage; it never
 * interrupts work already in flight. Once the budget has been exceeded the
 * budget stays expired, even if the clock were to move backwards.
 */
export class RequestBudget {
  private expired = false;

  private constructor(
    readonly requestId: string,
    readonly startedAt: number,
    readonly deadline: number,
    private readonly clock: Clock,
  ) {}

  static start(requestId: string, budgetMs: number, clock: Clock = Date.now): RequestBudget {
    const startedAt = clock();
    return new RequestBudget(requestId, startedAt, startedAt + budgetMs, clock);
  }

  elapsedMs(): number {
    return Math.max(0, this.clock() - this.startedAt);
  }

  isExpired(): boolean {
    if (!this.expired && this.clock() > this.deadline) {
      this.expired = true;
    }
    return this.expired;
  }

  /**
   * @throws ImageProxyError (503) when the budget is spent
   */
  checkpoint(next: PipelineStage): void {
    if (this.isExpired()) {
      throw ImageProxyError.timeout(
        `Processing timed out after ${this.elapsedMs()}ms (before ${next})`,
      );
    }
  }
}
