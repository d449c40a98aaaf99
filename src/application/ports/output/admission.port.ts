export const ADMISSION_PORT = 'AdmissionPort';

/**
 * One unit of the admission capacity. Released exactly once; later calls
 * to release are no-ops.
 */
export interface AdmissionSlot {
  readonly released: boolean;
  release(): void;
}

/**
 * Admission Statistics
 */
export interface AdmissionStats {
  capacity: number;
  inUse: number;
  waiting: number;
  admittedTotal: number;
  isShuttingDown: boolean;
}

/**
 * Admission Port (Driven Port)
 * Bounds the number of requests inside the processing pipeline
 */
export interface AdmissionPort {
  /**
   * Resolves once a slot is available
   */
  acquire(): Promise<AdmissionSlot>;

  /**
   * Acquire, run `task` and release on every exit path
   */
  run<T>(task: () => Promise<T>): Promise<T>;

  getStats(): AdmissionStats;
}
