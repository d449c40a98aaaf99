export const CLOCK_PORT = 'ClockPort';

/**
 * Clock Port (Driven Port)
 */
export interface ClockPort {
  /** Milliseconds since the epoch */
  now(): number;
}
