/**
 * Clock Port (Driven Port)
 * Source of time for every scheduling decision
 */
export interface ClockPort {
  now(): Date;

  /**
   * Wait `ms` milliseconds. Resolves early, without throwing, once `signal`
   * is aborted.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
