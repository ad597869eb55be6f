/**
 * Rate Limiter
 *
 * Fixed-interval throttle for outgoing API requests.
 * One instance per client; assumes one in-flight request per client.
 */

import type { Logger } from 'pino';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Minimum-spacing rate limiter
 */
export class RateLimiter {
  private readonly delayMs: number;
  private readonly logger: Logger;
  private lastRequestTime: number | null = null;

  constructor(delaySeconds: number, logger: Logger) {
    this.delayMs = Math.max(0, delaySeconds * 1000);
    this.logger = logger;
  }

  /**
   * Resolve once at least `delay` has passed since the previous call returned.
   * The first call resolves immediately.
   */
  async wait(): Promise<void> {
    const waitMs = this.getRemainingDelay();
    if (waitMs > 0) {
      this.logger.trace({ waitMs }, 'Throttling request');
      await sleep(waitMs);
    }

    // No await between reading the clock and recording it
    this.lastRequestTime = Date.now();
  }

  /**
   * Milliseconds a call to wait() made now would suspend for
   */
  getRemainingDelay(): number {
    if (this.lastRequestTime === null) {
      return 0;
    }
    return Math.max(0, this.delayMs - (Date.now() - this.lastRequestTime));
  }
}
