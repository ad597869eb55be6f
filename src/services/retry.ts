/**
 * Retry Policy
 *
 * Exponential backoff for idempotent reads: retries on HTTP 429 and on
 * transport failures, returns every other status untouched.
 */

import type { Logger } from 'pino';

import { describeError } from '../errors.js';
import { sleep as defaultSleep, type Sleep } from './rateLimit.js';

export const HTTP_TOO_MANY_REQUESTS = 429;

export interface RetryOptions {
  /** Attempts after the first one */
  maxRetries: number;
  /** Wait before retry n (zero-based) is backoffFactor ** n seconds */
  backoffFactor: number;
  sleep?: Sleep;
}

/**
 * Anything carrying an HTTP status, e.g. an AxiosResponse
 */
export interface StatusResult {
  status: number;
}

export class RetryPolicy {
  private readonly maxRetries: number;
  private readonly backoffFactor: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: RetryOptions, logger: Logger) {
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries));
    this.backoffFactor = options.backoffFactor;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = logger;
  }

  /**
   * Backoff before the retry that follows `attempt`, in milliseconds
   */
  delayFor(attempt: number): number {
    return this.backoffFactor ** attempt * 1000;
  }

  /**
   * Run `operation` until it returns a non-429 status or retries run out.
   *
   * The final 429 is returned, not thrown. A thrown error is retried on the
   * same schedule and re-thrown once retries are exhausted.
   */
  async execute<T extends StatusResult>(operation: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      let result: T;

      try {
        result = await operation();
      } catch (error) {
        if (attempt >= this.maxRetries) {
          this.logger.debug(
            { attempt: attempt + 1, error: describeError(error) },
            'Request failed, retries exhausted'
          );
          throw error;
        }

        const waitMs = this.delayFor(attempt);
        this.logger.debug(
          { attempt: attempt + 1, maxRetries: this.maxRetries, waitMs, error: describeError(error) },
          'Request failed, retrying'
        );
        await this.sleep(waitMs);
        continue;
      }

      if (result.status !== HTTP_TOO_MANY_REQUESTS) {
        return result;
      }

      if (attempt >= this.maxRetries) {
        this.logger.debug({ status: result.status, attempts: attempt + 1 }, 'Max retries reached');
        return result;
      }

      const waitMs = this.delayFor(attempt);
      this.logger.debug(
        { waitMs, retry: attempt + 1, maxRetries: this.maxRetries },
        'Rate limited, backing off'
      );
      await this.sleep(waitMs);
    }
  }
}
