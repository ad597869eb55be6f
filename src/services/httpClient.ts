/**
 * HTTP client factory
 *
 * axios instances for the upstream APIs. Every status resolves, so the retry
 * policy and the clients see 429/404 as values; only transport failures throw.
 */

import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse
} from 'axios';
import type { Logger } from 'pino';

import type { ClientSettings } from '../config.js';
import { describeError, type FailureReason } from '../errors.js';
import { RateLimiter, type Sleep } from './rateLimit.js';
import { HTTP_TOO_MANY_REQUESTS, RetryPolicy } from './retry.js';

export interface HttpClientOptions {
  baseURL?: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  logger: Logger;
  /** Replaces the network layer, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const { logger } = options;

  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: options.headers,
    validateStatus: () => true,
    ...(options.adapter && { adapter: options.adapter })
  });

  // Request logging
  client.interceptors.request.use(
    (config) => {
      logger.debug({
        method: config.method?.toUpperCase(),
        url: config.url,
        params: config.params
      }, 'Outgoing API request');
      return config;
    },
    (error: unknown) => {
      logger.error({ error: String(error) }, 'API request interceptor error');
      return Promise.reject(error);
    }
  );

  // Response logging
  client.interceptors.response.use(
    (response) => {
      if (response.status >= 400) {
        logger.debug({
          status: response.status,
          url: response.config.url
        }, 'API responded with error status');
      }
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        logger.debug({
          code: error.code,
          url: error.config?.url,
          message: error.message
        }, 'API transport error');
      }
      return Promise.reject(error);
    }
  );

  return client;
}

export type FetchOutcome<T = unknown> =
  | { ok: true; status: number; data: T }
  | { ok: false; reason: FailureReason; status?: number; error?: string };

/**
 * Test seams for the API services
 */
export interface ServiceOverrides {
  adapter?: AxiosAdapter;
  sleep?: Sleep;
}

export interface RateLimitedClientOptions extends ClientSettings {
  /** Upstream name used in log lines */
  name: string;
  baseURL?: string;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
  /** Backoff sleep, replaced by tests to record delays */
  sleep?: Sleep;
}

/**
 * axios instance plus the request discipline every upstream call follows:
 * throttle, retry on 429 or transport failure, accept only 200.
 */
export class RateLimitedClient {
  readonly http: AxiosInstance;
  readonly rateLimiter: RateLimiter;
  readonly retry: RetryPolicy;
  private readonly name: string;
  private readonly logger: Logger;

  constructor(options: RateLimitedClientOptions, logger: Logger) {
    this.name = options.name;
    this.logger = logger;
    this.http = createHttpClient({
      baseURL: options.baseURL,
      timeoutMs: options.timeoutMs,
      headers: { 'User-Agent': options.userAgent, ...options.headers },
      logger,
      adapter: options.adapter
    });
    this.rateLimiter = new RateLimiter(options.rateLimitDelaySeconds, logger);
    this.retry = new RetryPolicy(
      { maxRetries: options.maxRetries, backoffFactor: options.backoffFactor, sleep: options.sleep },
      logger
    );
  }

  /**
   * Issue one logical request. Never throws; anything but a 200 comes back
   * as `{ ok: false, reason }` after a diagnostic log line.
   */
  async request<T = unknown>(operation: string, config: AxiosRequestConfig): Promise<FetchOutcome<T>> {
    let response: AxiosResponse<T>;
    try {
      response = await this.retry.execute(async () => {
        await this.rateLimiter.wait();
        return this.http.request<T>(config);
      });
    } catch (error) {
      this.logger.warn(
        { upstream: this.name, operation, reason: 'transport', error: describeError(error) },
        'Request failed'
      );
      return { ok: false, reason: 'transport', error: describeError(error) };
    }

    if (response.status === 200) {
      return { ok: true, status: response.status, data: response.data };
    }

    const reason = reasonForStatus(response.status);
    const details = { upstream: this.name, operation, reason, status: response.status };
    if (reason === 'not_found') {
      this.logger.debug(details, 'Resource not found');
    } else {
      this.logger.warn(details, 'Unexpected response status');
    }
    return { ok: false, reason, status: response.status };
  }
}

function reasonForStatus(status: number): FailureReason {
  if (status === 404) {
    return 'not_found';
  }
  if (status === HTTP_TOO_MANY_REQUESTS) {
    return 'rate_limited';
  }
  return 'http_error';
}
