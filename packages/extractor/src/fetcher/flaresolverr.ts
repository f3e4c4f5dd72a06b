/**
 * FlareSolverr client for solving browser challenges
 *
 * FlareSolverr is a proxy server that uses a real browser to solve
 * challenge pages and return the page HTML.
 *
 * @see https://github.com/FlareSolverr/FlareSolverr
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { classifyTransportError } from './http';
import { rawFailure, rawSuccess, type RawResult } from './types';

const logger = createLogger('[FlareSolverr]');

const DEFAULT_MAX_TIMEOUT = 60000;
const HEALTH_TIMEOUT = 5000;

const flareSolverrResponseSchema = z.object({
  status: z.string(),
  message: z.string().default(''),
  solution: z
    .object({
      url: z.string(),
      status: z.number(),
      response: z.string(),
    })
    .optional(),
});

const healthSchema = z.object({ msg: z.string() });

export interface FlareSolverrOptions {
  /** FlareSolverr endpoint, e.g. http://localhost:8191/v1 */
  url: string;
  /** Browser budget FlareSolverr gets per request, in ms */
  maxTimeoutMs?: number;
}

export interface FlareSolverrFetchOptions {
  userAgent?: string;
  signal?: AbortSignal;
}

export class FlareSolverrClient {
  private readonly endpoint: string;
  private readonly maxTimeoutMs: number;
  private available = false;

  constructor(options: FlareSolverrOptions) {
    this.endpoint = options.url;
    this.maxTimeoutMs = options.maxTimeoutMs ?? DEFAULT_MAX_TIMEOUT;
  }

  /**
   * Result of the last health check
   */
  isAvailable(): boolean {
    return this.available;
  }

  /**
   * Check the service root; the strategy stays disabled until this passes
   */
  async checkHealth(): Promise<boolean> {
    const baseUrl = this.endpoint.replace(/\/v1\/?$/, '');
    try {
      const response = await fetch(baseUrl, { signal: AbortSignal.timeout(HEALTH_TIMEOUT) });
      const parsed = healthSchema.safeParse(await response.json());
      this.available = parsed.success && parsed.data.msg === 'FlareSolverr is ready!';
    } catch (error) {
      logger.warn(`Health check failed: ${error instanceof Error ? error.message : String(error)}`);
      this.available = false;
    }

    if (this.available) {
      logger.info(`Available at ${this.endpoint}`);
    } else {
      logger.warn(`Not available at ${this.endpoint}`);
    }
    return this.available;
  }

  async fetch(url: string, options: FlareSolverrFetchOptions = {}): Promise<RawResult> {
    const startTime = Date.now();

    const requestBody: Record<string, unknown> = {
      cmd: 'request.get',
      url,
      maxTimeout: this.maxTimeoutMs,
    };
    if (options.userAgent) {
      requestBody.headers = { 'User-Agent': options.userAgent };
    }

    logger.debug(`Fetching ${url}`);

    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(requestBody),
        signal: options.signal ?? AbortSignal.timeout(this.maxTimeoutMs + 10000),
      });

      if (!response.ok) {
        return rawFailure(`FlareSolverr HTTP error: ${response.status}`, 'PROVIDER_ERROR', startTime);
      }

      const parsed = flareSolverrResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return rawFailure('FlareSolverr returned an unexpected payload', 'PROVIDER_ERROR', startTime);
      }

      const { status, message, solution } = parsed.data;
      if (status !== 'ok' || !solution) {
        return rawFailure(`FlareSolverr failed: ${message || status}`, 'PROVIDER_ERROR', startTime);
      }

      logger.info(`Success for ${url} (${solution.response.length} chars, ${Date.now() - startTime}ms)`);
      return rawSuccess(solution.response, solution.status, solution.url, startTime);
    } catch (error) {
      const { errorCode, error: message } = classifyTransportError(error, this.maxTimeoutMs);
      return rawFailure(`FlareSolverr: ${message}`, errorCode, startTime);
    }
  }
}
