import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { classifyTransportError } from './http';
import { rawFailure, rawSuccess, type RawResult } from './types';

/**
 * Managed browser-rendering API
 *
 * Renders the page in the provider's browser fleet, which gets past most
 * challenge pages. The provider does not present itself as the crawler, so
 * the result is visitor-grade content behind a crawler request.
 */

const logger = createLogger('[ManagedRender]');

const DEFAULT_ENDPOINT = 'https://api.zyte.com/v1/extract';

const renderResponseSchema = z.object({
  url: z.string().optional(),
  statusCode: z.number().optional(),
  browserHtml: z.string().optional(),
});

export interface ManagedRenderOptions {
  apiKey?: string;
  endpoint?: string;
}

export interface ManagedRenderFetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export class ManagedRenderClient {
  private readonly apiKey: string | undefined;
  private readonly endpoint: string;

  constructor(options: ManagedRenderOptions) {
    this.apiKey = options.apiKey || undefined;
    this.endpoint = options.endpoint || DEFAULT_ENDPOINT;

    if (!this.apiKey) {
      logger.warn('API key not set - managed rendering unavailable');
    }
  }

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  async fetch(url: string, options: ManagedRenderFetchOptions): Promise<RawResult> {
    const startTime = Date.now();
    if (!this.apiKey) {
      return rawFailure('Managed rendering API key not configured', 'STRATEGY_UNAVAILABLE', startTime);
    }

    // Basic auth with the API key as user name and an empty password
    const authorization = `Basic ${Buffer.from(`${this.apiKey}:`).toString('base64')}`;

    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: authorization,
        },
        body: JSON.stringify({ url, browserHtml: true }),
        signal: options.signal ?? AbortSignal.timeout(options.timeoutMs),
      });

      switch (response.status) {
        case 200:
          break;
        case 401:
          logger.error('Invalid API key');
          return rawFailure('Managed rendering: invalid API key', 'STRATEGY_MISCONFIGURED', startTime);
        case 422:
          return rawFailure(`Managed rendering validation error: ${await response.text()}`, 'PROVIDER_ERROR', startTime);
        case 520:
          logger.warn(`Target error for ${url}`);
          return rawFailure('Target website returned an error', 'FETCH_HTTP_5XX', startTime, 520);
        default:
          return rawFailure(`Managed rendering error: HTTP ${response.status}`, 'PROVIDER_ERROR', startTime);
      }

      const parsed = renderResponseSchema.safeParse(await response.json());
      if (!parsed.success || !parsed.data.browserHtml) {
        return rawFailure('Managed rendering returned no HTML', 'PROVIDER_ERROR', startTime);
      }

      const { browserHtml, statusCode, url: finalUrl } = parsed.data;
      logger.info(`Success for ${url}, status=${statusCode ?? 200}`);
      return rawSuccess(browserHtml, statusCode ?? 200, finalUrl ?? url, startTime);
    } catch (error) {
      const { errorCode, error: message } = classifyTransportError(error, options.timeoutMs);
      return rawFailure(`Managed rendering: ${message}`, errorCode, startTime);
    }
  }
}
