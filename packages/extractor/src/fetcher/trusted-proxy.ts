/**
 * Crawler-view API client
 *
 * The service fetches pages from IP ranges that reverse-resolve to the search
 * engine's own proxy hosts. Origins treat that traffic as the genuine crawler,
 * so the returned HTML is what the crawler is served.
 */

import { createLogger } from '../utils/logger';
import { fetchHttp } from './http';
import { rawFailure, rawSuccess, type RawResult } from './types';

const logger = createLogger('[CrawlerView]');

export interface TrustedProxyOptions {
  baseUrl: string;
  token?: string;
  lang?: string;
}

export interface TrustedProxyFetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export class TrustedProxyClient {
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly lang: string;

  constructor(options: TrustedProxyOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token || undefined;
    this.lang = options.lang ?? 'en';

    if (!this.token) {
      logger.warn('Crawler-view token not configured - strategy disabled');
    }
  }

  isConfigured(): boolean {
    return !!this.token;
  }

  async fetch(url: string, options: TrustedProxyFetchOptions): Promise<RawResult> {
    const startTime = Date.now();
    if (!this.token) {
      return rawFailure('Crawler-view token not configured', 'STRATEGY_UNAVAILABLE', startTime);
    }

    const endpoint = `${this.baseUrl}/googlebot-view?${new URLSearchParams({ url, lang: this.lang })}`;
    const result = await fetchHttp({
      url: endpoint,
      timeout: options.timeoutMs,
      headers: { Authorization: `Bearer ${this.token}` },
      signal: options.signal,
    });

    if (!result.ok) {
      return rawFailure(`Crawler-view API: ${result.error}`, result.errorCode, startTime);
    }

    // Statuses below describe the API call itself, not the target page
    const { statusCode, body } = result.response;
    switch (statusCode) {
      case 200:
        logger.info(`Success for ${url}, got ${body.length} chars`);
        return rawSuccess(body, 200, url, startTime);
      case 401:
        logger.error('Token expired or invalid');
        return rawFailure('Crawler-view API: token expired or invalid', 'STRATEGY_MISCONFIGURED', startTime);
      case 403:
        return rawFailure('Crawler-view API: subscription required', 'STRATEGY_MISCONFIGURED', startTime);
      case 429:
        logger.warn('Rate limit hit');
        return rawFailure('Crawler-view API: rate limit exceeded', 'PROVIDER_ERROR', startTime);
      default:
        return rawFailure(`Crawler-view API error: HTTP ${statusCode}`, 'PROVIDER_ERROR', startTime);
    }
  }
}
