/**
 * Translation proxy fetcher
 *
 * Requests the page through `{host}.translate.goog`. The origin sees the
 * request coming from Google's proxy network, so sites that serve different
 * content to Google answer with their crawler version.
 */

import { fetchHttp } from './http';
import { BROWSER_ACCEPT_HEADERS } from './user-agents';
import { rawFailure, rawSuccess, type RawResult } from './types';

const TRANSLATE_PARAMS = '_x_tr_sl=auto&_x_tr_tl=en&_x_tr_hl=en';
const MIN_PROXY_DOCUMENT_LENGTH = 1000;

const UNREACHABLE_MARKERS = ["Can't reach this website", 'Can&#39;t reach this website'];

// Markup the proxy injects into every translated page
const WRAPPER_PATTERNS: RegExp[] = [
  /<script[^>]*src="[^"]*gstatic\.com\/_\/translate_http\/[^"]*"[^>]*><\/script>/gi,
  /<link[^>]*href="[^"]*gstatic\.com\/_\/translate_http\/[^"]*"[^>]*>/gi,
  /<meta http-equiv="X-Translated-By"[^>]*>/gi,
  /<meta http-equiv="X-Translated-To"[^>]*>/gi,
  /<meta name="robots" content="none">/gi,
  /<link[^>]*href="[^"]*fonts\.googleapis\.com[^"]*"[^>]*>/gi,
  /<script[^>]*>(?:(?!<\/script>)[\s\S])*?gtElInit[\s\S]*?<\/script>/gi,
  /<script id="google-translate-element-script"[^>]*>[\s\S]*?<\/script>/gi,
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Encode a hostname the way translate.goog does: `-` becomes `--`, `.` becomes `-`
 */
export function toProxyHost(hostname: string): string {
  return hostname.replace(/-/g, '--').replace(/\./g, '-');
}

/**
 * Build the proxy URL for a target page
 */
export function buildTranslateUrl(targetUrl: string): string {
  const parsed = new URL(targetUrl);
  const path = parsed.pathname || '/';
  const query = parsed.search ? `${TRANSLATE_PARAMS}&${parsed.search.slice(1)}` : TRANSLATE_PARAMS;
  return `https://${toProxyHost(parsed.hostname)}.translate.goog${path}?${query}`;
}

/**
 * Remove the proxy's wrapper markup and point links back at the origin
 */
export function cleanTranslatedHtml(html: string, originalUrl: string): string {
  const { hostname } = new URL(originalUrl);
  const proxyHost = `${toProxyHost(hostname)}.translate.goog`;

  let cleaned = WRAPPER_PATTERNS.reduce((acc, pattern) => acc.replace(pattern, ''), html);

  const proxiedLink = new RegExp(
    `(href|src)="https://${escapeRegExp(proxyHost)}([^"?]*)\\?[^"]*_x_tr[^"]*"`,
    'g',
  );
  cleaned = cleaned.replace(proxiedLink, `$1="https://${hostname}$2"`);

  return cleaned.split(proxyHost).join(hostname);
}

export interface TranslateProxyFetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export async function fetchViaTranslateProxy(
  url: string,
  options: TranslateProxyFetchOptions,
): Promise<RawResult> {
  const startTime = Date.now();

  const result = await fetchHttp({
    url: buildTranslateUrl(url),
    timeout: options.timeoutMs,
    headers: BROWSER_ACCEPT_HEADERS,
    signal: options.signal,
  });

  if (!result.ok) {
    return rawFailure(`Translate proxy: ${result.error}`, result.errorCode, startTime);
  }

  const { statusCode, body } = result.response;
  if (statusCode !== 200) {
    return rawFailure(
      `Translate proxy returned HTTP ${statusCode}`,
      statusCode >= 500 ? 'FETCH_HTTP_5XX' : 'FETCH_HTTP_4XX',
      startTime,
      statusCode,
    );
  }

  if (UNREACHABLE_MARKERS.some(marker => body.includes(marker))) {
    return rawFailure('Translate proxy could not reach the website', 'PROVIDER_ERROR', startTime, statusCode);
  }

  if (body.length <= MIN_PROXY_DOCUMENT_LENGTH || !body.toLowerCase().includes('<html')) {
    return rawFailure('Translate proxy returned no document', 'CONTENT_TOO_SHORT', startTime, statusCode);
  }

  return rawSuccess(cleanTranslatedHtml(body, url), statusCode, url, startTime);
}
