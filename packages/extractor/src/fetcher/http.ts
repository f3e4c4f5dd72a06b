// HTTP fetcher using undici
import { request } from 'undici';
import { gunzipSync, inflateSync, brotliDecompressSync } from 'zlib';
import type { ErrorCode } from '@cloakscope/shared';

/**
 * Decompress response body based on Content-Encoding header
 */
function decompressBody(buffer: Buffer, encoding: string | null): string {
  if (!encoding) {
    return buffer.toString('utf-8');
  }

  const enc = encoding.toLowerCase().trim();

  try {
    if (enc === 'gzip' || enc === 'x-gzip') {
      return gunzipSync(buffer).toString('utf-8');
    } else if (enc === 'deflate') {
      return inflateSync(buffer).toString('utf-8');
    } else if (enc === 'br') {
      return brotliDecompressSync(buffer).toString('utf-8');
    }
    return buffer.toString('utf-8');
  } catch {
    // Mislabelled encoding, the raw bytes are the best we have
    return buffer.toString('utf-8');
  }
}

const DEFAULT_TIMEOUT = 30000;
const MAX_REDIRECTS = 5;

export interface HttpRequestOptions {
  url: string;
  timeout?: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
  headers: Record<string, string>;
  elapsedMs: number;
}

export type HttpFetchResult =
  | { ok: true; response: HttpResponse }
  | { ok: false; errorCode: ErrorCode; error: string; elapsedMs: number };

export interface TransportError {
  errorCode: ErrorCode;
  error: string;
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return readErrorCode(error.cause);
  return undefined;
}

function readErrorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

/**
 * Classify a thrown network error (undici, fetch, Playwright) into an ErrorCode
 */
export function classifyTransportError(error: unknown, timeoutMs?: number): TransportError {
  const message = error instanceof Error ? error.message : String(error);
  const code = readErrorCode(error);
  const name = readErrorName(error);
  const lower = message.toLowerCase();

  if (
    name === 'TimeoutError' ||
    name === 'AbortError' ||
    code === 'UND_ERR_CONNECT_TIMEOUT' ||
    code === 'UND_ERR_HEADERS_TIMEOUT' ||
    code === 'UND_ERR_BODY_TIMEOUT' ||
    lower.includes('timeout')
  ) {
    return {
      errorCode: 'FETCH_TIMEOUT',
      error: timeoutMs ? `Request timeout after ${timeoutMs}ms` : `Request timeout: ${message}`,
    };
  }

  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN' || lower.includes('net::err_name_not_resolved')) {
    return { errorCode: 'FETCH_DNS', error: `DNS lookup failed: ${message}` };
  }

  if (code === 'CERT_HAS_EXPIRED' || code === 'DEPTH_ZERO_SELF_SIGNED_CERT' || lower.includes('net::err_cert')) {
    return { errorCode: 'FETCH_TLS', error: `TLS error: ${message}` };
  }

  if (
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'EPIPE' ||
    code === 'EHOSTUNREACH' ||
    code === 'ENETUNREACH'
  ) {
    return { errorCode: 'FETCH_CONNECTION', error: `Connection failed: ${code} - ${message}` };
  }

  return { errorCode: 'FETCH_CONNECTION', error: `Fetch failed: ${message}` };
}

/**
 * GET a URL with undici. Non-2xx statuses are returned as responses; only
 * transport failures produce `ok: false`.
 */
export async function fetchHttp(options: HttpRequestOptions): Promise<HttpFetchResult> {
  const startTime = Date.now();
  const { url, timeout = DEFAULT_TIMEOUT, headers = {}, signal } = options;

  const requestHeaders: Record<string, string> = {
    'Accept-Encoding': 'gzip, deflate, br',
    ...headers,
  };

  try {
    const response = await request(url, {
      method: 'GET',
      headers: requestHeaders,
      maxRedirections: MAX_REDIRECTS,
      headersTimeout: timeout,
      bodyTimeout: timeout,
      signal,
    });

    const responseHeaders: Record<string, string> = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (typeof value === 'string') {
        responseHeaders[key] = value;
      } else if (Array.isArray(value)) {
        responseHeaders[key] = value.join(', ');
      }
    }

    const buffer = Buffer.from(await response.body.arrayBuffer());
    const body = decompressBody(buffer, responseHeaders['content-encoding'] || null);

    return {
      ok: true,
      response: {
        statusCode: response.statusCode,
        body,
        headers: responseHeaders,
        elapsedMs: Date.now() - startTime,
      },
    };
  } catch (error) {
    const classified = classifyTransportError(error, timeout);
    return { ok: false, ...classified, elapsedMs: Date.now() - startTime };
  }
}
