/**
 * Error Taxonomy - Human-readable error messages and recommendations
 *
 * Maps acquisition error codes to their kind (configuration, transport, blocked,
 * exhaustion, invalid request) plus user-facing text.
 */

import type { ErrorCode, ErrorKind } from './domain';

export interface ErrorInfo {
  title: string;
  description: string;
  recommendation: string;
  severity: 'info' | 'warning' | 'error' | 'critical';
  retryable: boolean;
  kind: ErrorKind;
}

/**
 * Error taxonomy mapping
 */
export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  // Configuration errors - the strategy is skipped, never counted as a failure
  STRATEGY_UNAVAILABLE: {
    title: 'Strategy Unavailable',
    description: 'The acquisition strategy is not configured or its health check failed.',
    recommendation: 'Provide the credentials or start the service this strategy depends on.',
    severity: 'info',
    retryable: false,
    kind: 'configuration',
  },
  STRATEGY_MISCONFIGURED: {
    title: 'Strategy Misconfigured',
    description: 'The acquisition service rejected our credentials.',
    recommendation: 'Check or refresh the API key / token for this strategy.',
    severity: 'error',
    retryable: false,
    kind: 'configuration',
  },

  // Transport errors - fail one strategy, the cascade continues
  FETCH_TIMEOUT: {
    title: 'Request Timeout',
    description: 'The strategy did not answer within its time budget.',
    recommendation: 'Increase FETCH_TIMEOUT_MS or check if the website is slow.',
    severity: 'warning',
    retryable: true,
    kind: 'transport',
  },
  FETCH_DNS: {
    title: 'DNS Error',
    description: 'Could not resolve the website domain.',
    recommendation: 'Check if the URL is correct and the website exists.',
    severity: 'error',
    retryable: true,
    kind: 'transport',
  },
  FETCH_CONNECTION: {
    title: 'Connection Failed',
    description: 'Could not connect to the website or the acquisition service.',
    recommendation: 'The website may be down or refusing connections.',
    severity: 'warning',
    retryable: true,
    kind: 'transport',
  },
  FETCH_TLS: {
    title: 'SSL/TLS Error',
    description: 'Secure connection could not be established.',
    recommendation: 'The website may have an invalid SSL certificate.',
    severity: 'error',
    retryable: false,
    kind: 'transport',
  },
  FETCH_HTTP_4XX: {
    title: 'Client Error',
    description: 'The request was answered with a 4xx status.',
    recommendation: 'Check if the URL is correct or if login is required.',
    severity: 'warning',
    retryable: false,
    kind: 'transport',
  },
  FETCH_HTTP_5XX: {
    title: 'Server Error',
    description: 'The request was answered with a 5xx status.',
    recommendation: 'The server may be overloaded. Try again later.',
    severity: 'warning',
    retryable: true,
    kind: 'transport',
  },
  PROVIDER_ERROR: {
    title: 'Provider Error',
    description: 'The acquisition service returned an error.',
    recommendation: 'Check the service status; the next strategy is tried automatically.',
    severity: 'warning',
    retryable: true,
    kind: 'transport',
  },
  CONTENT_TOO_SHORT: {
    title: 'Content Too Short',
    description: 'The returned document is smaller than the minimum viable size.',
    recommendation: 'The page may be a placeholder or an error stub.',
    severity: 'warning',
    retryable: true,
    kind: 'transport',
  },

  // Block detection
  BLOCK_STATUS_401: {
    title: 'Unauthorized',
    description: 'The website answered 401 Unauthorized.',
    recommendation: 'The page may require login.',
    severity: 'warning',
    retryable: true,
    kind: 'blocked',
  },
  BLOCK_STATUS_403: {
    title: 'Access Forbidden',
    description: 'The website answered 403 Forbidden.',
    recommendation: 'The website is denying this identity. A trusted-proxy strategy may succeed.',
    severity: 'warning',
    retryable: true,
    kind: 'blocked',
  },
  BLOCK_STATUS_429: {
    title: 'Rate Limited',
    description: 'Too many requests to this website.',
    recommendation: 'Wait before analyzing this domain again.',
    severity: 'warning',
    retryable: true,
    kind: 'blocked',
  },
  BLOCK_STATUS_503: {
    title: 'Service Unavailable',
    description: 'The website answered 503, commonly used by challenge pages.',
    recommendation: 'A challenge-solving strategy may succeed.',
    severity: 'warning',
    retryable: true,
    kind: 'blocked',
  },
  BLOCK_CHALLENGE_PAGE: {
    title: 'Challenge Page',
    description: 'The response is an automated browser-verification page.',
    recommendation: 'Configure FlareSolverr or a managed rendering service.',
    severity: 'warning',
    retryable: true,
    kind: 'blocked',
  },
  BLOCK_ERROR_TITLE: {
    title: 'Blocking Page',
    description: 'The response title identifies an access-denied or error page.',
    recommendation: 'The website is denying this identity.',
    severity: 'warning',
    retryable: true,
    kind: 'blocked',
  },

  // Terminal
  ACQUISITION_EXHAUSTED: {
    title: 'All Strategies Failed',
    description: 'Every configured acquisition strategy failed or was unavailable.',
    recommendation: 'Configure additional strategies (trusted proxy, managed rendering, FlareSolverr, proxy).',
    severity: 'error',
    retryable: true,
    kind: 'exhaustion',
  },
  INVALID_URL: {
    title: 'Invalid URL',
    description: 'The URL is not an absolute http(s) URL.',
    recommendation: 'Provide a full URL such as https://example.com/page.',
    severity: 'error',
    retryable: false,
    kind: 'invalid_request',
  },

  // Unknown
  UNKNOWN: {
    title: 'Unknown Error',
    description: 'An unexpected error occurred.',
    recommendation: 'Please report this if it persists.',
    severity: 'warning',
    retryable: true,
    kind: 'transport',
  },
};

function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_TAXONOMY, value);
}

/**
 * Get error info for an error code
 */
export function getErrorInfo(errorCode: string | null): ErrorInfo | null {
  if (!errorCode) return null;
  if (isErrorCode(errorCode)) return ERROR_TAXONOMY[errorCode];
  return {
    title: 'Unknown Error',
    description: `Error: ${errorCode}`,
    recommendation: 'Please report this if it persists.',
    severity: 'warning',
    retryable: true,
    kind: 'transport',
  };
}

export function getErrorKind(errorCode: ErrorCode): ErrorKind {
  return ERROR_TAXONOMY[errorCode].kind;
}

/**
 * Map a blocking HTTP status to its error code
 */
export function blockStatusToErrorCode(status: number): ErrorCode {
  switch (status) {
    case 401: return 'BLOCK_STATUS_401';
    case 403: return 'BLOCK_STATUS_403';
    case 429: return 'BLOCK_STATUS_429';
    case 503: return 'BLOCK_STATUS_503';
    default: return status >= 500 ? 'FETCH_HTTP_5XX' : 'FETCH_HTTP_4XX';
  }
}
