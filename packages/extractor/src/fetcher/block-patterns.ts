// Pattern constants for block detection

// Status codes that always mean the identity was denied
export const BLOCKING_STATUS_CODES = [401, 403, 429, 503];

// Lowercase phrases characteristic of browser-verification / challenge pages
export const CHALLENGE_PHRASES = [
  'just a moment',
  'checking your browser',
  'ddos protection',
  'ray id',
  'cf-browser-verification',
  'challenge-running',
  '_cf_chl',
  'cdn-cgi/challenge',
];

// Lowercase <title> texts of known blocking / error pages
export const BLOCKING_TITLES = [
  '403 forbidden',
  'access denied',
  'blocked',
  'error',
  'just a moment',
];

export const TITLE_PATTERN = /<title[^>]*>([\s\S]*?)<\/title>/i;
