// Domain types for Cloakscope - crawler vs visitor content comparison

export const IDENTITIES = ["crawler", "visitor"] as const;

export type Identity = (typeof IDENTITIES)[number];

export type StrategyId =
  | "trusted-proxy"
  | "translate-proxy"
  | "managed-render"
  | "browser-direct"
  | "browser-stealth"
  | "challenge-solver"
  | "browser-proxied"
  | "browser-visitor";

export const STRATEGY_IDS: readonly StrategyId[] = [
  "trusted-proxy",
  "translate-proxy",
  "managed-render",
  "browser-direct",
  "browser-stealth",
  "challenge-solver",
  "browser-proxied",
  "browser-visitor",
];

export type StrategyTag = "trusted-proxy" | "translation" | "managed" | "browser" | "stealth" | "proxied" | "challenge-solver";

export type ErrorCode =
  // Configuration
  | "STRATEGY_UNAVAILABLE" | "STRATEGY_MISCONFIGURED"
  // Transport
  | "FETCH_TIMEOUT" | "FETCH_DNS" | "FETCH_CONNECTION" | "FETCH_TLS" | "FETCH_HTTP_4XX" | "FETCH_HTTP_5XX"
  | "PROVIDER_ERROR" | "CONTENT_TOO_SHORT"
  // Block detection
  | "BLOCK_STATUS_401" | "BLOCK_STATUS_403" | "BLOCK_STATUS_429" | "BLOCK_STATUS_503"
  | "BLOCK_CHALLENGE_PAGE" | "BLOCK_ERROR_TITLE"
  // Terminal
  | "ACQUISITION_EXHAUSTED" | "INVALID_URL"
  // Unknown
  | "UNKNOWN";

export type ErrorKind = "configuration" | "transport" | "blocked" | "exhaustion" | "invalid_request";

export type BlockVerdict = "success" | "blocked" | "challenged";

export type AttemptOutcome =
  | "accepted"
  | "blocked"
  | "challenged"
  | "too_short"
  | "transport_error"
  | "timeout"
  | "unavailable";

export interface AttemptRecord {
  strategy: StrategyId;
  outcome: AttemptOutcome;
  httpStatus: number | null;
  elapsedMs: number;
  error: string | null;
  errorCode: ErrorCode | null;
}

export interface AcquireOptions {
  skipTrustedProxy?: boolean;
  preferCloakedProvenance?: boolean;
  skipStrategies?: StrategyId[];
  bypassCache?: boolean;
}

export interface FetchSuccess {
  success: true;
  url: string;
  finalUrl: string;
  html: string;
  strategy: StrategyId;
  cloakedProvenance: boolean;
  cached: boolean;
  elapsedMs: number;
  attempts: AttemptRecord[];
}

export interface FetchFailure {
  success: false;
  url: string;
  error: string;
  errorCode: ErrorCode;
  errorKind: ErrorKind;
  elapsedMs: number;
  attempts: AttemptRecord[];
}

export type FetchOutcome = FetchSuccess | FetchFailure;

export interface CloakingReport {
  detected: boolean;
  crawlerOnlyLines: number;
  visitorOnlyLines: number;
  crawlerLineCount: number;
  visitorLineCount: number;
  crawlerOnlyElements: string[];
  visitorOnlyElements: string[];
  signals: CloakingSignal[];
}

export type CloakingSignal = "seo_elements_differ" | "crawler_lines_exceed_threshold" | "visitor_lines_exceed_threshold";

export interface HreflangEntry {
  lang: string;
  url: string;
}

export interface SeoData {
  title: string | null;
  h1: string | null;
  description: string | null;
  canonical: string | null;
  htmlLang: string | null;
  robots: string | null;
  hreflang: HreflangEntry[];
  alternateUrls: string[];
}

export function isStrategyId(value: string): value is StrategyId {
  return STRATEGY_IDS.some(id => id === value);
}
