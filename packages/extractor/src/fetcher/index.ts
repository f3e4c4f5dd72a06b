// Fetcher exports
export { fetchHttp, classifyTransportError } from './http';
export { BrowserPool, fetchHeadless, withCacheBuster, withoutCacheBuster, toPlaywrightProxy } from './headless';
export { FlareSolverrClient } from './flaresolverr';
export { TrustedProxyClient } from './trusted-proxy';
export { ManagedRenderClient } from './managed-render';
export { fetchViaTranslateProxy, buildTranslateUrl, cleanTranslatedHtml } from './translate-proxy';
export { BlockDetector } from './block-detection';
export {
  buildStrategies,
  DEFAULT_STRATEGY_ORDER,
  BrowserStrategy,
  ChallengeSolverStrategy,
  ManagedRenderStrategy,
  TranslateProxyStrategy,
  TrustedProxyStrategy,
} from './strategies';
export { GOOGLEBOT_UA, CHROME_UA } from './user-agents';
export { rawFailure, rawSuccess } from './types';
export type { HttpRequestOptions, HttpResponse, HttpFetchResult } from './http';
export type { BrowserFlavor, HeadlessFetchOptions } from './headless';
export type { FlareSolverrOptions } from './flaresolverr';
export type { TrustedProxyOptions } from './trusted-proxy';
export type { ManagedRenderOptions } from './managed-render';
export type { BlockDetectorOptions, BlockSignal } from './block-detection';
export type { StrategyRegistry, StrategyRegistryConfig } from './strategies';
export type {
  RawResult,
  RawSuccess,
  RawFailure,
  StrategyAdapter,
  StrategyDescriptor,
  StrategyFetchContext,
} from './types';
