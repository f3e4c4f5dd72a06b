// @cloakscope/extractor - acquisition engine, strategies, cache and comparison

export * from './fetcher';
export { AcquisitionEngine } from './acquisition/engine';
export type { AcquisitionEngineOptions } from './acquisition/engine';
export { normalizeUrl, isValidUrl } from './acquisition/url';
export { ResponseCache, hashUrl } from './cache/response-cache';
export type { CacheEntry, CacheBackend, ResponseCacheOptions } from './cache/response-cache';
export { CloakingComparator, countUniqueLines, extractSeoElements, toLines } from './cloaking/comparator';
export type { CloakingComparatorOptions, CompareOptions } from './cloaking/comparator';
export { extractSeoData } from './metadata/seo';
export { createLogger, ExtractorLogger } from './utils/logger';
export type { LogLevel } from './utils/logger';
