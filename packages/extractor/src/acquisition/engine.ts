/**
 * Content acquisition engine
 *
 * Walks an ordered list of strategy adapters until one returns HTML that the
 * shared BlockDetector accepts. Every adapter is tried at most once per call,
 * each attempt is recorded, and the engine never throws: all failures end up
 * in the returned FetchOutcome.
 */

import {
  getErrorKind,
  type AcquireOptions,
  type AttemptOutcome,
  type AttemptRecord,
  type ErrorCode,
  type FetchFailure,
  type FetchOutcome,
  type Identity,
  type StrategyId,
} from '@cloakscope/shared';
import type { ResponseCache } from '../cache/response-cache';
import type { BlockDetector } from '../fetcher/block-detection';
import { classifyTransportError } from '../fetcher/http';
import type { StrategyRegistry } from '../fetcher/strategies';
import { rawFailure, type RawResult, type StrategyAdapter } from '../fetcher/types';
import { engineLogger as logger } from '../utils/logger';
import { isValidUrl, normalizeUrl } from './url';

export interface AcquisitionEngineOptions {
  strategies: StrategyRegistry;
  order: Record<Identity, StrategyId[]>;
  detector: BlockDetector;
  cache: ResponseCache;
  /** Shortest HTML accepted as real content */
  minHtmlLength?: number;
  /** Per-attempt budget for adapters without their own */
  attemptTimeoutMs?: number;
}

interface AttemptVerdict {
  outcome: AttemptOutcome;
  error: string | null;
  errorCode: ErrorCode | null;
}

const DEFAULT_MIN_HTML_LENGTH = 500;
const DEFAULT_ATTEMPT_TIMEOUT_MS = 30000;

function failureOutcome(errorCode: ErrorCode): AttemptOutcome {
  switch (errorCode) {
    case 'FETCH_TIMEOUT':
      return 'timeout';
    case 'BLOCK_CHALLENGE_PAGE':
      return 'challenged';
    default:
      return 'transport_error';
  }
}

export class AcquisitionEngine {
  private readonly strategies: StrategyRegistry;
  private readonly order: Record<Identity, StrategyId[]>;
  private readonly detector: BlockDetector;
  private readonly cache: ResponseCache;
  private readonly minHtmlLength: number;
  private readonly attemptTimeoutMs: number;

  constructor(options: AcquisitionEngineOptions) {
    this.strategies = options.strategies;
    this.order = options.order;
    this.detector = options.detector;
    this.cache = options.cache;
    // An empty document is never content
    this.minHtmlLength = Math.max(1, options.minHtmlLength ?? DEFAULT_MIN_HTML_LENGTH);
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
  }

  async acquire(url: string, identity: Identity, options: AcquireOptions = {}): Promise<FetchOutcome> {
    const startTime = Date.now();

    if (!isValidUrl(url)) {
      return {
        success: false,
        url,
        error: `Invalid URL: ${url}`,
        errorCode: 'INVALID_URL',
        errorKind: getErrorKind('INVALID_URL'),
        elapsedMs: Date.now() - startTime,
        attempts: [],
      };
    }

    const target = normalizeUrl(url);

    if (!options.bypassCache) {
      const entry = await this.cache.get(target, identity);
      if (entry) {
        logger.info(`Cache hit for ${target} (${identity}, ${entry.strategy})`);
        return {
          success: true,
          url: target,
          finalUrl: entry.finalUrl,
          html: entry.html,
          strategy: entry.strategy,
          cloakedProvenance: entry.cloakedProvenance,
          cached: true,
          elapsedMs: Date.now() - startTime,
          attempts: [],
        };
      }
    }

    const adapters = this.plan(identity, options);
    logger.info(`Acquiring ${target} as ${identity} via [${adapters.map(a => a.descriptor.id).join(', ')}]`);

    const attempts: AttemptRecord[] = [];
    let lastError: string | null = null;

    for (const adapter of adapters) {
      const { id, cloakedProvenance } = adapter.descriptor;

      if (!(await this.checkAvailable(adapter))) {
        logger.debug(`${id} unavailable, skipping`);
        attempts.push({ strategy: id, outcome: 'unavailable', httpStatus: null, elapsedMs: 0, error: null, errorCode: null });
        continue;
      }

      logger.debug(`Trying ${id}`);
      const raw = await this.runAttempt(adapter, target);
      const verdict = this.judge(raw);

      attempts.push({
        strategy: id,
        outcome: verdict.outcome,
        httpStatus: raw.httpStatus,
        elapsedMs: raw.elapsedMs,
        error: verdict.error,
        errorCode: verdict.errorCode,
      });

      if (verdict.outcome === 'accepted' && raw.ok) {
        await this.cache.set(
          target,
          { html: raw.html, strategy: id, cloakedProvenance, finalUrl: raw.finalUrl, storedAt: Date.now() },
          identity,
        );
        logger.info(`Accepted ${target} from ${id} (${raw.html.length} chars, ${raw.elapsedMs}ms)`);
        return {
          success: true,
          url: target,
          finalUrl: raw.finalUrl,
          html: raw.html,
          strategy: id,
          cloakedProvenance,
          cached: false,
          elapsedMs: Date.now() - startTime,
          attempts,
        };
      }

      lastError = verdict.error;
      logger.warn(`${id} rejected for ${target}: ${verdict.error} (${verdict.errorCode})`);
    }

    return this.exhausted(target, lastError, attempts, startTime);
  }

  /**
   * Configured order for the identity with the request options applied
   */
  plan(identity: Identity, options: AcquireOptions = {}): StrategyAdapter[] {
    const skip = new Set(options.skipStrategies ?? []);
    const adapters: StrategyAdapter[] = [];

    for (const id of this.order[identity]) {
      const adapter = this.strategies.get(id);
      if (!adapter || skip.has(id)) continue;
      if (options.skipTrustedProxy && adapter.descriptor.tags.includes('trusted-proxy')) continue;
      adapters.push(adapter);
    }

    if (!options.preferCloakedProvenance) {
      return adapters;
    }
    return [
      ...adapters.filter(a => a.descriptor.cloakedProvenance),
      ...adapters.filter(a => !a.descriptor.cloakedProvenance),
    ];
  }

  private async checkAvailable(adapter: StrategyAdapter): Promise<boolean> {
    try {
      return await adapter.isAvailable();
    } catch (error) {
      logger.error(`Availability check failed for ${adapter.descriptor.id}`, error);
      return false;
    }
  }

  private async runAttempt(adapter: StrategyAdapter, url: string): Promise<RawResult> {
    const timeoutMs = adapter.descriptor.timeoutMs ?? this.attemptTimeoutMs;
    const controller = new AbortController();
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<RawResult>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(rawFailure(`Attempt timed out after ${timeoutMs}ms`, 'FETCH_TIMEOUT', startTime));
      }, timeoutMs);
    });

    try {
      return await Promise.race([adapter.fetch(url, { signal: controller.signal, timeoutMs }), timeout]);
    } catch (error) {
      const { errorCode, error: message } = classifyTransportError(error, timeoutMs);
      return rawFailure(message, errorCode, startTime);
    } finally {
      clearTimeout(timer);
    }
  }

  private judge(raw: RawResult): AttemptVerdict {
    const signal = this.detector.inspect(raw);

    if (signal.verdict !== 'success') {
      return {
        outcome: signal.verdict,
        error: `Blocked (${signal.signal})`,
        errorCode: signal.errorCode,
      };
    }

    if (!raw.ok) {
      return {
        outcome: failureOutcome(raw.errorCode),
        error: raw.error,
        errorCode: raw.errorCode,
      };
    }

    if (raw.html.length < this.minHtmlLength) {
      return {
        outcome: 'too_short',
        error: `Content too short (${raw.html.length} < ${this.minHtmlLength} chars)`,
        errorCode: 'CONTENT_TOO_SHORT',
      };
    }

    return { outcome: 'accepted', error: null, errorCode: null };
  }

  private exhausted(
    url: string,
    lastError: string | null,
    attempts: AttemptRecord[],
    startTime: number,
  ): FetchFailure {
    const error = lastError ?? 'No acquisition strategy available';
    logger.warn(`All strategies failed for ${url}: ${error}`);
    return {
      success: false,
      url,
      error,
      errorCode: 'ACQUISITION_EXHAUSTED',
      errorKind: getErrorKind('ACQUISITION_EXHAUSTED'),
      elapsedMs: Date.now() - startTime,
      attempts,
    };
  }
}
