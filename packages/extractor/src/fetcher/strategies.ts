// Strategy adapters wrapping each acquisition technique
import type { Identity, StrategyId } from '@cloakscope/shared';
import { createLogger } from '../utils/logger';
import type { BlockDetector } from './block-detection';
import type { FlareSolverrClient } from './flaresolverr';
import { fetchHeadless, type BrowserFlavor, type BrowserPool } from './headless';
import type { ManagedRenderClient } from './managed-render';
import { fetchViaTranslateProxy } from './translate-proxy';
import type { TrustedProxyClient } from './trusted-proxy';
import type { RawResult, StrategyAdapter, StrategyDescriptor, StrategyFetchContext } from './types';
import { rawFailure } from './types';
import { CHROME_UA, GOOGLEBOT_UA } from './user-agents';

const logger = createLogger('[Strategies]');

export const DEFAULT_STRATEGY_ORDER: Record<Identity, StrategyId[]> = {
  crawler: [
    'trusted-proxy',
    'translate-proxy',
    'managed-render',
    'browser-direct',
    'browser-stealth',
    'challenge-solver',
    'browser-proxied',
  ],
  visitor: ['browser-visitor'],
};

const NETWORK_IDLE_BUDGET_MS = 5000;
const CHALLENGE_SOLVER_BUDGET_MS = 70000;

export class TrustedProxyStrategy implements StrategyAdapter {
  readonly descriptor: StrategyDescriptor = {
    id: 'trusted-proxy',
    label: 'Crawler-view API',
    tags: ['trusted-proxy'],
    cloakedProvenance: true,
  };

  constructor(private readonly client: TrustedProxyClient) {}

  isAvailable(): boolean {
    return this.client.isConfigured();
  }

  fetch(url: string, ctx: StrategyFetchContext): Promise<RawResult> {
    return this.client.fetch(url, ctx);
  }
}

export class TranslateProxyStrategy implements StrategyAdapter {
  readonly descriptor: StrategyDescriptor = {
    id: 'translate-proxy',
    label: 'Translation proxy',
    tags: ['translation'],
    cloakedProvenance: true,
  };

  constructor(private readonly enabled: boolean) {}

  isAvailable(): boolean {
    return this.enabled;
  }

  fetch(url: string, ctx: StrategyFetchContext): Promise<RawResult> {
    return fetchViaTranslateProxy(url, ctx);
  }
}

export class ManagedRenderStrategy implements StrategyAdapter {
  readonly descriptor: StrategyDescriptor = {
    id: 'managed-render',
    label: 'Managed rendering',
    tags: ['managed'],
    cloakedProvenance: false,
  };

  constructor(private readonly client: ManagedRenderClient) {}

  isAvailable(): boolean {
    return this.client.isConfigured();
  }

  fetch(url: string, ctx: StrategyFetchContext): Promise<RawResult> {
    return this.client.fetch(url, ctx);
  }
}

export class ChallengeSolverStrategy implements StrategyAdapter {
  readonly descriptor: StrategyDescriptor = {
    id: 'challenge-solver',
    label: 'FlareSolverr',
    tags: ['challenge-solver'],
    cloakedProvenance: false,
    timeoutMs: CHALLENGE_SOLVER_BUDGET_MS,
  };

  constructor(private readonly client: FlareSolverrClient | null) {}

  isAvailable(): boolean {
    return this.client?.isAvailable() ?? false;
  }

  async fetch(url: string, ctx: StrategyFetchContext): Promise<RawResult> {
    if (!this.client) {
      return rawFailure('FlareSolverr not configured', 'STRATEGY_UNAVAILABLE', Date.now());
    }
    return this.client.fetch(url, { userAgent: GOOGLEBOT_UA, signal: ctx.signal });
  }
}

export interface BrowserStrategyOptions {
  descriptor: StrategyDescriptor;
  pool: BrowserPool;
  detector: BlockDetector;
  flavor: BrowserFlavor;
  userAgent: string;
  navigationTimeoutMs: number;
  maxChallengeWaitSeconds: number;
  proxyUrl?: string;
  /** When set, the strategy is only available if a proxy URL is present */
  requiresProxy?: boolean;
}

export class BrowserStrategy implements StrategyAdapter {
  readonly descriptor: StrategyDescriptor;

  constructor(private readonly options: BrowserStrategyOptions) {
    this.descriptor = options.descriptor;
  }

  isAvailable(): boolean {
    return !this.options.requiresProxy || !!this.options.proxyUrl;
  }

  fetch(url: string, ctx: StrategyFetchContext): Promise<RawResult> {
    const { pool, detector, flavor, userAgent, navigationTimeoutMs, maxChallengeWaitSeconds, proxyUrl } = this.options;
    return fetchHeadless(pool, {
      url,
      userAgent,
      flavor,
      timeoutMs: Math.min(navigationTimeoutMs, ctx.timeoutMs),
      maxChallengeWaitSeconds,
      isChallenge: html => detector.isChallenge(html),
      proxyUrl,
      signal: ctx.signal,
    });
  }
}

export interface StrategyRegistryConfig {
  pool: BrowserPool;
  detector: BlockDetector;
  trustedProxy: TrustedProxyClient;
  managedRender: ManagedRenderClient;
  flareSolverr: FlareSolverrClient | null;
  translateProxyEnabled: boolean;
  fetchTimeoutMs: number;
  maxChallengeWaitSeconds: number;
  proxyUrl?: string;
}

export type StrategyRegistry = ReadonlyMap<StrategyId, StrategyAdapter>;

/**
 * Build one adapter per strategy id from the runtime configuration
 */
export function buildStrategies(config: StrategyRegistryConfig): StrategyRegistry {
  const browserBudget = config.fetchTimeoutMs + config.maxChallengeWaitSeconds * 1000 + NETWORK_IDLE_BUDGET_MS;

  const browser = (
    descriptor: Omit<StrategyDescriptor, 'timeoutMs'>,
    flavor: BrowserFlavor,
    userAgent: string,
    proxied = false,
  ) =>
    new BrowserStrategy({
      descriptor: { ...descriptor, timeoutMs: browserBudget },
      pool: config.pool,
      detector: config.detector,
      flavor,
      userAgent,
      navigationTimeoutMs: config.fetchTimeoutMs,
      maxChallengeWaitSeconds: config.maxChallengeWaitSeconds,
      proxyUrl: proxied ? config.proxyUrl : undefined,
      requiresProxy: proxied,
    });

  const adapters: StrategyAdapter[] = [
    new TrustedProxyStrategy(config.trustedProxy),
    new TranslateProxyStrategy(config.translateProxyEnabled),
    new ManagedRenderStrategy(config.managedRender),
    browser(
      { id: 'browser-direct', label: 'Browser (crawler UA)', tags: ['browser'], cloakedProvenance: false },
      'plain',
      GOOGLEBOT_UA,
    ),
    browser(
      { id: 'browser-stealth', label: 'Stealth browser (crawler UA)', tags: ['browser', 'stealth'], cloakedProvenance: false },
      'stealth',
      GOOGLEBOT_UA,
    ),
    new ChallengeSolverStrategy(config.flareSolverr),
    browser(
      {
        id: 'browser-proxied',
        label: 'Stealth browser via proxy',
        tags: ['browser', 'stealth', 'proxied'],
        cloakedProvenance: false,
      },
      'stealth',
      GOOGLEBOT_UA,
      true,
    ),
    browser(
      { id: 'browser-visitor', label: 'Stealth browser (visitor UA)', tags: ['browser', 'stealth'], cloakedProvenance: false },
      'stealth',
      CHROME_UA,
    ),
  ];

  logger.debug(`Registered ${adapters.length} strategies`);
  return new Map(adapters.map(adapter => [adapter.descriptor.id, adapter]));
}
