import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { AcquireOptions, CloakingReport, FetchOutcome, Identity, StrategyId } from '@cloakscope/shared';
import {
  AcquisitionEngine,
  BlockDetector,
  BrowserPool,
  buildStrategies,
  CloakingComparator,
  FlareSolverrClient,
  ManagedRenderClient,
  ResponseCache,
  TrustedProxyClient,
  type CacheBackend,
  type StrategyRegistry,
} from '@cloakscope/extractor';
import { ConfigService } from '../config/config.service';

export interface StrategyStatus {
  id: StrategyId;
  available: boolean;
}

/**
 * Owns the acquisition stack for the lifetime of the app: browser pool,
 * response cache, strategy registry and engine.
 */
@Injectable()
export class AcquisitionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(AcquisitionService.name);
  private readonly pool = new BrowserPool();
  private readonly comparator = new CloakingComparator();
  private readonly cache: ResponseCache;
  private readonly flareSolverr: FlareSolverrClient | null;
  private readonly strategies: StrategyRegistry;
  private readonly engine: AcquisitionEngine;
  private readonly proxyUrl: string | undefined;

  constructor(private readonly config: ConfigService) {
    const detector = new BlockDetector();
    this.proxyUrl = config.proxyUrl;

    this.cache = new ResponseCache({
      redisUrl: config.redisUrl,
      ttlSeconds: config.cacheTtlSeconds,
    });

    const flareSolverrUrl = config.flareSolverrUrl;
    this.flareSolverr = flareSolverrUrl ? new FlareSolverrClient({ url: flareSolverrUrl }) : null;

    this.strategies = buildStrategies({
      pool: this.pool,
      detector,
      trustedProxy: new TrustedProxyClient({
        baseUrl: config.trustedProxyBaseUrl,
        token: config.trustedProxyToken,
      }),
      managedRender: new ManagedRenderClient({
        apiKey: config.managedRenderApiKey,
        endpoint: config.managedRenderEndpoint,
      }),
      flareSolverr: this.flareSolverr,
      translateProxyEnabled: config.translateProxyEnabled,
      fetchTimeoutMs: config.fetchTimeoutMs,
      maxChallengeWaitSeconds: config.maxChallengeWaitSeconds,
      proxyUrl: this.proxyUrl,
    });

    const order = config.strategyOrder;
    this.engine = new AcquisitionEngine({
      strategies: this.strategies,
      order,
      detector,
      cache: this.cache,
      minHtmlLength: config.minHtmlLength,
      attemptTimeoutMs: config.fetchTimeoutMs,
    });

    this.logger.log(`Crawler order: ${order.crawler.join(' > ')}`);
    this.logger.log(`Visitor order: ${order.visitor.join(' > ')}`);
  }

  async onModuleInit(): Promise<void> {
    await this.cache.start();
    if (this.flareSolverr) {
      await this.flareSolverr.checkHealth();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.shutdown();
    await this.cache.stop();
  }

  acquire(url: string, identity: Identity, options: AcquireOptions = {}): Promise<FetchOutcome> {
    return this.engine.acquire(url, identity, options);
  }

  compare(crawlerHtml: string, visitorHtml: string, strict = false): CloakingReport {
    return this.comparator.compare(crawlerHtml, visitorHtml, { strict });
  }

  async strategyStatus(): Promise<StrategyStatus[]> {
    const statuses: StrategyStatus[] = [];
    for (const [id, adapter] of this.strategies) {
      let available = false;
      try {
        available = await adapter.isAvailable();
      } catch (error) {
        this.logger.warn(`Availability check failed for ${id}: ${error instanceof Error ? error.message : String(error)}`);
      }
      statuses.push({ id, available });
    }
    return statuses;
  }

  get challengeSolverAvailable(): boolean {
    return this.flareSolverr?.isAvailable() ?? false;
  }

  get proxyConfigured(): boolean {
    return !!this.proxyUrl;
  }

  get cacheBackend(): CacheBackend {
    return this.cache.backend;
  }
}
