import { Injectable } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';
import { isStrategyId, type Identity, type StrategyId } from '@cloakscope/shared';
import { DEFAULT_STRATEGY_ORDER } from '@cloakscope/extractor';
import { EnvConfig, splitList } from './env.validation';

@Injectable()
export class ConfigService {
  constructor(private configService: NestConfigService<EnvConfig, true>) {}

  get nodeEnv(): string {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): number {
    return parseInt(this.configService.get('PORT', { infer: true }), 10);
  }

  get apiPrefix(): string {
    return this.configService.get('API_PREFIX', { infer: true });
  }

  get throttleTtl(): number {
    return parseInt(this.configService.get('THROTTLE_TTL', { infer: true }), 10);
  }

  get throttleLimit(): number {
    return parseInt(this.configService.get('THROTTLE_LIMIT', { infer: true }), 10);
  }

  get corsOrigins(): string[] {
    return this.configService
      .get('CORS_ORIGINS', { infer: true })
      .split(',')
      .map(origin => origin.trim());
  }

  get fetchTimeoutMs(): number {
    return parseInt(this.configService.get('FETCH_TIMEOUT_MS', { infer: true }), 10);
  }

  get maxChallengeWaitSeconds(): number {
    return parseInt(this.configService.get('MAX_CHALLENGE_WAIT_SECONDS', { infer: true }), 10);
  }

  get minHtmlLength(): number {
    return parseInt(this.configService.get('MIN_HTML_LENGTH', { infer: true }), 10);
  }

  get trustedProxyToken(): string | undefined {
    return this.configService.get('TRUSTED_PROXY_TOKEN', { infer: true });
  }

  get trustedProxyBaseUrl(): string {
    return this.configService.get('TRUSTED_PROXY_BASE_URL', { infer: true });
  }

  get translateProxyEnabled(): boolean {
    return this.configService.get('TRANSLATE_PROXY_ENABLED', { infer: true }) === 'true';
  }

  get managedRenderApiKey(): string | undefined {
    return this.configService.get('MANAGED_RENDER_API_KEY', { infer: true });
  }

  get managedRenderEndpoint(): string | undefined {
    return this.configService.get('MANAGED_RENDER_ENDPOINT', { infer: true });
  }

  get flareSolverrUrl(): string | undefined {
    return this.configService.get('FLARESOLVERR_URL', { infer: true });
  }

  get proxyUrl(): string | undefined {
    return this.configService.get('PROXY_URL', { infer: true });
  }

  get redisUrl(): string | undefined {
    return this.configService.get('REDIS_URL', { infer: true });
  }

  get cacheTtlSeconds(): number {
    return parseInt(this.configService.get('CACHE_TTL_SECONDS', { infer: true }), 10);
  }

  get strategyOrder(): Record<Identity, StrategyId[]> {
    return {
      crawler: this.parseOrder(this.configService.get('STRATEGY_ORDER_CRAWLER', { infer: true }), 'crawler'),
      visitor: this.parseOrder(this.configService.get('STRATEGY_ORDER_VISITOR', { infer: true }), 'visitor'),
    };
  }

  get isDevelopment(): boolean {
    return this.nodeEnv === 'development';
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.nodeEnv === 'test';
  }

  private parseOrder(value: string | undefined, identity: Identity): StrategyId[] {
    const ids = value ? splitList(value).filter(isStrategyId) : [];
    return ids.length > 0 ? ids : [...DEFAULT_STRATEGY_ORDER[identity]];
  }
}
