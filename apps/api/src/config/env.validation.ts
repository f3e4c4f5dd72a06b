import { z } from 'zod';
import { isStrategyId } from '@cloakscope/shared';

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

const strategyOrder = z
  .string()
  .optional()
  .superRefine((value, ctx) => {
    if (!value) return;
    for (const id of splitList(value)) {
      if (!isStrategyId(id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown strategy: ${id}` });
      }
    }
  });

const booleanFlag = z.enum(['true', 'false']);

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // API
  API_PREFIX: z.string().default('api'),
  THROTTLE_TTL: z.string().default('60'),
  THROTTLE_LIMIT: z.string().default('20'),

  // CORS
  CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:5173'),

  // Acquisition
  FETCH_TIMEOUT_MS: z.string().regex(/^\d+$/, 'FETCH_TIMEOUT_MS must be a number').default('30000'),
  MAX_CHALLENGE_WAIT_SECONDS: z.string().regex(/^\d+$/, 'MAX_CHALLENGE_WAIT_SECONDS must be a number').default('20'),
  MIN_HTML_LENGTH: z.string().regex(/^[1-9]\d*$/, 'MIN_HTML_LENGTH must be a positive number').default('500'),
  STRATEGY_ORDER_CRAWLER: strategyOrder,
  STRATEGY_ORDER_VISITOR: strategyOrder,

  // Strategy providers
  TRUSTED_PROXY_TOKEN: z.string().optional(),
  TRUSTED_PROXY_BASE_URL: z.string().url().default('https://api.affiliate.fm'),
  TRANSLATE_PROXY_ENABLED: booleanFlag.default('true'),
  MANAGED_RENDER_API_KEY: z.string().optional(),
  MANAGED_RENDER_ENDPOINT: z.string().url().optional(),
  FLARESOLVERR_URL: z.string().url().optional(),
  PROXY_URL: z.string().url().optional(),

  // Cache
  REDIS_URL: z.string().optional(),
  CACHE_TTL_SECONDS: z.string().regex(/^\d+$/, 'CACHE_TTL_SECONDS must be a number').default('3600'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
