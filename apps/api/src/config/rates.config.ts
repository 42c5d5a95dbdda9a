import { registerAs } from '@nestjs/config';
import { z } from 'zod';

const num = (def: number, min: number, max: number) =>
  z.coerce.number().min(min).max(max).default(def);

const csv = z
  .string()
  .default('')
  .transform(s => s.split(',').map(x => x.trim()).filter(Boolean));

const percent = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'markup must be a non-negative decimal');

// 'USD/RUB=3,BTC/USDT=1.5' 형태
const markupPairs = csv.transform((items, ctx) => {
  const pairs: Record<string, string> = {};
  for (const item of items) {
    const [pair, pct] = item.split('=').map(s => s.trim());
    const ok = /^[A-Z0-9]{2,10}\/[A-Z0-9]{2,10}$/.test(pair?.toUpperCase() ?? '') && percent.safeParse(pct).success;
    if (!ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid MARKUP_PAIRS entry: ${item}` });
      return z.NEVER;
    }
    pairs[pair.toUpperCase()] = pct;
  }
  return pairs;
});

const amount = /^\d+(\.\d+)?$/;

// 'USD/RUB=10:100000,BTC/USDT=:5' 형태. 한쪽은 비워둘 수 있다
const amountLimits = csv.transform((items, ctx) => {
  const limits: Record<string, AmountLimit> = {};
  for (const item of items) {
    const [pair = '', range = ''] = item.split('=').map(s => s.trim());
    const [min = '', max = ''] = range.split(':').map(s => s.trim());
    const ok =
      /^[A-Z0-9]{2,10}\/[A-Z0-9]{2,10}$/.test(pair.toUpperCase()) &&
      range.includes(':') &&
      (min !== '' || max !== '') &&
      (min === '' || amount.test(min)) &&
      (max === '' || amount.test(max)) &&
      (min === '' || max === '' || Number(min) < Number(max));
    if (!ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid AMOUNT_LIMITS entry: ${item}` });
      return z.NEVER;
    }
    const limit: { min?: string; max?: string } = {};
    if (min !== '') limit.min = min;
    if (max !== '') limit.max = max;
    limits[pair.toUpperCase()] = Object.freeze(limit);
  }
  return limits;
});

export const RatesEnvSchema = z
  .object({
    UPSTREAM_BASE_URL: z
      .string()
      .url()
      .regex(/^https?:\/\//, 'UPSTREAM_BASE_URL must start with http:// or https://')
      .default('https://api.rapira.net')
      .transform(u => u.replace(/\/+$/, '')),
    UPSTREAM_RATES_PATH: z.string().startsWith('/').default('/open/market/rates'),
    UPSTREAM_TIMEOUT_S: num(30, 5, 120),
    UPSTREAM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
    UPSTREAM_RETRY_DELAY_S: num(1, 0.001, 10),
    UPSTREAM_BACKOFF_FACTOR: num(2, 1, 5),
    UPSTREAM_JITTER_MIN: num(0.8, 0, 1),
    UPSTREAM_JITTER_MAX: num(1.2, 1, 2),
    UPSTREAM_MAX_RETRY_AFTER_S: num(30, 0, 300),
    CB_THRESHOLD: z.coerce.number().int().min(1).max(20).default(5),
    CB_TIMEOUT_S: num(60, 1, 300),
    RATES_CACHE_TTL_S: num(300, 1, 3600),
    RATES_CACHE_MAX_TTL_S: num(900, 1, 86400),
    RATES_CACHE_POPULARITY_STEP: z.coerce.number().int().min(1).default(10),
    CACHE_STORE: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().url().optional(),
    MARKUP_DEFAULT_PCT: percent.default('2.5'),
    MARKUP_PAIRS: markupPairs,
    AMOUNT_LIMITS: amountLimits,
    RATES_ALLOWED_PAIRS: csv.transform(items => items.map(s => s.toUpperCase())),
    RATES_WARM_INTERVAL_S: z.coerce.number().min(0).default(0),
  })
  .superRefine((env, ctx) => {
    if (env.RATES_CACHE_MAX_TTL_S < env.RATES_CACHE_TTL_S) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['RATES_CACHE_MAX_TTL_S'], message: 'must be >= RATES_CACHE_TTL_S' });
    }
    if (env.CACHE_STORE === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REDIS_URL'], message: 'required when CACHE_STORE=redis' });
    }
  });

export type RetryPolicy = Readonly<{
  maxRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
  jitter: readonly [number, number];
  // 429 Retry-After를 따를 최대 대기시간
  maxRetryAfterMs: number;
}>;

export type MarkupConfig = Readonly<{
  defaultPercent: string;
  pairs: Readonly<Record<string, string>>;
}>;

/** 통화쌍별 환산 금액 한도. 경계값은 허용 */
export type AmountLimit = Readonly<{ min?: string; max?: string }>;

export type RatesConfig = Readonly<{
  upstream: Readonly<{ baseUrl: string; ratesPath: string; timeoutMs: number }>;
  retry: RetryPolicy;
  circuitBreaker: Readonly<{ threshold: number; timeoutMs: number }>;
  cache: Readonly<{
    store: 'memory' | 'redis';
    redisUrl?: string;
    ttlMs: number;
    maxTtlMs: number;
    popularityStep: number;
  }>;
  markup: MarkupConfig;
  amountLimits: Readonly<Record<string, AmountLimit>>;
  allowedPairs: readonly string[];
  warmIntervalMs: number;
}>;

/**
 * 환경변수를 한 번 검증해서 불변 설정 객체로 만든다.
 * 잘못된 값이 있으면 부팅 단계에서 예외.
 */
export function parseRatesConfig(env: Record<string, string | undefined>): RatesConfig {
  const e = RatesEnvSchema.parse(env);
  return Object.freeze({
    upstream: Object.freeze({
      baseUrl: e.UPSTREAM_BASE_URL,
      ratesPath: e.UPSTREAM_RATES_PATH,
      timeoutMs: Math.round(e.UPSTREAM_TIMEOUT_S * 1000),
    }),
    retry: Object.freeze({
      maxRetries: e.UPSTREAM_MAX_RETRIES,
      baseDelayMs: e.UPSTREAM_RETRY_DELAY_S * 1000,
      backoffFactor: e.UPSTREAM_BACKOFF_FACTOR,
      jitter: Object.freeze([e.UPSTREAM_JITTER_MIN, e.UPSTREAM_JITTER_MAX] as const),
      maxRetryAfterMs: Math.round(e.UPSTREAM_MAX_RETRY_AFTER_S * 1000),
    }),
    circuitBreaker: Object.freeze({
      threshold: e.CB_THRESHOLD,
      timeoutMs: Math.round(e.CB_TIMEOUT_S * 1000),
    }),
    cache: Object.freeze({
      store: e.CACHE_STORE,
      redisUrl: e.REDIS_URL,
      ttlMs: Math.round(e.RATES_CACHE_TTL_S * 1000),
      maxTtlMs: Math.round(e.RATES_CACHE_MAX_TTL_S * 1000),
      popularityStep: e.RATES_CACHE_POPULARITY_STEP,
    }),
    markup: Object.freeze({
      defaultPercent: e.MARKUP_DEFAULT_PCT,
      pairs: Object.freeze({ ...e.MARKUP_PAIRS }),
    }),
    amountLimits: Object.freeze({ ...e.AMOUNT_LIMITS }),
    allowedPairs: Object.freeze([...e.RATES_ALLOWED_PAIRS]),
    warmIntervalMs: Math.round(e.RATES_WARM_INTERVAL_S * 1000),
  });
}

export const ratesConfig = registerAs('rates', () => parseRatesConfig(process.env));
