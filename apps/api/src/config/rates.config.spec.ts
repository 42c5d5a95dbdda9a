import { parseRatesConfig } from './rates.config';

describe('parseRatesConfig', () => {
  it('fills defaults in milliseconds', () => {
    const cfg = parseRatesConfig({});
    expect(cfg.upstream).toEqual({
      baseUrl: 'https://api.rapira.net',
      ratesPath: '/open/market/rates',
      timeoutMs: 30_000,
    });
    expect(cfg.circuitBreaker).toEqual({ threshold: 5, timeoutMs: 60_000 });
    expect(cfg.cache).toMatchObject({ store: 'memory', ttlMs: 300_000, maxTtlMs: 900_000, popularityStep: 10 });
    expect(cfg.markup).toEqual({ defaultPercent: '2.5', pairs: {} });
    expect(cfg.amountLimits).toEqual({});
    expect(cfg.allowedPairs).toEqual([]);
    expect(cfg.warmIntervalMs).toBe(0);
  });

  it('parses markup pairs and the allow-list', () => {
    const cfg = parseRatesConfig({
      MARKUP_PAIRS: 'usd/rub=3, BTC/USDT=1.5',
      RATES_ALLOWED_PAIRS: 'usd/rub,BTC/USDT',
      UPSTREAM_BASE_URL: 'http://localhost:9000/',
    });
    expect(cfg.markup.pairs).toEqual({ 'USD/RUB': '3', 'BTC/USDT': '1.5' });
    expect(cfg.allowedPairs).toEqual(['USD/RUB', 'BTC/USDT']);
    expect(cfg.upstream.baseUrl).toBe('http://localhost:9000');
  });

  it('parses per-pair amount limits with either side optional', () => {
    const cfg = parseRatesConfig({ AMOUNT_LIMITS: 'usd/rub=10:100000, BTC/USDT=:5, EUR/USD=0.5:' });
    expect(cfg.amountLimits).toEqual({
      'USD/RUB': { min: '10', max: '100000' },
      'BTC/USDT': { max: '5' },
      'EUR/USD': { min: '0.5' },
    });
    expect(Object.isFrozen(cfg.amountLimits)).toBe(true);
  });

  it('is frozen', () => {
    const cfg = parseRatesConfig({});
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.retry)).toBe(true);
    expect(Object.isFrozen(cfg.markup.pairs)).toBe(true);
  });

  it.each([
    [{ UPSTREAM_TIMEOUT_S: '1' }],
    [{ UPSTREAM_MAX_RETRIES: '11' }],
    [{ UPSTREAM_BASE_URL: 'ftp://example.test' }],
    [{ CB_THRESHOLD: '0' }],
    [{ MARKUP_DEFAULT_PCT: '-1' }],
    [{ MARKUP_PAIRS: 'USD/RUB' }],
    [{ AMOUNT_LIMITS: 'USD/RUB=100:10' }],
    [{ AMOUNT_LIMITS: 'USD/RUB=:' }],
    [{ AMOUNT_LIMITS: 'USD/RUB=10' }],
    [{ AMOUNT_LIMITS: 'USD/RUB=-1:5' }],
    [{ UPSTREAM_MAX_RETRY_AFTER_S: '301' }],
    [{ RATES_CACHE_TTL_S: '600', RATES_CACHE_MAX_TTL_S: '300' }],
    [{ CACHE_STORE: 'redis' }],
  ])('rejects %j', env => {
    expect(() => parseRatesConfig(env)).toThrow();
  });
});
