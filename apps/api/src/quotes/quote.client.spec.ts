import { parseRatesConfig } from '../config/rates.config';
import { makeSymbol } from '../common/symbol';
import { FakeUpstream, ok, row } from '../../test/support/fake-upstream';
import { ManualClock } from '../../test/support/manual-clock';
import { QuoteClient } from './quote.client';
import {
  CircuitOpenError,
  QuoteAuthError,
  QuoteClientError,
  QuoteRateLimitError,
  QuoteServerError,
  QuoteValidationError,
  RequestCancelledError,
  SymbolNotFoundError,
} from './quote.errors';

const USD_RUB = makeSymbol('USD', 'RUB');

describe('QuoteClient', () => {
  let upstream: FakeUpstream;
  let clock: ManualClock;

  const make = (env: Record<string, string> = {}) =>
    new QuoteClient(
      upstream.http(),
      parseRatesConfig({ UPSTREAM_RETRY_DELAY_S: '0.001', UPSTREAM_JITTER_MIN: '1', UPSTREAM_JITTER_MAX: '1', ...env }),
      clock,
    );

  beforeEach(() => {
    upstream = new FakeUpstream();
    clock = new ManualClock();
  });

  describe('fetchSymbol', () => {
    it('returns the matching row as a RawQuote', async () => {
      upstream.reply(ok([row('BTC/USDT', 43000, 42990), row('USD/RUB', 80.5, 80.1, 80.3)]));
      const client = make();

      await expect(client.fetchSymbol(USD_RUB)).resolves.toEqual({
        symbol: { base: 'USD', quote: 'RUB' },
        askPrice: '80.5',
        bidPrice: '80.1',
        lastPrice: '80.3',
        timestamp: clock.now(),
      });
      expect(upstream.urls).toEqual(['https://api.rapira.net/open/market/rates']);
    });

    it('fails with SymbolNotFoundError without touching the breaker', async () => {
      upstream.reply(ok([row('USD/RUB', 80, 79)]));
      const client = make();

      await expect(client.fetchSymbol(makeSymbol('RUB', 'USD'))).rejects.toBeInstanceOf(SymbolNotFoundError);
      expect(upstream.calls).toBe(1);
      expect(client.circuit()).toEqual({ state: 'CLOSED', failures: 0, lastFailureAt: null });
    });

    it('rejects a row whose ask is below its bid', async () => {
      upstream.reply(ok([row('USD/RUB', 79, 80)]));
      await expect(make().fetchSymbol(USD_RUB)).rejects.toBeInstanceOf(QuoteValidationError);
    });
  });

  describe('fetchAll', () => {
    it('skips rows that fail validation', async () => {
      upstream.reply(
        ok([
          row('USD/RUB', 80, 79),
          row('ETH/USDT', 1, 2),
          { symbol: 'BTCUSDT', askPrice: 1, bidPrice: 1, close: 1 },
          { symbol: 'TON/USDT', askPrice: '2', bidPrice: 1, close: 1 },
        ]),
      );
      const quotes = await make().fetchAll();
      expect(quotes.map(q => q.symbol)).toEqual([{ base: 'USD', quote: 'RUB' }]);
    });
  });

  describe('retry', () => {
    it('retries 5xx responses and records every attempt', async () => {
      upstream.reply({ status: 502 }, { status: 503 }, ok([row('USD/RUB', 80, 79)]));
      const client = make();

      await client.fetchSymbol(USD_RUB);
      expect(upstream.calls).toBe(3);
      expect(client.metrics()).toMatchObject({ total: 3, succeeded: 1, failed: 2 });
    });

    it('retries timeouts and network errors', async () => {
      upstream.reply({ fail: 'timeout' }, { fail: 'network' }, ok([row('USD/RUB', 80, 79)]));
      await make().fetchSymbol(USD_RUB);
      expect(upstream.calls).toBe(3);
    });

    it('retries a body whose code or isWorking flag is off', async () => {
      upstream.reply(
        { status: 200, body: { data: [], code: 1, message: 'maintenance', isWorking: 1 } },
        { status: 200, body: { data: [], code: 0, message: '', isWorking: 0 } },
        { status: 200, body: 'not json' },
        ok([row('USD/RUB', 80, 79)]),
      );
      await make().fetchSymbol(USD_RUB);
      expect(upstream.calls).toBe(4);
    });

    it('surfaces the last error after maxRetries and counts one breaker failure', async () => {
      upstream.always({ status: 500 });
      const client = make();

      await expect(client.fetchAll()).rejects.toBeInstanceOf(QuoteServerError);
      expect(upstream.calls).toBe(4);
      expect(client.circuit().failures).toBe(1);
      expect(client.metrics()).toMatchObject({ total: 4, succeeded: 0, failed: 4, successRate: 0 });
    });

    it('does not retry 4xx responses', async () => {
      upstream.always({ status: 404 });
      const client = make();

      await expect(client.fetchAll()).rejects.toBeInstanceOf(QuoteClientError);
      expect(upstream.calls).toBe(1);
      expect(client.circuit().failures).toBe(0);
    });

    it('treats 401 as a fatal auth error', async () => {
      upstream.always({ status: 401 });
      await expect(make().fetchAll()).rejects.toBeInstanceOf(QuoteAuthError);
      expect(upstream.calls).toBe(1);
    });

    it('waits at least Retry-After on 429', async () => {
      upstream.reply({ status: 429, headers: { 'retry-after': '0.05' } }, ok([]));
      const started = Date.now();
      await make().fetchAll();
      expect(Date.now() - started).toBeGreaterThanOrEqual(45);
      expect(upstream.calls).toBe(2);
    });

    it('gives up instead of sleeping when Retry-After exceeds the ceiling', async () => {
      upstream.reply({ status: 429, headers: { 'retry-after': '86400' } }, ok([]));
      const client = make({ UPSTREAM_MAX_RETRY_AFTER_S: '1' });

      await expect(client.fetchAll()).rejects.toBeInstanceOf(QuoteRateLimitError);
      expect(upstream.calls).toBe(1);
      expect(client.circuit().failures).toBe(1);
    });

    it('counts an exhausted 429 as a breaker failure', async () => {
      upstream.always({ status: 429 });
      const client = make({ UPSTREAM_MAX_RETRIES: '0' });

      await expect(client.fetchAll()).rejects.toBeInstanceOf(QuoteRateLimitError);
      expect(client.circuit().failures).toBe(1);
    });
  });

  describe('circuit breaker', () => {
    it('opens after 5 failed requests and then fails without a network call', async () => {
      upstream.always({ status: 500 });
      const client = make({ UPSTREAM_MAX_RETRIES: '0' });

      for (let i = 0; i < 5; i++) {
        await expect(client.fetchAll()).rejects.toBeInstanceOf(QuoteServerError);
      }
      expect(client.circuit().state).toBe('OPEN');

      await expect(client.fetchAll()).rejects.toBeInstanceOf(CircuitOpenError);
      expect(upstream.calls).toBe(5);
    });

    it('closes again after a successful trial once the timeout has passed', async () => {
      upstream.reply({ status: 500 }, { status: 500 }, { status: 500 }, { status: 500 }, { status: 500 });
      upstream.always(ok([row('USD/RUB', 80, 79)]));
      const client = make({ UPSTREAM_MAX_RETRIES: '0' });
      for (let i = 0; i < 5; i++) await expect(client.fetchAll()).rejects.toThrow();

      clock.advance(60_000);
      await expect(client.fetchAll()).resolves.toHaveLength(1);
      expect(client.circuit()).toEqual({ state: 'CLOSED', failures: 0, lastFailureAt: null });
    });

    it('fails concurrent requests fast while the trial is in flight', async () => {
      upstream.reply({ status: 500 });
      const client = make({ UPSTREAM_MAX_RETRIES: '0', CB_THRESHOLD: '1' });
      await expect(client.fetchAll()).rejects.toThrow();

      clock.advance(60_000);
      const gate = upstream.hold();
      const trial = client.fetchAll();
      await expect(client.fetchAll()).rejects.toBeInstanceOf(CircuitOpenError);

      gate.release(ok([]));
      await expect(trial).resolves.toEqual([]);
      expect(upstream.calls).toBe(2);
    });

    it('resetCircuit() closes an open circuit', async () => {
      upstream.always({ status: 500 });
      const client = make({ UPSTREAM_MAX_RETRIES: '0', CB_THRESHOLD: '1' });
      await expect(client.fetchAll()).rejects.toThrow();
      expect(client.circuit().state).toBe('OPEN');

      client.resetCircuit();
      expect(client.circuit().state).toBe('CLOSED');
    });
  });

  describe('cancellation', () => {
    it('does not call upstream when already aborted', async () => {
      const ctrl = new AbortController();
      ctrl.abort();
      const client = make();

      await expect(client.fetchAll(ctrl.signal)).rejects.toBeInstanceOf(RequestCancelledError);
      expect(upstream.calls).toBe(0);
      expect(client.circuit().failures).toBe(0);
      expect(client.metrics().total).toBe(0);
    });

    it('stops during backoff', async () => {
      upstream.always({ status: 500 });
      const client = make({ UPSTREAM_RETRY_DELAY_S: '1' });
      const ctrl = new AbortController();
      setTimeout(() => ctrl.abort(), 10);

      await expect(client.fetchAll(ctrl.signal)).rejects.toBeInstanceOf(RequestCancelledError);
      expect(upstream.calls).toBe(1);
      expect(client.circuit().failures).toBe(0);
    });
  });

  describe('healthCheck', () => {
    it('reports true for a working upstream', async () => {
      upstream.reply(ok([]));
      await expect(make().healthCheck()).resolves.toBe(true);
    });

    it('reports false instead of throwing', async () => {
      upstream.always({ status: 404 });
      await expect(make().healthCheck()).resolves.toBe(false);
    });
  });
});
