// 업스트림 시세 API 클라이언트. 서킷 브레이커 + 재시도 + 요청 지표를 소유한다.
import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import type { ConfigType } from '@nestjs/config';
import axios, { AxiosResponse } from 'axios';
import { firstValueFrom } from 'rxjs';
import { setTimeout as sleep } from 'node:timers/promises';
import { ratesConfig } from '../config/rates.config';
import { CLOCK, Clock } from '../common/clock';
import { toMoney } from '../common/money';
import { CurrencySymbol, formatSymbol, InvalidSymbolError, parseSymbol } from '../common/symbol';
import { CircuitBreaker, CircuitPermit } from './circuit-breaker';
import { RequestMetrics } from './request-metrics';
import { AttemptOutcome, parseRetryAfter, retryDelayMs } from './retry-policy';
import {
  countsAgainstCircuit,
  QuoteApiError,
  QuoteAuthError,
  QuoteClientError,
  QuoteRateLimitError,
  QuoteServerError,
  QuoteValidationError,
  RequestCancelledError,
  SymbolNotFoundError,
} from './quote.errors';
import { UpstreamRateRowSchema, UpstreamRatesResponse, UpstreamRatesResponseSchema } from './upstream.schema';
import { assertSpread, CircuitSnapshot, RawQuote, RequestMetricsSnapshot } from './types';

type RowResult = { ok: true; quote: RawQuote } | { ok: false; symbol?: string; reason: string };

@Injectable()
export class QuoteClient {
  private readonly log = new Logger(QuoteClient.name);
  private readonly breaker: CircuitBreaker;
  private readonly stats: RequestMetrics;

  constructor(
    private readonly http: HttpService,
    @Inject(ratesConfig.KEY) private readonly cfg: ConfigType<typeof ratesConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.breaker = new CircuitBreaker(cfg.circuitBreaker, clock);
    this.stats = new RequestMetrics(clock);
  }

  /** 전체 시세. 검증에 실패한 행은 버린다 */
  async fetchAll(signal?: AbortSignal): Promise<RawQuote[]> {
    const body = await this.request(signal);
    const quotes: RawQuote[] = [];
    let skipped = 0;
    for (const row of body.data) {
      const r = this.toRawQuote(row);
      if (r.ok) quotes.push(r.quote);
      else {
        skipped++;
        this.log.debug(`Skip upstream row ${r.symbol ?? '?'}: ${r.reason}`);
      }
    }
    if (skipped) this.log.warn(`Skipped ${skipped} invalid upstream rows`);
    this.log.debug(`Retrieved ${quotes.length} market rates`);
    return quotes;
  }

  /** 단일 심볼. 업스트림 API가 전체 목록만 주므로 목록에서 찾는다 */
  async fetchSymbol(symbol: CurrencySymbol, signal?: AbortSignal): Promise<RawQuote> {
    const wanted = formatSymbol(symbol);
    const body = await this.request(signal);
    for (const row of body.data) {
      const parsed = UpstreamRateRowSchema.safeParse(row);
      if (!parsed.success || parsed.data.symbol.toUpperCase() !== wanted) continue;
      const r = this.toRawQuote(row);
      if (!r.ok) throw new QuoteValidationError(`INVALID_QUOTE: ${wanted} ${r.reason}`);
      return r.quote;
    }
    throw new SymbolNotFoundError(wanted);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.request();
      return true;
    } catch (e) {
      this.log.warn(`Health check failed: ${String(e)}`);
      return false;
    }
  }

  metrics(): RequestMetricsSnapshot {
    return this.stats.snapshot();
  }

  circuit(): CircuitSnapshot {
    return this.breaker.snapshot();
  }

  resetCircuit(): void {
    this.breaker.reset();
  }

  resetMetrics(): void {
    this.stats.reset();
    this.log.log('Client metrics reset');
  }

  // 서킷 브레이커 통과 후 재시도 루프. 재시도 소진은 브레이커 실패 1회로 센다
  private async request(signal?: AbortSignal): Promise<UpstreamRatesResponse> {
    const permit = this.breaker.acquire();
    const policy = this.cfg.retry;

    for (let attempt = 0; ; attempt++) {
      const outcome = await this.attempt(signal);
      if (outcome.kind === 'success') {
        this.breaker.onSuccess();
        return outcome.value;
      }

      const err = outcome.error;
      if (outcome.kind === 'fatal' || attempt >= policy.maxRetries) {
        this.settleFailure(permit, err);
        throw err;
      }

      let delay = retryDelayMs(policy, attempt);
      if (err instanceof QuoteRateLimitError && err.retryAfterMs !== undefined) {
        // 상한보다 오래 기다리라고 하면 기다리지 않고 실패로 끝낸다
        if (err.retryAfterMs > policy.maxRetryAfterMs) {
          this.log.warn(`${err.message}, Retry-After ${Math.round(err.retryAfterMs)}ms exceeds ${policy.maxRetryAfterMs}ms`);
          this.settleFailure(permit, err);
          throw err;
        }
        delay = Math.max(delay, err.retryAfterMs);
      }
      this.log.warn(`${err.message}, retry ${attempt + 1}/${policy.maxRetries} in ${Math.round(delay)}ms`);

      try {
        await sleep(delay, undefined, { signal });
      } catch {
        // 백오프 중 취소
        this.breaker.release(permit);
        throw new RequestCancelledError();
      }
    }
  }

  private settleFailure(permit: CircuitPermit, err: QuoteApiError): void {
    if (err instanceof RequestCancelledError) this.breaker.release(permit);
    else if (countsAgainstCircuit(err)) this.breaker.onFailure();
    // 4xx: 업스트림은 응답했으므로 정상 응답으로 취급
    else this.breaker.onSuccess();
  }

  private async attempt(signal?: AbortSignal): Promise<AttemptOutcome<UpstreamRatesResponse>> {
    const url = `${this.cfg.upstream.baseUrl}${this.cfg.upstream.ratesPath}`;
    const started = this.clock.now();
    let res: AxiosResponse<unknown>;

    try {
      res = await firstValueFrom(
        this.http.get<unknown>(url, {
          timeout: this.cfg.upstream.timeoutMs,
          signal,
          headers: { Accept: 'application/json' },
          // 상태 코드 분류는 직접 한다
          validateStatus: () => true,
        }),
      );
    } catch (e) {
      if (axios.isCancel(e)) return { kind: 'fatal', error: new RequestCancelledError() };
      this.stats.record(false, this.clock.now() - started);
      if (axios.isAxiosError(e)) {
        const timedOut = e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT';
        return { kind: 'retryable', error: new QuoteServerError(timedOut ? 'UPSTREAM_TIMEOUT' : `UPSTREAM_NETWORK: ${e.message}`) };
      }
      return { kind: 'fatal', error: new QuoteServerError(`UPSTREAM_UNEXPECTED: ${String(e)}`) };
    }

    const latency = this.clock.now() - started;
    const outcome = this.classify(res);
    this.stats.record(outcome.kind === 'success', latency);
    return outcome;
  }

  private classify(res: AxiosResponse<unknown>): AttemptOutcome<UpstreamRatesResponse> {
    const { status } = res;
    if (status === 429) {
      const retryAfter = parseRetryAfter(res.headers['retry-after'], this.clock.now());
      return { kind: 'retryable', error: new QuoteRateLimitError('UPSTREAM_RATE_LIMITED', retryAfter) };
    }
    if (status === 401 || status === 403) {
      return { kind: 'fatal', error: new QuoteAuthError(`UPSTREAM_AUTH: ${status}`, status, snippet(res.data)) };
    }
    if (status >= 400 && status < 500) {
      return { kind: 'fatal', error: new QuoteClientError(`UPSTREAM_CLIENT_ERROR: ${status}`, status, snippet(res.data)) };
    }
    if (status >= 500 || status < 200 || status >= 300) {
      return { kind: 'retryable', error: new QuoteServerError(`UPSTREAM_SERVER_ERROR: ${status}`, status, snippet(res.data)) };
    }

    const data = typeof res.data === 'string' ? safeJson(res.data) : res.data;
    const parsed = UpstreamRatesResponseSchema.safeParse(data);
    if (!parsed.success) {
      return { kind: 'retryable', error: new QuoteServerError('UPSTREAM_MALFORMED_BODY', status, snippet(res.data)) };
    }
    // code/isWorking 조합이 틀리면 HTTP 상태와 무관하게 서버 오류
    if (parsed.data.code !== 0 || parsed.data.isWorking !== 1) {
      return {
        kind: 'retryable',
        error: new QuoteServerError(`UPSTREAM_NOT_WORKING: code=${parsed.data.code} isWorking=${parsed.data.isWorking}`, status, parsed.data.message),
      };
    }
    return { kind: 'success', value: parsed.data };
  }

  private toRawQuote(row: unknown): RowResult {
    const parsed = UpstreamRateRowSchema.safeParse(row);
    if (!parsed.success) return { ok: false, reason: 'schema' };
    const r = parsed.data;
    try {
      const quote: RawQuote = {
        symbol: parseSymbol(r.symbol),
        askPrice: toMoney(r.askPrice).toFixed(),
        bidPrice: toMoney(r.bidPrice).toFixed(),
        lastPrice: toMoney(r.close).toFixed(),
        timestamp: this.clock.now(),
      };
      return { ok: true, quote: assertSpread(quote) };
    } catch (e) {
      if (e instanceof InvalidSymbolError || e instanceof QuoteValidationError) {
        return { ok: false, symbol: r.symbol, reason: e.message };
      }
      throw e;
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function snippet(data: unknown): string | undefined {
  if (data === undefined || data === null) return undefined;
  const s = typeof data === 'string' ? data : JSON.stringify(data);
  return s.slice(0, 500);
}
