// 시세 조회 파이프라인. 캐시 → 업스트림 → 역방향 쌍 순서로 시세를 찾고 마크업을 붙인다.
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { ratesConfig } from '../config/rates.config';
import { CurrencySymbol, formatSymbol, InvalidSymbolError, makeSymbol, mirrorSymbol } from '../common/symbol';
import { RateCacheService } from '../cache/rate-cache.service';
import { metaKey, rateKey } from '../cache/cache.keys';
import { QuoteClient } from '../quotes/quote.client';
import {
  CircuitOpenError,
  QuoteApiError,
  QuoteValidationError,
  RequestCancelledError,
  SymbolNotFoundError,
} from '../quotes/quote.errors';
import { Direction, isRawQuote, RawQuote } from '../quotes/types';
import { MarkupService } from '../markup/markup.service';
import { Conversion, invertQuote, PricedQuote } from '../markup/markup.util';
import { RateLookupError } from './rates.errors';

const SYMBOLS_KEY = metaKey('symbols');

const isStringList = (v: unknown): v is string[] => Array.isArray(v) && v.every(x => typeof x === 'string');

@Injectable()
export class RatesService {
  private readonly log = new Logger(RatesService.name);

  constructor(
    private readonly client: QuoteClient,
    private readonly cache: RateCacheService,
    private readonly markup: MarkupService,
    @Inject(ratesConfig.KEY) private readonly cfg: ConfigType<typeof ratesConfig>,
  ) {}

  /** 통화쌍 검증. 실패하면 INVALID */
  symbolOf(base: string, quote: string): CurrencySymbol {
    try {
      return makeSymbol(base, quote);
    } catch (e) {
      if (e instanceof InvalidSymbolError) throw new RateLookupError('INVALID', e.message, e);
      throw e;
    }
  }

  async getEffectivePrice(symbol: CurrencySymbol, direction: Direction, signal?: AbortSignal): Promise<PricedQuote> {
    const sym = this.symbolOf(symbol.base, symbol.quote);
    if (direction !== 'buy' && direction !== 'sell') {
      throw new RateLookupError('INVALID', `direction ${String(direction)}`);
    }
    const quote = await this.resolve(sym, signal);
    try {
      return this.markup.price(quote, direction);
    } catch (e) {
      // 유효하지 않은 시세로는 가격을 만들지 않는다
      throw this.toLookupError(e, sym);
    }
  }

  async convert(symbol: CurrencySymbol, direction: Direction, amount: string, signal?: AbortSignal): Promise<Conversion> {
    const priced = await this.getEffectivePrice(symbol, direction, signal);
    try {
      return this.markup.convert(priced, amount);
    } catch (e) {
      if (e instanceof QuoteValidationError) throw new RateLookupError('INVALID', e.message, e);
      throw e;
    }
  }

  /** 업스트림이 제공하는 통화쌍 목록. meta:symbols에 캐시 */
  async getSupportedSymbols(signal?: AbortSignal): Promise<string[]> {
    const hit = await this.cache.get(SYMBOLS_KEY, isStringList);
    if (hit) return hit.payload;
    const { symbols } = await this.loadAll(signal);
    return symbols;
  }

  /** 전체 시세를 한 번에 받아 캐시를 채운다. 저장한 시세 수 반환 */
  async warm(signal?: AbortSignal): Promise<number> {
    const { count } = await this.loadAll(signal);
    this.log.log(`Warmed ${count} rates`);
    return count;
  }

  private async loadAll(signal?: AbortSignal): Promise<{ symbols: string[]; count: number }> {
    let quotes: RawQuote[];
    try {
      quotes = await this.client.fetchAll(signal);
    } catch (e) {
      throw this.toLookupError(e);
    }
    for (const q of quotes) await this.cache.set(rateKey(q.symbol), q);
    const symbols = quotes.map(q => formatSymbol(q.symbol)).sort();
    await this.cache.set(SYMBOLS_KEY, symbols, this.cfg.cache.ttlMs);
    return { symbols, count: quotes.length };
  }

  private async resolve(sym: CurrencySymbol, signal?: AbortSignal): Promise<RawQuote> {
    const cached = await this.cache.get(rateKey(sym), isRawQuote);
    if (cached) return cached.payload;

    try {
      const fresh = await this.client.fetchSymbol(sym, signal);
      await this.cache.set(rateKey(sym), fresh);
      return fresh;
    } catch (e) {
      // 업스트림에 이 방향 시세가 없을 때만 역방향을 시도한다
      if (!(e instanceof SymbolNotFoundError || e instanceof QuoteValidationError)) {
        throw this.toLookupError(e, sym);
      }
      this.log.debug(`${formatSymbol(sym)} not served (${e.message}), trying mirror`);
    }

    return this.resolveMirror(sym, signal);
  }

  private async resolveMirror(sym: CurrencySymbol, signal?: AbortSignal): Promise<RawQuote> {
    const mirror = mirrorSymbol(sym);
    let raw: RawQuote;
    let fetched = false;

    const cached = await this.cache.get(rateKey(mirror), isRawQuote);
    if (cached && cached.payload.inverted !== true) {
      raw = cached.payload;
    } else {
      try {
        raw = await this.client.fetchSymbol(mirror, signal);
        fetched = true;
      } catch (e) {
        throw this.toLookupError(e, sym);
      }
    }

    let inverted: RawQuote;
    try {
      inverted = invertQuote(raw);
    } catch (e) {
      throw this.toLookupError(e, sym);
    }

    // 뒤집기까지 끝난 뒤에만 캐시에 쓴다
    if (fetched) await this.cache.set(rateKey(mirror), raw);
    await this.cache.set(rateKey(sym), inverted);
    return inverted;
  }

  private toLookupError(e: unknown, sym?: CurrencySymbol): Error {
    if (e instanceof RequestCancelledError || e instanceof RateLookupError) return e;
    const what = sym ? formatSymbol(sym) : 'all rates';
    if (e instanceof CircuitOpenError) {
      return new RateLookupError('DEGRADED', `${what}: upstream circuit open`, e);
    }
    if (e instanceof QuoteApiError) {
      this.log.warn(`Rate lookup failed for ${what}: ${e.message}`);
      return new RateLookupError('UNAVAILABLE', `${what}: ${e.message}`, e);
    }
    return e instanceof Error ? e : new Error(String(e));
  }
}
