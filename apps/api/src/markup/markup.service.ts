// 운영 중 바뀌는 마크업 설정을 들고 있는 서비스
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { MarkupConfig, ratesConfig } from '../config/rates.config';
import { CLOCK, Clock } from '../common/clock';
import { CurrencySymbol, formatSymbol } from '../common/symbol';
import { RateCacheService } from '../cache/rate-cache.service';
import { QuoteValidationError } from '../quotes/quote.errors';
import type { Direction, RawQuote } from '../quotes/types';
import { applyMarkup, Conversion, convertAmount, PricedQuote } from './markup.util';

const PERCENT = /^\d+(\.\d+)?$/;

@Injectable()
export class MarkupService {
  private readonly log = new Logger(MarkupService.name);
  private config: MarkupConfig;

  constructor(
    @Inject(ratesConfig.KEY) private readonly cfg: ConfigType<typeof ratesConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly cache: RateCacheService,
  ) {
    this.config = cfg.markup;
  }

  current(): MarkupConfig {
    return this.config;
  }

  price(quote: RawQuote, direction: Direction): PricedQuote {
    return applyMarkup(quote, direction, this.config, this.clock.now());
  }

  // 금액 한도는 요청한 방향의 쌍에만 적용
  convert(priced: PricedQuote, amount: string): Conversion {
    const limit = this.cfg.amountLimits[formatSymbol(priced.symbol)];
    return convertAmount(priced, amount, this.clock.now(), limit);
  }

  /** percent가 null이면 해당 쌍 설정 제거 */
  async setPairMarkup(symbol: CurrencySymbol, percent: string | null): Promise<MarkupConfig> {
    const key = formatSymbol(symbol);
    const pairs = { ...this.config.pairs };
    if (percent === null) delete pairs[key];
    else pairs[key] = checkPercent(percent);
    return this.replace({ defaultPercent: this.config.defaultPercent, pairs }, `pair ${key}=${percent ?? 'default'}`);
  }

  async setDefault(percent: string): Promise<MarkupConfig> {
    return this.replace({ defaultPercent: checkPercent(percent), pairs: this.config.pairs }, `default=${percent}`);
  }

  // 설정 객체는 통째로 교체. 진행 중인 계산은 이전 객체를 그대로 본다
  private async replace(next: MarkupConfig, what: string): Promise<MarkupConfig> {
    this.config = Object.freeze({ defaultPercent: next.defaultPercent, pairs: Object.freeze({ ...next.pairs }) });
    const dropped = await this.cache.invalidateCategory('rates');
    this.log.log(`Markup changed (${what}), dropped ${dropped} cached rates`);
    return this.config;
  }
}

function checkPercent(percent: string): string {
  const p = percent.trim();
  if (!PERCENT.test(p)) throw new QuoteValidationError(`INVALID_MARKUP: ${percent}`);
  return p;
}
