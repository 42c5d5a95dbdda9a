// /v1/rates 엔드포인트. 쿼리 검증 후 RatesService 호출
import { BadRequestException, Controller, Get, Header, Inject, Query, Res, UseFilters } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import type { Response } from 'express';
import { ratesConfig } from '../config/rates.config';
import { CurrencySymbol, formatSymbol } from '../common/symbol';
import { RatesService } from './rates.service';
import { RateLookupFilter } from './rate-lookup.filter';
import { GetPriceDto } from './dto/get-price.dto';
import { ConvertDto } from './dto/convert.dto';

/**
 * 응답이 끝나기 전에 연결이 닫히면 업스트림 호출을 취소한다.
 */
async function abortOnClose<T>(res: Response, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const ctrl = new AbortController();
  const onClose = () => {
    if (!res.writableFinished) ctrl.abort();
  };
  res.once('close', onClose);
  try {
    return await run(ctrl.signal);
  } finally {
    res.off('close', onClose);
  }
}

@Controller('rates')
@UseFilters(RateLookupFilter)
export class RatesController {
  constructor(
    private readonly rates: RatesService,
    @Inject(ratesConfig.KEY) private readonly cfg: ConfigType<typeof ratesConfig>,
  ) {}

  @Get()
  @Header('Cache-Control', 'no-store')
  async get(@Query() q: GetPriceDto, @Res({ passthrough: true }) res: Response) {
    const symbol = this.allowed(q);
    const p = await abortOnClose(res, signal => this.rates.getEffectivePrice(symbol, q.direction, signal));
    return {
      symbol: formatSymbol(p.symbol),
      direction: p.direction,
      marketRate: p.marketRate,
      finalRate: p.finalRate,
      markupPercent: p.markupPercent,
      markupSource: p.markupSource,
      markupAmount: p.markupAmount,
      inverted: p.inverted,
      quotedAt: new Date(p.quotedAt).toISOString(),
      computedAt: new Date(p.computedAt).toISOString(),
      disclaimer: 'Indicative only. Not an offer or execution rate.',
    };
  }

  @Get('convert')
  @Header('Cache-Control', 'no-store')
  async convert(@Query() q: ConvertDto, @Res({ passthrough: true }) res: Response) {
    const symbol = this.allowed(q);
    const c = await abortOnClose(res, signal => this.rates.convert(symbol, q.direction, q.amount, signal));
    return {
      symbol: formatSymbol(c.symbol),
      direction: c.direction,
      amount: c.amount,
      finalRate: c.finalRate,
      convertedAmount: c.convertedAmount,
      markupEarned: c.markupEarned,
      computedAt: new Date(c.computedAt).toISOString(),
    };
  }

  @Get('symbols')
  @Header('Cache-Control', 'public, max-age=30, stale-while-revalidate=60')
  async symbols(@Res({ passthrough: true }) res: Response) {
    const all = await abortOnClose(res, signal => this.rates.getSupportedSymbols(signal));
    const allow = this.cfg.allowedPairs;
    return { symbols: allow.length ? all.filter(s => allow.includes(s)) : all };
  }

  // 허용 목록이 비어 있으면 전부 허용
  private allowed(q: GetPriceDto): CurrencySymbol {
    const symbol = this.rates.symbolOf(q.base, q.quote);
    const pair = formatSymbol(symbol);
    const allow = this.cfg.allowedPairs;
    if (allow.length && !allow.includes(pair)) {
      throw new BadRequestException({ error: 'RATE_PAIR_NOT_ALLOWED', pair });
    }
    return symbol;
  }
}
