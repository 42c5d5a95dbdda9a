// 운영자용 API. 지표 조회, 브레이커/캐시 리셋, 마크업 변경
import { BadRequestException, Body, Controller, Delete, Get, HttpCode, Param, Post, Put, UseGuards } from '@nestjs/common';
import { AdminGuard } from '../common/guards/admin.guard';
import { InvalidSymbolError, parseSymbol } from '../common/symbol';
import { RateCacheService } from '../cache/rate-cache.service';
import { CacheCategory } from '../cache/cache.keys';
import { QuoteClient } from '../quotes/quote.client';
import { MarkupService } from '../markup/markup.service';
import { UpdateMarkupDto } from './dto/update-markup.dto';

const CATEGORIES: readonly CacheCategory[] = ['rates', 'meta'];
const isCategory = (v: string): v is CacheCategory => CATEGORIES.some(c => c === v);

@Controller('admin')
@UseGuards(AdminGuard)
export class AdminController {
  constructor(
    private readonly client: QuoteClient,
    private readonly cache: RateCacheService,
    private readonly markup: MarkupService,
  ) {}

  @Get('stats')
  stats() {
    return {
      upstream: this.client.metrics(),
      circuit: this.client.circuit(),
      cache: this.cache.stats(),
      markup: this.markup.current(),
    };
  }

  @Post('circuit/reset')
  @HttpCode(200)
  resetCircuit() {
    this.client.resetCircuit();
    return { ok: true, circuit: this.client.circuit() };
  }

  @Post('metrics/reset')
  @HttpCode(200)
  resetMetrics() {
    this.client.resetMetrics();
    this.cache.resetStats();
    return { ok: true };
  }

  /** category: rates | meta | all */
  @Delete('cache/:category')
  async clearCache(@Param('category') category: string) {
    if (category === 'all') {
      await this.cache.clearAll();
      return { ok: true, category };
    }
    if (!isCategory(category)) {
      throw new BadRequestException({ error: 'CACHE_CATEGORY_UNKNOWN', category });
    }
    const removed = await this.cache.invalidateCategory(category);
    return { ok: true, category, removed };
  }

  @Put('markup')
  async updateMarkup(@Body() body: UpdateMarkupDto) {
    if (body.pair === undefined) {
      if (body.percent === null) throw new BadRequestException({ error: 'MARKUP_DEFAULT_REQUIRED' });
      return this.markup.setDefault(body.percent);
    }
    try {
      return await this.markup.setPairMarkup(parseSymbol(body.pair), body.percent);
    } catch (e) {
      if (e instanceof InvalidSymbolError) throw new BadRequestException({ error: 'MARKUP_PAIR_INVALID', pair: body.pair });
      throw e;
    }
  }
}
