// 시세 도메인을 하나의 모듈로 묶음
import { Module } from '@nestjs/common';
import { QuotesModule } from '../quotes/quotes.module';
import { MarkupModule } from '../markup/markup.module';
import { RatesController } from './rates.controller';
import { RatesService } from './rates.service';
import { RatesWarmer } from './rates.warmer';

@Module({
  imports: [QuotesModule, MarkupModule],
  controllers: [RatesController],
  providers: [RatesService, RatesWarmer],
  exports: [RatesService, QuotesModule, MarkupModule],
})
export class RatesModule {}
