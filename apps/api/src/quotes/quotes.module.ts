import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { QuoteClient } from './quote.client';

@Module({
  imports: [HttpModule],
  providers: [QuoteClient],
  exports: [QuoteClient],
})
export class QuotesModule {}
