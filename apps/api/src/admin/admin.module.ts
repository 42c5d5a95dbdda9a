import { Module } from '@nestjs/common';
import { RatesModule } from '../rates/rates.module';
import { AdminGuard } from '../common/guards/admin.guard';
import { AdminController } from './admin.controller';

@Module({
  imports: [RatesModule],
  providers: [AdminGuard],
  controllers: [AdminController],
})
export class AdminModule {}
