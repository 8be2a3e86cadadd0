import { Module } from '@nestjs/common';
import { SeriesModule } from '../series/series.module';
import { SourceModule } from '../source/source.module';
import { MarketController } from './market.controller';
import { MarketService } from './market.service';

@Module({
  imports: [SeriesModule, SourceModule],
  controllers: [MarketController],
  providers: [MarketService],
  exports: [MarketService, SeriesModule],
})
export class MarketModule {}
