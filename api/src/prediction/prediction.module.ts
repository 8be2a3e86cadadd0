import { CacheModule } from '@nestjs/cache-manager';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { MarketModule } from '../market/market.module';
import { PredictorModule } from '../predictor/predictor.module';
import { RegistryModule } from '../registry/registry.module';
import { PredictionController } from './prediction.controller';
import { PredictionService } from './prediction.service';

@Module({
  imports: [
    // LRU of loaded models: count-capped, no expiry, stored by reference
    CacheModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => ({
        max: config.get('cache', { infer: true }).modelCacheMax,
        ttl: 0,
        shouldCloneBeforeSet: false,
      }),
    }),
    MarketModule,
    PredictorModule,
    RegistryModule,
  ],
  controllers: [PredictionController],
  providers: [PredictionService],
  exports: [PredictionService],
})
export class PredictionModule {}
