import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import configuration from './config/configuration';
import { AppController } from './app.controller';
import { CommonModule } from './common/common.module';
import { DomainExceptionFilter } from './common/filters/domain-exception.filter';
import { MarketModule } from './market/market.module';
import { MetricsModule } from './metrics/metrics.module';
import { PredictionModule } from './prediction/prediction.module';
import { RegistryModule } from './registry/registry.module';
import { RetrainModule } from './retrain/retrain.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      expandVariables: true,
    }),
    CommonModule,
    MetricsModule,
    MarketModule,
    RegistryModule,
    PredictionModule,
    RetrainModule,
  ],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: DomainExceptionFilter }],
})
export class AppModule {}
