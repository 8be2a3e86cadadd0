import { Module } from '@nestjs/common';
import { MarketModule } from '../market/market.module';
import { PredictorModule } from '../predictor/predictor.module';
import { RegistryModule } from '../registry/registry.module';
import { RetrainController } from './retrain.controller';
import { RetrainCoordinatorService } from './retrain-coordinator.service';

@Module({
  imports: [MarketModule, PredictorModule, RegistryModule],
  controllers: [RetrainController],
  providers: [RetrainCoordinatorService],
  exports: [RetrainCoordinatorService],
})
export class RetrainModule {}
