import { Module } from '@nestjs/common';
import { LinearPredictor } from './linear-predictor';
import { PREDICTOR } from './predictor.interface';

@Module({
  providers: [{ provide: PREDICTOR, useClass: LinearPredictor }],
  exports: [PREDICTOR],
})
export class PredictorModule {}
