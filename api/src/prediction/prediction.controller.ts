import { Controller, Get, Param, Query } from '@nestjs/common';
import { InstrumentParamDto } from '../common/dto/instrument-param.dto';
import { PredictionResult } from '../common/models/prediction.model';
import { HistoryQueryDto, PredictionQueryDto } from './dto/prediction-query.dto';
import { DEFAULT_HISTORY_DAYS, PredictionService } from './prediction.service';

@Controller()
export class PredictionController {
  constructor(private readonly predictions: PredictionService) {}

  /**
   * GET /api/v1/prediction/:instrument?version=latest|v{n}
   */
  @Get('prediction/:instrument')
  async latest(
    @Param() p: InstrumentParamDto,
    @Query() q: PredictionQueryDto,
  ): Promise<PredictionResult> {
    return this.predictions.predictLatest(p.instrument, q.version);
  }

  /**
   * GET /api/v1/history/:instrument?version=&days=
   * Most recent day first
   */
  @Get('history/:instrument')
  async history(
    @Param() p: InstrumentParamDto,
    @Query() q: HistoryQueryDto,
  ): Promise<PredictionResult[]> {
    const results = await this.predictions.predictHistorical(
      p.instrument,
      q.version,
      q.days ?? DEFAULT_HISTORY_DAYS,
    );
    const out: PredictionResult[] = [];
    for await (const r of results) out.push(r);
    return out;
  }
}
