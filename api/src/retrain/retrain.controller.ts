import { Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { RetrainQueryDto } from './dto/retrain-query.dto';
import {
  RetrainCoordinatorService,
  RetrainStatus,
  TriggerResult,
} from './retrain-coordinator.service';

export interface RetrainResponse {
  status: 'accepted' | 'rejected';
  reason?: string;
  instruments: Record<string, TriggerResult['status']>;
}

@Controller('retrain')
export class RetrainController {
  constructor(private readonly coordinator: RetrainCoordinatorService) {}

  /**
   * POST /api/v1/retrain?epochs=&batch=&instrument=
   * Answers immediately; training continues in the background.
   * Accepted when at least one instrument started.
   */
  @Post()
  @HttpCode(200)
  trigger(@Query() q: RetrainQueryDto): RetrainResponse {
    const params = { epochs: q.epochs, batchSize: q.batch };
    const results = q.instrument
      ? { [q.instrument]: this.coordinator.triggerRetrain(q.instrument, params) }
      : this.coordinator.triggerRetrainAll(params);

    const instruments: Record<string, TriggerResult['status']> = {};
    let reason: string | undefined;
    for (const [id, r] of Object.entries(results)) {
      instruments[id] = r.status;
      if (r.status === 'rejected') reason = r.reason;
    }

    const accepted = Object.values(instruments).includes('accepted');
    return accepted ? { status: 'accepted', instruments } : { status: 'rejected', reason, instruments };
  }

  @Get('status')
  status(): RetrainStatus[] {
    return this.coordinator.status();
  }
}
