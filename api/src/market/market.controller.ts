import { BadRequestException, Controller, Get, Param, Query } from '@nestjs/common';
import { InstrumentParamDto } from '../common/dto/instrument-param.dto';
import { Series } from '../common/models/bar.model';
import { isIsoDate } from '../common/utils/time.utils';
import { BarsQueryDto } from './dto/bars-query.dto';
import { MarketService, Quote } from './market.service';

/**
 * Market Controller
 * Read access to the cached daily bars
 */
@Controller('market')
export class MarketController {
  constructor(private readonly market: MarketService) {}

  /**
   * GET /api/v1/market/quote/:instrument
   * Newest daily bar as a quote
   */
  @Get('quote/:instrument')
  async getQuote(@Param() p: InstrumentParamDto): Promise<Quote> {
    return this.market.getQuote(p.instrument);
  }

  /**
   * GET /api/v1/market/bars/:instrument?from=&to=
   */
  @Get('bars/:instrument')
  async getBars(@Param() p: InstrumentParamDto, @Query() q: BarsQueryDto): Promise<Series> {
    for (const d of [q.from, q.to]) {
      if (d !== undefined && !isIsoDate(d)) throw new BadRequestException(`Invalid date: ${d}`);
    }
    if (q.from && q.to && q.to <= q.from) {
      throw new BadRequestException('to must be after from');
    }
    return this.market.getBars(p.instrument, q.from, q.to);
  }
}
