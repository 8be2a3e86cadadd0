import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { InstrumentUniverse } from './instruments';
import { TradingCalendar } from './utils/calendar.utils';

/**
 * Shared, stateless building blocks: the instrument universe and the trading calendar.
 */
@Global()
@Module({
  providers: [
    {
      provide: InstrumentUniverse,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new InstrumentUniverse(
          config.get('instruments', { infer: true }),
          config.get('source', { infer: true }).symbolSuffix,
        ),
    },
    {
      provide: TradingCalendar,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new TradingCalendar(config.get('tradingHolidays', { infer: true })),
    },
  ],
  exports: [InstrumentUniverse, TradingCalendar],
})
export class CommonModule {}
