import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { SourceFetcherService } from './source-fetcher.service';

@Module({
  imports: [
    HttpModule.register({
      headers: { 'User-Agent': 'Mozilla/5.0 (compatible; quote-forecast-api)' },
    }),
  ],
  providers: [SourceFetcherService],
  exports: [SourceFetcherService],
})
export class SourceModule {}
