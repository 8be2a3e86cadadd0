import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { AppConfig } from '../config/configuration';
import { SqliteBarStore } from './bar-store';
import { SeriesCacheService } from './series-cache.service';

@Module({
  providers: [
    {
      provide: SqliteBarStore,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => {
        const file = config.get('storage', { infer: true }).databaseFile;
        if (file !== ':memory:') mkdirSync(dirname(file), { recursive: true });
        return new SqliteBarStore(file);
      },
    },
    SeriesCacheService,
  ],
  exports: [SeriesCacheService],
})
export class SeriesModule {}
