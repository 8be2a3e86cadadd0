import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { FsArtifactStore } from './artifact-store';
import { ModelRegistryService } from './model-registry.service';
import { RegistryController } from './registry.controller';

@Module({
  controllers: [RegistryController],
  providers: [
    {
      provide: FsArtifactStore,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new FsArtifactStore(config.get('storage', { infer: true }).modelsDir),
    },
    ModelRegistryService,
  ],
  exports: [ModelRegistryService],
})
export class RegistryModule {}
