import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from './config/configuration';

export interface Health {
  ok: true;
  env: string;
  version: 'v1';
  instruments: string[];
}

@Controller()
export class AppController {
  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  @Get('health')
  health(): Health {
    return {
      ok: true,
      env: this.config.get('nodeEnv', { infer: true }),
      version: 'v1',
      instruments: this.config.get('instruments', { infer: true }),
    };
  }
}
