import { Controller, Get, Param } from '@nestjs/common';
import { InstrumentUniverse } from '../common/instruments';
import { InstrumentParamDto } from '../common/dto/instrument-param.dto';
import { VersionParamDto } from './dto/version-param.dto';
import { ModelVersion } from './model-version.model';
import { ModelRegistryService } from './model-registry.service';

@Controller('models')
export class RegistryController {
  constructor(
    private readonly registry: ModelRegistryService,
    private readonly universe: InstrumentUniverse,
  ) {}

  /**
   * GET /api/v1/models/:instrument
   * Every version, failed and in-training ones included, oldest first
   */
  @Get(':instrument')
  async list(@Param() p: InstrumentParamDto): Promise<ModelVersion[]> {
    return this.registry.list(this.universe.assert(p.instrument));
  }

  @Get(':instrument/:version')
  async inspect(@Param() p: VersionParamDto): Promise<ModelVersion> {
    return this.registry.inspect(this.universe.assert(p.instrument), p.version);
  }
}
