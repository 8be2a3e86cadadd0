import { IsString, Matches } from 'class-validator';
import { InstrumentParamDto } from '../../common/dto/instrument-param.dto';

export class VersionParamDto extends InstrumentParamDto {
  @IsString()
  @Matches(/^v[1-9]\d*$/, { message: 'version must look like v1, v2, ...' })
  version!: string;
}
