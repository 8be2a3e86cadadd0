import { Transform, Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';
import { toUpper } from '../../common/dto/instrument-param.dto';

/**
 * POST /retrain query. Omitted hyperparameters fall back to the configured defaults.
 */
export class RetrainQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10_000)
  epochs?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(4096)
  batch?: number;

  /** Single instrument; every instrument when absent. */
  @IsOptional()
  @IsString()
  @Transform(toUpper)
  @Matches(/^[A-Z0-9]{1,12}$/, { message: 'instrument must be 1-12 letters or digits' })
  instrument?: string;
}
