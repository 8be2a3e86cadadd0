import { Type } from 'class-transformer';
import { IsInt, IsOptional, Matches, Max, Min } from 'class-validator';

const SELECTOR = /^(latest|v[1-9]\d*)$/;

export class PredictionQueryDto {
  @IsOptional()
  @Matches(SELECTOR, { message: 'version must be "latest" or look like v1, v2, ...' })
  version?: string;
}

export class HistoryQueryDto extends PredictionQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(60)
  days?: number;
}
