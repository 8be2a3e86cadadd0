import { IsOptional, Matches } from 'class-validator';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Half-open date range for cached bars; both ends optional.
 */
export class BarsQueryDto {
  @IsOptional()
  @Matches(ISO_DATE, { message: 'from must be a YYYY-MM-DD date' })
  from?: string;

  @IsOptional()
  @Matches(ISO_DATE, { message: 'to must be a YYYY-MM-DD date' })
  to?: string;
}
