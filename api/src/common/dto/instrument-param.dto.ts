import { Transform } from 'class-transformer';
import { IsString, Matches } from 'class-validator';

/** Upper-cases string inputs (instrument codes arrive in any case). */
export function toUpper({ value }: { value: unknown }): unknown {
  return typeof value === 'string' ? value.toUpperCase() : value;
}

/**
 * `:instrument` route param. Membership in the universe is checked by the
 * services, so an unknown but well-formed code is a 404, not a 400.
 */
export class InstrumentParamDto {
  @IsString()
  @Transform(toUpper)
  @Matches(/^[A-Z0-9]{1,12}$/, { message: 'instrument must be 1-12 letters or digits' })
  instrument!: string;
}
