// api/src/common/instruments.ts

import { InstrumentUnsupportedError } from './errors/domain.errors';

/**
 * The enumerated set of instruments the service predicts.
 */
export class InstrumentUniverse {
  private readonly codes: readonly string[];

  constructor(codes: readonly string[], private readonly symbolSuffix = '') {
    this.codes = [...new Set(codes.map((c) => c.toUpperCase()))];
  }

  list(): readonly string[] {
    return this.codes;
  }

  has(instrumentId: string): boolean {
    return this.codes.includes(instrumentId.toUpperCase());
  }

  /**
   * Normalizes the code and throws InstrumentUnsupported outside the universe.
   */
  assert(instrumentId: string): string {
    const code = instrumentId.toUpperCase();
    if (!this.codes.includes(code)) throw new InstrumentUnsupportedError(code);
    return code;
  }

  /** Symbol the data provider lists the instrument under (PETR4 -> PETR4.SA). */
  providerSymbol(instrumentId: string): string {
    const code = instrumentId.toUpperCase();
    if (!this.symbolSuffix || code.endsWith(this.symbolSuffix)) return code;
    return `${code}${this.symbolSuffix}`;
  }
}
