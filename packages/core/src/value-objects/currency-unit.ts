import { getLogger } from '@currency-units/logger';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

import type { KeyedDecoder, KeyedEncodable, KeyedEncoder } from '../coding/keyed-coder.js';
import { DecodeFailure } from '../errors/index.js';
import type { LinearUnit } from '../types/linear-unit.js';

import { CURRENCY_CODES, parseCurrencyCode, type CurrencyCode } from './currency-code.js';
import { UnitConverterLinear } from './unit-converter-linear.js';

/** Key the currency code is stored under when a unit is encoded */
export const CURRENCY_CODING_KEY = 'code';

const logger = getLogger('CurrencyCodec');

/**
 * Currency as a unit of measure.
 *
 * Each currency converts to the base currency (USD) through a linear
 * coefficient: one unit of the currency equals `coefficient` US dollars.
 * Use the catalog constants (`CurrencyUnit.EUR`, ...) unless a different rate is
 * really needed.
 *
 * Equality compares `code` and `symbol` only. Two units with the same code and
 * symbol but different coefficients are equal, yet convert differently; which
 * one a conversion uses is undefined. This is not guarded.
 */
export class CurrencyUnit implements LinearUnit<CurrencyUnit>, KeyedEncodable {
  static readonly USD = new CurrencyUnit('$', 'USD', 1.0);
  static readonly EUR = new CurrencyUnit('€', 'EUR', 1.123349);
  static readonly GBP = new CurrencyUnit('£', 'GBP', 1.25025);
  static readonly RUR = new CurrencyUnit('₽', 'RUR', 0.01587);
  static readonly JPY = new CurrencyUnit('¥', 'JPY', 0.009283);
  static readonly AUD = new CurrencyUnit('A$', 'AUD', 0.7042);
  static readonly CAD = new CurrencyUnit('C$', 'CAD', 0.764905);
  static readonly AMD = new CurrencyUnit('֏', 'AMD', 0.00209872);

  private static readonly catalog: Readonly<Record<CurrencyCode, CurrencyUnit>> = Object.freeze({
    USD: CurrencyUnit.USD,
    EUR: CurrencyUnit.EUR,
    GBP: CurrencyUnit.GBP,
    RUR: CurrencyUnit.RUR,
    JPY: CurrencyUnit.JPY,
    AUD: CurrencyUnit.AUD,
    CAD: CurrencyUnit.CAD,
    AMD: CurrencyUnit.AMD,
  });

  /**
   * The base currency every coefficient is expressed in
   */
  static baseUnit(): CurrencyUnit {
    return CurrencyUnit.USD;
  }

  /**
   * Catalog constant for a code
   */
  static forCode(code: CurrencyCode): CurrencyUnit {
    return CurrencyUnit.catalog[code];
  }

  /**
   * All catalog constants, in code declaration order
   */
  static all(): readonly CurrencyUnit[] {
    return CURRENCY_CODES.map((code) => CurrencyUnit.catalog[code]);
  }

  /**
   * Read a unit written by `encode()`. Resolves to the catalog constant for the
   * stored code, so symbol and coefficient come from the catalog.
   */
  static decode(decoder: KeyedDecoder): Result<CurrencyUnit, DecodeFailure> {
    const raw = decoder.decodeString(CURRENCY_CODING_KEY);
    if (raw === undefined) {
      logger.debug({ key: CURRENCY_CODING_KEY }, 'No currency code in payload');
      return err(DecodeFailure.missingField(CURRENCY_CODING_KEY));
    }

    const code = parseCurrencyCode(raw, CURRENCY_CODING_KEY);
    if (code.isErr()) {
      logger.debug({ key: CURRENCY_CODING_KEY, received: raw }, 'Unrecognized currency code');
      return err(code.error);
    }

    return ok(CurrencyUnit.forCode(code.value));
  }

  readonly symbol: string;
  readonly code: CurrencyCode;
  readonly converter: UnitConverterLinear;

  /**
   * No validation: an empty symbol or a non-positive coefficient is accepted and
   * produces meaningless conversions.
   *
   * @param coefficient - US dollars per one unit of this currency
   */
  constructor(symbol: string, code: CurrencyCode, coefficient: number) {
    this.symbol = symbol;
    this.code = code;
    this.converter = new UnitConverterLinear(coefficient);
    Object.freeze(this);
  }

  get coefficient(): number {
    return this.converter.coefficient;
  }

  baseUnit(): CurrencyUnit {
    return CurrencyUnit.baseUnit();
  }

  /**
   * Same code and symbol. The coefficient is not compared.
   */
  equals(other: CurrencyUnit): boolean {
    return this.code === other.code && this.symbol === other.symbol;
  }

  /**
   * Whether this is the catalog constant itself rather than an equal copy
   */
  isCanonical(): boolean {
    return CurrencyUnit.catalog[this.code] === this;
  }

  /**
   * Writes the code only; symbol and coefficient are restored from the catalog
   * on decode.
   */
  encode(encoder: KeyedEncoder): void {
    encoder.encodeString(this.code, CURRENCY_CODING_KEY);
  }

  toString(): string {
    return this.symbol;
  }

  toJSON(): CurrencyCode {
    return this.code;
  }
}
