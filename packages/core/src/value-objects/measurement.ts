import type { LinearUnit } from '../types/linear-unit.js';

import { CurrencyUnit } from './currency-unit.js';

/**
 * A numeric value paired with a linear unit.
 *
 * Conversions pivot through the unit family's base unit:
 * `target = target.converter.value(source.converter.baseUnitValue(value))`.
 * Converting to an equal unit keeps the value untouched.
 */
export class Measurement<TUnit extends LinearUnit<TUnit>> {
  private _value: number;
  private _unit: TUnit;

  constructor(value: number, unit: TUnit) {
    this._value = value;
    this._unit = unit;
  }

  get value(): number {
    return this._value;
  }

  get unit(): TUnit {
    return this._unit;
  }

  /**
   * Convert in place
   */
  convert(to: TUnit): void {
    this._value = this.valueIn(to);
    this._unit = to;
  }

  /**
   * Converted copy; the receiver is left as it is
   */
  converted(to: TUnit): Measurement<TUnit> {
    return new Measurement(this.valueIn(to), to);
  }

  /**
   * Value expressed in the family's base unit
   */
  baseUnitValue(): number {
    return this._unit.converter.baseUnitValue(this._value);
  }

  /**
   * Same unit: values must match exactly. Different units: base-unit values
   * must match exactly, so rounding from conversion can make them differ.
   */
  equals(other: Measurement<TUnit>): boolean {
    if (this._unit.equals(other._unit)) {
      return this._value === other._value;
    }
    return this.baseUnitValue() === other.baseUnitValue();
  }

  toString(): string {
    return `${String(this._value)} ${this._unit.symbol}`;
  }

  toJSON(): { unit: unknown; value: number } {
    return { unit: this._unit.toJSON(), value: this._value };
  }

  private valueIn(to: TUnit): number {
    if (this._unit.equals(to)) {
      return this._value;
    }
    return to.converter.value(this.baseUnitValue());
  }
}

export type CurrencyAmount = Measurement<CurrencyUnit>;

export function currencyAmount(value: number, unit: CurrencyUnit = CurrencyUnit.baseUnit()): CurrencyAmount {
  return new Measurement(value, unit);
}
