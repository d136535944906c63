import type { UnitConverterLinear } from '../value-objects/unit-converter-linear.js';

/**
 * A unit that converts to the base unit of its family through a linear converter.
 * `Measurement` drives conversions using only this capability.
 */
export interface LinearUnit<TUnit extends LinearUnit<TUnit>> {
  readonly symbol: string;
  readonly converter: UnitConverterLinear;
  /** How many base units one of this unit equals */
  readonly coefficient: number;
  baseUnit(): TUnit;
  equals(other: TUnit): boolean;
  toJSON(): unknown;
}
