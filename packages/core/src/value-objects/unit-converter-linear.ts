/**
 * Linear conversion between a unit and the base unit of its family:
 *
 *   baseValue = value * coefficient + constant
 *
 * Currencies only use the coefficient; the constant stays 0.
 */
export class UnitConverterLinear {
  readonly coefficient: number;
  readonly constant: number;

  constructor(coefficient: number, constant = 0) {
    this.coefficient = coefficient;
    this.constant = constant;
    Object.freeze(this);
  }

  /**
   * Value in the base unit for a value expressed in this converter's unit
   */
  baseUnitValue(fromValue: number): number {
    return fromValue * this.coefficient + this.constant;
  }

  /**
   * Value in this converter's unit for a value expressed in the base unit.
   * A zero coefficient yields Infinity or NaN, following IEEE division.
   */
  value(fromBaseUnitValue: number): number {
    return (fromBaseUnitValue - this.constant) / this.coefficient;
  }

  equals(other: UnitConverterLinear): boolean {
    return this.coefficient === other.coefficient && this.constant === other.constant;
  }
}
