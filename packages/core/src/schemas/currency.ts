import type { Result } from 'neverthrow';
import { z } from 'zod';

import type { DecodeFailure } from '../errors/index.js';
import { fromZod } from '../utils/zod-utils.js';
import { CurrencyCodeSchema } from '../value-objects/currency-code.js';
import { CurrencyUnit } from '../value-objects/currency-unit.js';
import { Measurement, type CurrencyAmount } from '../value-objects/measurement.js';

// Currency unit schema - a code resolves to the catalog constant, an instance passes through as is
export const CurrencyUnitSchema = CurrencyCodeSchema.transform((code) => CurrencyUnit.forCode(code)).or(
  z.instanceof(CurrencyUnit)
);

// Finite amount, no NaN or Infinity
export const AmountValueSchema = z.number().finite();

// Persisted amount - `{ value, currency }` where currency is a code string
export const CurrencyAmountSchema = z
  .object({
    value: AmountValueSchema,
    currency: CurrencyUnitSchema,
  })
  .transform(({ value, currency }): CurrencyAmount => new Measurement(value, currency));

export type CurrencyAmountInput = z.input<typeof CurrencyAmountSchema>;

export function parseCurrencyUnit(input: unknown): Result<CurrencyUnit, DecodeFailure> {
  return fromZod(CurrencyUnitSchema, input, 'currency');
}

export function parseCurrencyAmount(input: unknown): Result<CurrencyAmount, DecodeFailure> {
  return fromZod(CurrencyAmountSchema, input, 'currency amount');
}

/**
 * Plain JSON form accepted by `parseCurrencyAmount`
 */
export function toCurrencyAmountInput(amount: CurrencyAmount): { currency: string; value: number } {
  return { currency: amount.unit.code, value: amount.value };
}
