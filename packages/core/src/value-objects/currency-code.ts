import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { z } from 'zod';

import { DecodeFailure } from '../errors/index.js';

/**
 * Supported currency codes (ISO 4217 style). RUR is kept as the ruble code in
 * persisted data, not the newer RUB.
 */
export const CURRENCY_CODES = ['USD', 'EUR', 'GBP', 'RUR', 'JPY', 'AUD', 'CAD', 'AMD'] as const;

export const CurrencyCodeSchema = z.enum(CURRENCY_CODES);

export type CurrencyCode = z.infer<typeof CurrencyCodeSchema>;

/** Exact, case-sensitive match against the supported codes */
export function isCurrencyCode(value: unknown): value is CurrencyCode {
  return CurrencyCodeSchema.safeParse(value).success;
}

/**
 * Parse a persisted code string. `key` names the field it was read from and is
 * reported in the failure.
 */
export function parseCurrencyCode(value: string, key = 'code'): Result<CurrencyCode, DecodeFailure> {
  return isCurrencyCode(value) ? ok(value) : err(DecodeFailure.unknownCode(key, value));
}
