import { ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import type { DecodeFailure } from '../../errors/index.js';
import { CurrencyUnit } from '../../value-objects/currency-unit.js';
import { KeyedArchive } from '../keyed-archive.js';
import type { KeyedDecoder } from '../keyed-coder.js';

describe('KeyedArchive', () => {
  it('should store and read string fields', () => {
    const archive = new KeyedArchive();

    archive.encodeString('12.5', 'amount');

    expect(archive.decodeString('amount')).toBe('12.5');
    expect(archive.decodeString('missing')).toBeUndefined();
    expect(archive.has('amount')).toBe(true);
    expect(archive.has('missing')).toBe(false);
  });

  it('should overwrite a field written twice', () => {
    const archive = new KeyedArchive();

    archive.encodeString('USD', 'code');
    archive.encodeString('EUR', 'code');

    expect(archive.keys()).toEqual(['code']);
    expect(archive.decodeString('code')).toBe('EUR');
  });

  it('should nest encoded objects under their key', () => {
    const archive = new KeyedArchive();

    archive.encodeString('12.5', 'amount');
    archive.encodeObject(CurrencyUnit.GBP, 'unit');

    expect(archive.toJSON()).toEqual({ amount: '12.5', unit: { code: 'GBP' } });
    expect(archive.serialize()).toBe('{"amount":"12.5","unit":{"code":"GBP"}}');
    expect(archive.decodeString('unit')).toBeUndefined();
  });

  it('should hand the nested archive to the decode callback', () => {
    const archive = new KeyedArchive();
    archive.encodeObject(CurrencyUnit.AUD, 'unit');

    const seen = archive.decodeObject(
      'unit',
      (decoder: KeyedDecoder): Result<string | undefined, DecodeFailure> => ok(decoder.decodeString('code'))
    );

    expect(seen._unsafeUnwrap()).toBe('AUD');
  });

  it('should fail decodeObject for a missing key or a string field', () => {
    const archive = new KeyedArchive();
    archive.encodeString('EUR', 'code');

    const missing = archive.decodeObject('unit', (decoder) => CurrencyUnit.decode(decoder));
    const flat = archive.decodeObject('code', (decoder) => CurrencyUnit.decode(decoder));

    expect(missing._unsafeUnwrapErr().reason).toBe('missing-field');
    expect(missing._unsafeUnwrapErr().key).toBe('unit');
    expect(flat._unsafeUnwrapErr().reason).toBe('missing-field');
  });

  describe('parse', () => {
    it('should rebuild nested archives', () => {
      const archive = KeyedArchive.parse('{"first":{"code":"JPY"},"second":{"code":"CAD"}}')._unsafeUnwrap();

      expect(archive.keys()).toEqual(['first', 'second']);
      expect(archive.decodeObject('first', (decoder) => CurrencyUnit.decode(decoder))._unsafeUnwrap()).toBe(
        CurrencyUnit.JPY
      );
      expect(archive.decodeObject('second', (decoder) => CurrencyUnit.decode(decoder))._unsafeUnwrap()).toBe(
        CurrencyUnit.CAD
      );
    });

    it('should reject invalid JSON', () => {
      const failure = KeyedArchive.parse('{"code":')._unsafeUnwrapErr();

      expect(failure.reason).toBe('malformed-payload');
      expect(failure.message.startsWith('Invalid JSON: ')).toBe(true);
    });

    it('should reject values that are neither strings nor objects', () => {
      const failure = KeyedArchive.parse('{"code":42}')._unsafeUnwrapErr();

      expect(failure.reason).toBe('malformed-payload');
      expect(failure.message.startsWith('Invalid archive: ')).toBe(true);
    });

    it('should reject a top-level array', () => {
      expect(KeyedArchive.parse('["USD"]')._unsafeUnwrapErr().reason).toBe('malformed-payload');
    });
  });

  describe('from', () => {
    it('should accept an already parsed record', () => {
      const archive = KeyedArchive.from({ code: 'AMD' })._unsafeUnwrap();

      expect(CurrencyUnit.decode(archive)._unsafeUnwrap()).toBe(CurrencyUnit.AMD);
    });

    it('should reject null', () => {
      expect(KeyedArchive.from(null).isErr()).toBe(true);
    });
  });
});
