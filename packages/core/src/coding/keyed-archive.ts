import type { Result } from 'neverthrow';
import { err } from 'neverthrow';
import { z } from 'zod';

import { DecodeFailure } from '../errors/index.js';
import { fromZod, parseJson } from '../utils/zod-utils.js';

import type { KeyedDecoder, KeyedEncodable, KeyedEncoder } from './keyed-coder.js';

export type ArchiveValue = string | ArchiveRecord;

export interface ArchiveRecord {
  [key: string]: ArchiveValue;
}

export const ArchiveRecordSchema: z.ZodType<ArchiveRecord> = z.lazy(() =>
  z.record(z.union([z.string(), ArchiveRecordSchema]))
);

/**
 * In-memory keyed archive with a JSON transport.
 *
 * Fields are strings or nested archives. A nested archive holds one encoded
 * object, so several values can share a payload under their own keys.
 */
export class KeyedArchive implements KeyedEncoder, KeyedDecoder {
  /**
   * Build an archive from parsed JSON (or any unknown value)
   */
  static from(value: unknown): Result<KeyedArchive, DecodeFailure> {
    return fromZod(ArchiveRecordSchema, value, 'archive').map((record) => KeyedArchive.fromRecord(record));
  }

  /**
   * Read an archive from the text produced by `serialize()`
   */
  static parse(text: string): Result<KeyedArchive, DecodeFailure> {
    return parseJson(text).andThen((value) => KeyedArchive.from(value));
  }

  private static fromRecord(record: ArchiveRecord): KeyedArchive {
    const archive = new KeyedArchive();
    for (const [key, value] of Object.entries(record)) {
      archive.fields.set(key, typeof value === 'string' ? value : KeyedArchive.fromRecord(value));
    }
    return archive;
  }

  private readonly fields = new Map<string, string | KeyedArchive>();

  encodeString(value: string, key: string): void {
    this.fields.set(key, value);
  }

  decodeString(key: string): string | undefined {
    const value = this.fields.get(key);
    return typeof value === 'string' ? value : undefined;
  }

  /**
   * Encode an object into a nested archive stored under `key`
   */
  encodeObject(value: KeyedEncodable, key: string): void {
    const nested = new KeyedArchive();
    value.encode(nested);
    this.fields.set(key, nested);
  }

  /**
   * Decode the nested archive under `key`. Fails with `missing-field` when the key
   * is absent or holds a plain string.
   */
  decodeObject<T>(key: string, decode: (decoder: KeyedDecoder) => Result<T, DecodeFailure>): Result<T, DecodeFailure> {
    const nested = this.fields.get(key);
    if (!(nested instanceof KeyedArchive)) {
      return err(DecodeFailure.missingField(key));
    }
    return decode(nested);
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  toJSON(): ArchiveRecord {
    const record: ArchiveRecord = {};
    for (const [key, value] of this.fields) {
      record[key] = typeof value === 'string' ? value : value.toJSON();
    }
    return record;
  }

  serialize(): string {
    return JSON.stringify(this.toJSON());
  }
}
