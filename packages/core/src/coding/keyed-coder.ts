/**
 * Narrow keyed read/write capability the currency codec depends on.
 * Any backend (JSON, binary, a database row) can implement it.
 */
export interface KeyedEncoder {
  encodeString(value: string, key: string): void;
}

export interface KeyedDecoder {
  /** `undefined` when nothing was stored under the key, or it is not a string */
  decodeString(key: string): string | undefined;
}

/** A value that writes itself through a keyed encoder */
export interface KeyedEncodable {
  encode(encoder: KeyedEncoder): void;
}
