export * from './errors/index.js';
export type { LinearUnit } from './types/linear-unit.js';
export * from './value-objects/unit-converter-linear.js';
export * from './value-objects/currency-code.js';
export * from './value-objects/currency-unit.js';
export * from './value-objects/measurement.js';
export type { KeyedDecoder, KeyedEncodable, KeyedEncoder } from './coding/keyed-coder.js';
export * from './coding/keyed-archive.js';
export * from './schemas/currency.js';
export { fromZod, parseJson } from './utils/zod-utils.js';
