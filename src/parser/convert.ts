import { MalformedPairError } from './errors.js';

/**
 * Turns a resolved raw value into something typed. `undefined` means
 * "could not convert"; the accessors do not tell that apart from "not given".
 */
export type ConverterFn<T> = (raw: string) => T | undefined;

export interface ConverterObject<T> {
  convert(raw: string): T | undefined;
}

export type Converter<T> = ConverterFn<T> | ConverterObject<T>;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_NUMBER_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

function parseInteger(raw: string): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

function parseNumber(raw: string): number | undefined {
  if (DECIMAL_PATTERN.test(raw)) return Number(raw);

  const special = SPECIAL_NUMBER_PATTERN.exec(raw);
  if (!special) return undefined;
  if (special[2]?.toLowerCase() === 'nan') return NaN;
  return special[1] === '-' ? -Infinity : Infinity;
}

function parseBoolean(raw: string): boolean | undefined {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return undefined;
}

function parseBigInt(raw: string): bigint | undefined {
  return INTEGER_PATTERN.test(raw) ? BigInt(raw) : undefined;
}

export const scalars = {
  string: (raw: string): string | undefined => raw,
  integer: parseInteger,
  number: parseNumber,
  boolean: parseBoolean,
  bigint: parseBigInt,
} satisfies Record<string, ConverterFn<unknown>>;

export type ScalarName = keyof typeof scalars;

export type ScalarType<N extends ScalarName> = NonNullable<ReturnType<(typeof scalars)[N]>>;

export function isScalarName(value: unknown): value is ScalarName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(scalars, value);
}

export function applyConverter<T>(converter: Converter<T>, raw: string): T | undefined {
  return typeof converter === 'function' ? converter(raw) : converter.convert(raw);
}

function toConverter(source: ScalarName | Converter<unknown>): Converter<unknown> {
  return typeof source === 'string' ? scalars[source] : source;
}

type Resolved<S> = S extends ScalarName ? ScalarType<S> : S extends Converter<infer T> ? T : never;

function splitWords(raw: string): string[] {
  return raw.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Converter for MultiValue options. Every whitespace-separated token has to
 * convert, otherwise the whole result is `undefined`; so is an empty value.
 */
export function listOf<S extends ScalarName | Converter<unknown>>(element: S): ConverterFn<Resolved<S>[]>;
export function listOf(element: ScalarName | Converter<unknown>): ConverterFn<unknown[]> {
  const convert = toConverter(element);

  return (raw) => {
    const words = splitWords(raw);
    if (words.length === 0) return undefined;

    const values: unknown[] = [];
    for (const word of words) {
      const value = applyConverter(convert, word);
      if (value === undefined) return undefined;
      values.push(value);
    }
    return values;
  };
}

/**
 * Converter for KeyValueList options (`k:v k2:v2`). Each chunk is split at its
 * first `:`; any key or value that fails to convert voids the whole map.
 *
 * @throws MalformedPairError when a chunk has no `:` at all
 */
export function dictOf<K extends ScalarName | Converter<unknown>, V extends ScalarName | Converter<unknown>>(
  key: K,
  value: V
): ConverterFn<Map<Resolved<K>, Resolved<V>>>;
export function dictOf(
  key: ScalarName | Converter<unknown>,
  value: ScalarName | Converter<unknown>
): ConverterFn<Map<unknown, unknown>> {
  const convertKey = toConverter(key);
  const convertValue = toConverter(value);

  return (raw) => {
    const words = splitWords(raw);
    if (words.length === 0) return undefined;

    // Every chunk is checked for a separator, even after a conversion has failed
    let complete = true;
    const entries = new Map<unknown, unknown>();
    for (const chunk of words) {
      const separator = chunk.indexOf(':');
      if (separator === -1) {
        throw new MalformedPairError(chunk);
      }
      if (!complete) continue;

      const k = applyConverter(convertKey, chunk.slice(0, separator));
      const v = applyConverter(convertValue, chunk.slice(separator + 1));
      if (k === undefined || v === undefined) {
        complete = false;
        continue;
      }
      entries.set(k, v);
    }
    return complete ? entries : undefined;
  };
}
