/**
 * JSON value types, exact-integer decoding and canonical serialization.
 *
 * Integers outside the safe double range are held as `bigint` so that a
 * decode/encode cycle reproduces their digits.
 */

import { isInteger, isSafeNumber, LosslessNumber, parse as parseLossless, stringify as stringifyLossless } from 'lossless-json';

export type JsonValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Type guard for values `canonicalJson` can encode. Leaves the value untouched. */
export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
    case 'bigint':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isPlainRecord(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Parse JSON text, keeping integers beyond `Number.MAX_SAFE_INTEGER` exact.
 *
 * The structure comes from `JSON.parse`, so keys such as `"__proto__"` stay
 * own properties; lossless-json supplies the digits of unsafe integers.
 *
 * @throws SyntaxError on malformed text or duplicate keys with different values.
 */
export function parseJson(text: string): JsonValue {
  const value: unknown = JSON.parse(text);
  if (!isJsonValue(value)) {
    throw new SyntaxError('Unsupported JSON value');
  }
  return restoreIntegers(value, parseLossless(text));
}

function restoreIntegers(value: JsonValue, exact: unknown): JsonValue {
  if (typeof value === 'number') {
    if (exact instanceof LosslessNumber && isInteger(exact.value) && !isSafeNumber(exact.value)) {
      return BigInt(exact.value);
    }
    return value;
  }
  if (Array.isArray(value)) {
    const exactItems: unknown[] = Array.isArray(exact) ? exact : [];
    return value.map((item, i) => restoreIntegers(item, exactItems[i]));
  }
  if (value !== null && typeof value === 'object') {
    const exactRecord: Record<string, unknown> = isRecord(exact) ? exact : {};
    return Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, JsonValue] => [
        key,
        restoreIntegers(item, Object.hasOwn(exactRecord, key) ? exactRecord[key] : undefined),
      ]),
    );
  }
  return value;
}

/**
 * Serialize a JSON value with object keys sorted at every depth and no
 * insignificant whitespace. `bigint` values are written as plain digits.
 *
 * @example
 * canonicalJson({ b: 2, a: [1, { d: 0, c: null }] })
 * // => '{"a":[1,{"c":null,"d":0}],"b":2}'
 */
export function canonicalJson(value: JsonValue): string {
  const text = stringifyLossless(sortKeys(value));
  if (text === undefined) {
    throw new TypeError('Value has no JSON representation');
  }
  return text;
}

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const entries: Array<[string, JsonValue]> = [];
    for (const key of Object.keys(value).sort()) {
      const entry = value[key];
      if (entry !== undefined) {
        entries.push([key, sortKeys(entry)]);
      }
    }
    // fromEntries defines own properties, so a "__proto__" key survives
    return Object.fromEntries(entries);
  }
  return value;
}
