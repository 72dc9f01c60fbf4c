/**
 * Typed reads from opaque JSON payloads. Nothing here throws: every accessor
 * returns a ConversionResult.
 */

import { isLosslessNumber } from 'lossless-json';

import type { JsonObject, JsonValue } from '@/types/json-rpc.js';

export type ConversionErrorKind = 'missing' | 'wrong_type' | 'out_of_range';

export interface ConversionError {
  kind: ConversionErrorKind;
  message: string;
}

export type ConversionResult<T> = { ok: true; value: T } | { ok: false; error: ConversionError };

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const INTEGER_TEXT = /^-?\d+$/;

function ok<T>(value: T): ConversionResult<T> {
  return { ok: true, value };
}

function fail<T>(kind: ConversionErrorKind, message: string): ConversionResult<T> {
  return { ok: false, error: { kind, message } };
}

function describe(value: JsonValue | undefined): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isLosslessNumber(value)) return 'number';
  return typeof value;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

export function getMember(value: JsonValue | undefined, key: string): ConversionResult<JsonValue> {
  if (!isJsonObject(value)) {
    return fail('wrong_type', `Expected object to read '${key}', got ${describe(value)}`);
  }
  if (!Object.prototype.hasOwnProperty.call(value, key)) {
    return fail('missing', `Missing member '${key}'`);
  }
  const member = value[key];
  return member === undefined ? fail('missing', `Missing member '${key}'`) : ok(member);
}

export function getElement(value: JsonValue | undefined, index: number): ConversionResult<JsonValue> {
  if (!Array.isArray(value)) {
    return fail('wrong_type', `Expected array to read [${index}], got ${describe(value)}`);
  }
  if (!Number.isInteger(index) || index < 0 || index >= value.length) {
    return fail('out_of_range', `Index ${index} out of range (length ${value.length})`);
  }
  const element = value[index];
  return element === undefined ? fail('missing', `Missing element [${index}]`) : ok(element);
}

export function asString(value: JsonValue | undefined): ConversionResult<string> {
  return typeof value === 'string' ? ok(value) : fail('wrong_type', `Expected string, got ${describe(value)}`);
}

export function asBoolean(value: JsonValue | undefined): ConversionResult<boolean> {
  return typeof value === 'boolean' ? ok(value) : fail('wrong_type', `Expected boolean, got ${describe(value)}`);
}

export function asInt32(value: JsonValue | undefined): ConversionResult<number> {
  if (isLosslessNumber(value)) {
    // Too large for a double, so certainly too large for 32 bits
    return INTEGER_TEXT.test(value.value)
      ? fail('out_of_range', `${value.value} is outside the 32-bit integer range`)
      : fail('wrong_type', `Expected integer, got ${value.value}`);
  }
  if (typeof value !== 'number') {
    return fail('wrong_type', `Expected number, got ${describe(value)}`);
  }
  if (!Number.isInteger(value)) {
    return fail('wrong_type', `Expected integer, got ${value}`);
  }
  if (value < INT32_MIN || value > INT32_MAX) {
    return fail('out_of_range', `${value} is outside the 32-bit integer range`);
  }
  return ok(value);
}

/**
 * 64-bit integer as a bigint, read from the number's source text when a
 * double could not hold it.
 */
export function asInt64(value: JsonValue | undefined): ConversionResult<bigint> {
  let big: bigint;
  if (isLosslessNumber(value)) {
    if (!INTEGER_TEXT.test(value.value)) {
      return fail('wrong_type', `Expected integer, got ${value.value}`);
    }
    big = BigInt(value.value);
  } else if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      return fail('wrong_type', `Expected integer, got ${value}`);
    }
    big = BigInt(value);
  } else {
    return fail('wrong_type', `Expected number, got ${describe(value)}`);
  }
  if (big < INT64_MIN || big > INT64_MAX) {
    return fail('out_of_range', `${big} is outside the 64-bit integer range`);
  }
  return ok(big);
}

/**
 * Nearest double. Extra digits of a LosslessNumber are rounded away.
 */
export function asDecimal(value: JsonValue | undefined): ConversionResult<number> {
  if (isLosslessNumber(value)) {
    const approximate = Number.parseFloat(value.value);
    return Number.isFinite(approximate)
      ? ok(approximate)
      : fail('out_of_range', `${value.value} is outside the double range`);
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fail('wrong_type', `Expected number, got ${describe(value)}`);
  }
  return ok(value);
}

/**
 * Optional string member: missing or null reads as undefined, any other
 * non-string is an error.
 */
export function readOptionalString(value: JsonValue | undefined, key: string): ConversionResult<string | undefined> {
  if (!isJsonObject(value)) {
    return ok(undefined);
  }
  const member = value[key];
  if (member === undefined || member === null) {
    return ok(undefined);
  }
  return typeof member === 'string'
    ? ok(member)
    : fail('wrong_type', `Expected '${key}' to be a string, got ${describe(member)}`);
}
