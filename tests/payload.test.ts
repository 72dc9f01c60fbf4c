import { LosslessNumber } from 'lossless-json';
import { describe, expect, test } from 'vitest';

import {
  asBoolean,
  asDecimal,
  asInt32,
  asInt64,
  asString,
  getElement,
  getMember,
  readOptionalString,
} from '../src/services/payload.js';
import type { JsonValue } from '../src/types/json-rpc.js';

const payload: JsonValue = {
  cwd: '/home/alice/project',
  count: 3,
  ratio: 0.25,
  flag: true,
  items: ['a', 'b'],
  nothing: null,
};

describe('getMember', () => {
  test('reads an existing member', () => {
    expect(getMember(payload, 'cwd')).toEqual({ ok: true, value: '/home/alice/project' });
  });

  test('returns null members as values', () => {
    expect(getMember(payload, 'nothing')).toEqual({ ok: true, value: null });
  });

  test('reports missing members', () => {
    const result = getMember(payload, 'absent');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({ kind: 'missing', message: "Missing member 'absent'" });
    }
  });

  test('reports non-objects as wrong_type', () => {
    const result = getMember(['x'], 'cwd');
    expect(result).toEqual({
      ok: false,
      error: { kind: 'wrong_type', message: "Expected object to read 'cwd', got array" },
    });
  });
});

describe('getElement', () => {
  test('reads by index and rejects out-of-range indices', () => {
    expect(getElement(['a', 'b'], 1)).toEqual({ ok: true, value: 'b' });
    expect(getElement(['a', 'b'], 2)).toEqual({
      ok: false,
      error: { kind: 'out_of_range', message: 'Index 2 out of range (length 2)' },
    });
    expect(getElement('ab', 0).ok).toBe(false);
  });
});

describe('scalar conversions', () => {
  test('asString and asBoolean check the JSON type', () => {
    expect(asString('x')).toEqual({ ok: true, value: 'x' });
    expect(asString(1)).toEqual({ ok: false, error: { kind: 'wrong_type', message: 'Expected string, got number' } });
    expect(asBoolean(false)).toEqual({ ok: true, value: false });
    expect(asBoolean(null)).toEqual({ ok: false, error: { kind: 'wrong_type', message: 'Expected boolean, got null' } });
  });

  test('asInt32 enforces integer and range', () => {
    expect(asInt32(2147483647)).toEqual({ ok: true, value: 2147483647 });
    expect(asInt32(2147483648)).toEqual({
      ok: false,
      error: { kind: 'out_of_range', message: '2147483648 is outside the 32-bit integer range' },
    });
    expect(asInt32(1.5)).toEqual({ ok: false, error: { kind: 'wrong_type', message: 'Expected integer, got 1.5' } });
  });

  test('asInt64 returns a bigint for plain integers', () => {
    expect(asInt64(2 ** 40)).toEqual({ ok: true, value: 1099511627776n });
    expect(asInt64(-7)).toEqual({ ok: true, value: -7n });
    expect(asInt64(2 ** 60)).toEqual({ ok: true, value: 1152921504606846976n });
  });

  test('asInt64 reads the full signed 64-bit range from the source text', () => {
    expect(asInt64(new LosslessNumber('9007199254740993'))).toEqual({ ok: true, value: 9007199254740993n });
    expect(asInt64(new LosslessNumber('9223372036854775807'))).toEqual({ ok: true, value: 9223372036854775807n });
    expect(asInt64(new LosslessNumber('-9223372036854775808'))).toEqual({ ok: true, value: -9223372036854775808n });
  });

  test('asInt64 rejects values past 64 bits and non-integers', () => {
    expect(asInt64(new LosslessNumber('12345678901234567890'))).toEqual({
      ok: false,
      error: { kind: 'out_of_range', message: '12345678901234567890 is outside the 64-bit integer range' },
    });
    expect(asInt64(new LosslessNumber('0.10000000000000000001'))).toEqual({
      ok: false,
      error: { kind: 'wrong_type', message: 'Expected integer, got 0.10000000000000000001' },
    });
    expect(asInt64('12')).toEqual({ ok: false, error: { kind: 'wrong_type', message: 'Expected number, got string' } });
  });

  test('asInt32 reports lossless integers as out of range', () => {
    expect(asInt32(new LosslessNumber('9007199254740993'))).toEqual({
      ok: false,
      error: { kind: 'out_of_range', message: '9007199254740993 is outside the 32-bit integer range' },
    });
  });

  test('asDecimal accepts finite numbers only', () => {
    expect(asDecimal(0.25)).toEqual({ ok: true, value: 0.25 });
    expect(asDecimal('0.25').ok).toBe(false);
    expect(asDecimal(new LosslessNumber('0.10000000000000000001'))).toEqual({ ok: true, value: 0.1 });
  });
});

describe('readOptionalString', () => {
  test('reads a present string', () => {
    expect(readOptionalString(payload, 'cwd')).toEqual({ ok: true, value: '/home/alice/project' });
  });

  test('treats missing, null and non-object payloads as absent', () => {
    expect(readOptionalString(payload, 'absent')).toEqual({ ok: true, value: undefined });
    expect(readOptionalString(payload, 'nothing')).toEqual({ ok: true, value: undefined });
    expect(readOptionalString(undefined, 'cwd')).toEqual({ ok: true, value: undefined });
  });

  test('rejects other types', () => {
    expect(readOptionalString(payload, 'count')).toEqual({
      ok: false,
      error: { kind: 'wrong_type', message: "Expected 'count' to be a string, got number" },
    });
  });
});
