import { describe, expect, test } from 'vitest';

import { decodeTime, generateULID, isULID } from '../src/utils/ulid.js';

describe('ULID', () => {
  test('produces 26 Crockford base32 characters', () => {
    const id = generateULID();
    expect(id).toHaveLength(26);
    expect(isULID(id)).toBe(true);
  });

  test('encodes the timestamp', () => {
    expect(decodeTime(generateULID(1_700_000_000_000))).toBe(1_700_000_000_000);
    expect(generateULID(0).slice(0, 10)).toBe('0000000000');
  });

  test('sorts in creation order within one millisecond', () => {
    const ids = Array.from({ length: 100 }, () => generateULID(1_800_000_000_000));
    expect([...ids].sort()).toEqual(ids);
    expect(new Set(ids).size).toBe(100);
  });

  test('rejects malformed ids', () => {
    expect(isULID('01arz3ndektsv4rrffq69g5fav')).toBe(false);
    expect(isULID('01ARZ3NDEKTSV4RRFFQ69G5FAI')).toBe(false);
    expect(() => decodeTime('short')).toThrow(RangeError);
  });
});
