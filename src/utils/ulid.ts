/**
 * ULID generation for proxy session ids.
 * 48-bit millisecond timestamp + 80 random bits, Crockford base32, 26 chars.
 * Ids from one process sort in creation order, even within a millisecond.
 */

import { randomBytes } from 'node:crypto';

const ULID_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_LENGTH = 10;
const RANDOM_LENGTH = 16;
const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

let lastTime = -1;
let lastRandom: number[] = [];

function encodeTime(timestamp: number): string {
  let value = timestamp;
  let encoded = '';
  for (let i = 0; i < TIME_LENGTH; i++) {
    encoded = ULID_ALPHABET.charAt(value % 32) + encoded;
    value = Math.floor(value / 32);
  }
  return encoded;
}

function freshRandom(): number[] {
  return Array.from(randomBytes(RANDOM_LENGTH), (byte) => byte % 32);
}

// Base32 increment of the random part; wraps to fresh randomness on overflow
function increment(digits: number[]): number[] {
  const next = [...digits];
  for (let i = next.length - 1; i >= 0; i--) {
    const digit = next[i] ?? 0;
    if (digit < 31) {
      next[i] = digit + 1;
      return next;
    }
    next[i] = 0;
  }
  return freshRandom();
}

export function generateULID(now: number = Date.now()): string {
  if (now === lastTime) {
    lastRandom = increment(lastRandom);
  } else {
    lastTime = now;
    lastRandom = freshRandom();
  }
  return encodeTime(now) + lastRandom.map((digit) => ULID_ALPHABET.charAt(digit)).join('');
}

export function isULID(value: string): boolean {
  return ULID_PATTERN.test(value);
}

/**
 * Millisecond timestamp carried in a ULID
 */
export function decodeTime(ulid: string): number {
  if (!isULID(ulid)) {
    throw new RangeError(`Not a ULID: ${ulid}`);
  }
  let time = 0;
  for (const char of ulid.slice(0, TIME_LENGTH)) {
    time = time * 32 + ULID_ALPHABET.indexOf(char);
  }
  return time;
}
