/**
 * ContractCheck Host — ULID
 *
 * 26-character, lexicographically time-sortable identifiers used as
 * `event_id` in the validation log. Ten Crockford base-32 characters of
 * millisecond time followed by sixteen random characters (80 bits).
 */

import { randomBytes } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

/** Largest timestamp that fits in 48 bits. */
const MAX_TIME = 2 ** 48 - 1;

function encodeTime(ms: number): string {
  let out = '';
  let t = ms;
  for (let i = 0; i < 10; i++) {
    out = ALPHABET.charAt(t % 32) + out;
    t = Math.floor(t / 32);
  }
  return out;
}

function encodeRandom(): string {
  // One byte per character, low five bits each.
  return [...randomBytes(16)].map((b) => ALPHABET.charAt(b & 0x1f)).join('');
}

/**
 * @param now - milliseconds since the epoch; defaults to the current time
 * @throws {RangeError} if `now` is negative, fractional or beyond 48 bits
 */
export function ulid(now: number = Date.now()): string {
  if (!Number.isInteger(now) || now < 0 || now > MAX_TIME) {
    throw new RangeError(`ULID time out of range: ${now}`);
  }
  return encodeTime(now) + encodeRandom();
}
