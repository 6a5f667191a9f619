/**
 * Rigging Runtime Host — ULID Generator
 *
 * 26 characters of Crockford Base32: a 48-bit millisecond timestamp (10
 * characters) followed by 80 random bits (16 characters). IDs sort by
 * creation time; within one millisecond the order is arbitrary.
 *
 * Used as the event_id of change log lines, the key readChangeLog
 * deduplicates on.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_LENGTH = 10;
const RANDOM_LENGTH = 16;

/** Encode `value` as exactly `length` base32 characters, most significant first. */
function encodeBase32(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(rest % 32n)) + out;
    rest /= 32n;
  }
  return out;
}

/**
 * @param now - Milliseconds since the epoch. Default: Date.now().
 *
 * @example
 * ulid(); // '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulid(now: number = Date.now()): string {
  const random = BigInt('0x' + randomBytes(10).toString('hex'));
  return encodeBase32(BigInt(now), TIME_LENGTH) + encodeBase32(random, RANDOM_LENGTH);
}
