/**
 * Warden Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier: 26 characters
 * of Crockford Base32.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80-bit random
 *
 * Used as event_id in confinement log lines so the log reader can drop
 * duplicates when log files are merged from several hosts.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford Base32: no I, L, O or U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;

/** Encode an unsigned integer as exactly `length` Base32 characters. */
function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(rest & 31n)) + out;
    rest >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * @param now - Millisecond timestamp. Default: Date.now()
 * @param random - Source of 10 random bytes. Default: crypto.randomBytes
 */
export function ulid(
  now: number = Date.now(),
  random: (size: number) => Uint8Array = randomBytes,
): string {
  let randomValue = 0n;
  for (const byte of random(RANDOM_BYTES)) {
    randomValue = (randomValue << 8n) | BigInt(byte);
  }
  return encode(BigInt(now), TIME_CHARS) + encode(randomValue, RANDOM_CHARS);
}

/**
 * Millisecond timestamp encoded in a ULID, or null when the string is not
 * a well-formed ULID.
 */
export function ulidTime(id: string): number | null {
  if (!/^[0-9A-HJKMNP-TV-Z]{26}$/.test(id)) return null;
  let value = 0n;
  for (const char of id.slice(0, TIME_CHARS)) {
    value = (value << 5n) | BigInt(CROCKFORD_ALPHABET.indexOf(char));
  }
  return Number(value);
}
