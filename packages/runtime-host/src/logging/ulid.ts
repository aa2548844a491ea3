/**
 * Bastion Runtime Host — ULID generation
 *
 * 26 characters of Crockford Base32: 48 bits of millisecond time followed by
 * 80 random bits. Lexicographic order follows creation time, which is what
 * the log reader relies on as a tiebreaker.
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

export function ulid(now: number = Date.now()): string {
  const random = randomBytes(10).reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
  return encodeCrockford(BigInt(now), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}
