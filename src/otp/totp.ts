/**
 * Time-based one-time passwords (RFC 6238) over the HOTP core (RFC 4226).
 *
 * Pure functions of (entry, instant); nothing here keeps state.
 */

import { hmac } from '@noble/hashes/hmac.js';
import { sha1 } from '@noble/hashes/legacy.js';
import { sha256, sha512 } from '@noble/hashes/sha2.js';
import { InvalidEntryError } from '../vault/errors';
import type { DigestAlgorithm, SecretEntry } from '../vault/types';

export interface OtpCode {
  /** Zero-padded decimal code */
  code: string;
  /** Whole seconds until the code rolls over */
  secondsRemaining: number;
  /** Time-step counter the code was computed for */
  counter: number;
}

const HASHES = {
  SHA1: sha1,
  SHA256: sha256,
  SHA512: sha512,
} as const;

function counterBytes(counter: number): Uint8Array {
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, BigInt(counter), false);
  return bytes;
}

/**
 * Dynamic truncation: 31-bit big-endian integer at the offset named by the
 * low nibble of the last digest byte.
 */
export function dynamicTruncate(digest: Uint8Array): number {
  const offset = digest[digest.length - 1] & 0x0f;
  return (
    ((digest[offset] & 0x7f) << 24) |
    (digest[offset + 1] << 16) |
    (digest[offset + 2] << 8) |
    digest[offset + 3]
  );
}

/**
 * HOTP value for a counter, zero-padded to `digits`.
 */
export function generateHotp(
  secret: Uint8Array,
  counter: number,
  digits: number,
  algorithm: DigestAlgorithm = 'SHA1'
): string {
  if (!Number.isSafeInteger(counter) || counter < 0) {
    throw new InvalidEntryError(`counter must be a non-negative integer, got ${counter}`);
  }
  const digest = hmac(HASHES[algorithm], secret, counterBytes(counter));
  const binary = dynamicTruncate(digest);
  return String(binary % 10 ** digits).padStart(digits, '0');
}

function toUnixSeconds(instant: Date | number): number {
  const seconds = instant instanceof Date ? instant.getTime() / 1000 : instant;
  return Math.floor(seconds);
}

/**
 * Code for `entry` at `instant` (a Date or Unix seconds).
 *
 * @throws InvalidEntryError if the instant precedes the entry's t0
 */
export function generateTotp(
  entry: Pick<SecretEntry, 'secret' | 'algorithm' | 'digits' | 'period' | 't0'>,
  instant: Date | number
): OtpCode {
  const t = toUnixSeconds(instant);
  if (!Number.isSafeInteger(t) || t < entry.t0) {
    throw new InvalidEntryError(`instant ${t} precedes t0 ${entry.t0}`);
  }
  const elapsed = t - entry.t0;
  const counter = Math.floor(elapsed / entry.period);
  return {
    code: generateHotp(entry.secret, counter, entry.digits, entry.algorithm),
    secondsRemaining: entry.period - (elapsed % entry.period),
    counter,
  };
}
