/**
 * Secret entries: validation and secret intake.
 */

import { base32 } from '@scure/base';
import { InvalidEntryError } from './errors';
import { type DigestAlgorithm, type SecretEntry, type SecretEntryInput, DIGEST_ALGORITHMS } from './types';

export const MIN_DIGITS = 6;
export const MAX_DIGITS = 10;
export const DEFAULT_DIGITS = 6;
export const DEFAULT_PERIOD = 30;
export const DEFAULT_ALGORITHM: DigestAlgorithm = 'SHA1';

export function isDigestAlgorithm(value: unknown): value is DigestAlgorithm {
  return typeof value === 'string' && DIGEST_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Decode a Base32 secret as found in otpauth:// URIs.
 *
 * Accepts lowercase, spaces, hyphens and missing padding.
 *
 * @throws InvalidEntryError if the text is not valid RFC 4648 Base32
 */
export function decodeBase32Secret(text: string): Uint8Array {
  const normalized = text.replace(/[\s-]/g, '').replace(/=+$/, '').toUpperCase();
  const padded = normalized.padEnd(Math.ceil(normalized.length / 8) * 8, '=');
  try {
    return base32.decode(padded);
  } catch (error) {
    throw new InvalidEntryError('secret is not valid Base32', error);
  }
}

function secretBytes(input: SecretEntryInput): Uint8Array {
  if (input.encoded) {
    if (typeof input.secret !== 'string') {
      throw new InvalidEntryError('encoded secret must be Base32 text');
    }
    return decodeBase32Secret(input.secret);
  }
  return typeof input.secret === 'string'
    ? new TextEncoder().encode(input.secret)
    : new Uint8Array(input.secret);
}

/**
 * Validate input and build an immutable entry.
 *
 * The secret is copied; the entry never aliases caller memory.
 *
 * @throws InvalidEntryError on an empty or whitespace-padded name, an empty secret, digits outside 6-10,
 *   a non-positive period, a negative t0 or an unknown algorithm
 */
export function createSecretEntry(input: SecretEntryInput): SecretEntry {
  const { name } = input;
  const algorithm = input.algorithm ?? DEFAULT_ALGORITHM;
  const digits = input.digits ?? DEFAULT_DIGITS;
  const period = input.period ?? DEFAULT_PERIOD;
  const t0 = input.t0 ?? 0;

  if (name.trim().length === 0) {
    throw new InvalidEntryError('name must not be empty');
  }
  // names are lookup keys and are stored exactly as given
  if (name !== name.trim()) {
    throw new InvalidEntryError(`name must not start or end with whitespace: ${JSON.stringify(name)}`);
  }
  if (!isDigestAlgorithm(algorithm)) {
    throw new InvalidEntryError(`unsupported algorithm: ${String(algorithm)}`);
  }
  if (!Number.isInteger(digits) || digits < MIN_DIGITS || digits > MAX_DIGITS) {
    throw new InvalidEntryError(`digits must be an integer in ${MIN_DIGITS}..${MAX_DIGITS}, got ${digits}`);
  }
  if (!Number.isSafeInteger(period) || period <= 0) {
    throw new InvalidEntryError(`period must be a positive integer, got ${period}`);
  }
  if (!Number.isSafeInteger(t0) || t0 < 0) {
    throw new InvalidEntryError(`t0 must be a non-negative integer, got ${t0}`);
  }

  const secret = secretBytes(input);
  if (secret.length === 0) {
    throw new InvalidEntryError('secret must not be empty');
  }

  return Object.freeze({ name, secret, algorithm, digits, period, t0 });
}

/** Copy an entry, including its secret bytes. */
export function copyEntry(entry: SecretEntry): SecretEntry {
  return Object.freeze({ ...entry, secret: new Uint8Array(entry.secret) });
}
