/**
 * Password-based key derivation using Argon2id.
 *
 * Cost parameters are persisted per container, so a vault written under old
 * defaults stays readable when the defaults change.
 */

import { argon2id } from '@noble/hashes/argon2.js';
import { randomBytes } from '@noble/hashes/utils.js';
import { KeyDerivationError } from './errors';
import { encodePassword, withWiped } from './sensitive';
import { type KdfParams, type StoredKdfParams, DEFAULT_KDF_PARAMS } from './types';

/** Salt length in bytes (128 bits) */
export const SALT_LENGTH = 16;

/** Derived key length in bytes (256 bits for ChaCha20-Poly1305) */
export const KEY_LENGTH = 32;

/** Argon2 refuses salts shorter than this */
export const MIN_SALT_LENGTH = 8;

/** Upper bound on memory cost in KiB (2 GiB) */
export const MAX_MEMORY_COST = 2 * 1024 * 1024;

/** Argon2 upper bounds on iterations and lanes */
export const MAX_TIME_COST = 2 ** 32 - 1;
export const MAX_PARALLELISM = 2 ** 24 - 1;

/**
 * Check cost parameters against Argon2's minimums.
 *
 * @throws KeyDerivationError if any parameter is out of range
 */
export function validateKdfParams(params: KdfParams): void {
  const { timeCost, memoryCost, parallelism } = params;

  if (!Number.isSafeInteger(timeCost) || timeCost < 1 || timeCost > MAX_TIME_COST) {
    throw new KeyDerivationError(`timeCost must be an integer in 1..${MAX_TIME_COST}, got ${timeCost}`);
  }
  if (!Number.isSafeInteger(parallelism) || parallelism < 1 || parallelism > MAX_PARALLELISM) {
    throw new KeyDerivationError(`parallelism must be an integer in 1..${MAX_PARALLELISM}, got ${parallelism}`);
  }
  if (!Number.isSafeInteger(memoryCost) || memoryCost < 8 * parallelism || memoryCost > MAX_MEMORY_COST) {
    throw new KeyDerivationError(
      `memoryCost must be an integer in ${8 * parallelism}..${MAX_MEMORY_COST} KiB, got ${memoryCost}`
    );
  }
}

/**
 * Derive a 32-byte key from a password using Argon2id.
 *
 * Deterministic for the same password, salt and params. The UTF-8 password
 * buffer is wiped before returning; the caller owns (and must wipe) the key.
 *
 * @throws KeyDerivationError on malformed params or a too-short salt
 */
export function deriveKey(
  password: string,
  salt: Uint8Array,
  params: KdfParams = DEFAULT_KDF_PARAMS
): Uint8Array {
  validateKdfParams(params);
  if (salt.length < MIN_SALT_LENGTH) {
    throw new KeyDerivationError(`salt must be at least ${MIN_SALT_LENGTH} bytes, got ${salt.length}`);
  }

  return withWiped(encodePassword(password), (passwordBytes) => {
    try {
      return argon2id(passwordBytes, salt, {
        t: params.timeCost,
        m: params.memoryCost,
        p: params.parallelism,
        dkLen: KEY_LENGTH,
      });
    } catch (error) {
      throw new KeyDerivationError('Argon2id rejected the parameters', error);
    }
  });
}

/**
 * Generate a cryptographically secure random salt.
 *
 * @returns 16-byte random salt
 */
export function generateSalt(): Uint8Array {
  return randomBytes(SALT_LENGTH);
}

/** Build a fresh set of stored KDF params (new salt) from cost settings. */
export function createKdfParams(params: KdfParams = DEFAULT_KDF_PARAMS): StoredKdfParams {
  validateKdfParams(params);
  return {
    algorithm: 'argon2id',
    version: 19,
    salt: generateSalt(),
    timeCost: params.timeCost,
    memoryCost: params.memoryCost,
    parallelism: params.parallelism,
  };
}
