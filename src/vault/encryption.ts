/**
 * ChaCha20-Poly1305 authenticated encryption for the vault payload.
 *
 * One call gives confidentiality and tamper detection. The 16-byte Poly1305
 * tag is appended to the ciphertext; tag comparison is constant-time.
 */

import { createCipheriv, createDecipheriv } from 'node:crypto';
import { randomBytes } from '@noble/hashes/utils.js';
import { IntegrityError } from './errors';
import { KEY_LENGTH } from './key-derivation';
import { wipe } from './sensitive';

const CIPHER = 'chacha20-poly1305';

/** Nonce length for ChaCha20-Poly1305 (96 bits) */
export const NONCE_LENGTH = 12;

/** Poly1305 tag length */
export const TAG_LENGTH = 16;

export interface SealedPayload {
  nonce: Uint8Array;
  /** Ciphertext with the tag appended */
  ciphertext: Uint8Array;
}

/**
 * Generate a fresh random nonce. Every seal gets its own.
 */
export function generateNonce(): Uint8Array {
  return randomBytes(NONCE_LENGTH);
}

function assertLengths(key: Uint8Array, nonce: Uint8Array): void {
  if (key.length !== KEY_LENGTH) {
    throw new RangeError(`key must be ${KEY_LENGTH} bytes, got ${key.length}`);
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new RangeError(`nonce must be ${NONCE_LENGTH} bytes, got ${nonce.length}`);
  }
}

/**
 * Encrypt and authenticate `plaintext` under `key` and `nonce`.
 */
export function seal(
  key: Uint8Array,
  nonce: Uint8Array,
  plaintext: Uint8Array,
  associatedData?: Uint8Array
): Uint8Array {
  assertLengths(key, nonce);
  const cipher = createCipheriv(CIPHER, key, nonce, { authTagLength: TAG_LENGTH });
  if (associatedData) {
    cipher.setAAD(associatedData, { plaintextLength: plaintext.length });
  }

  const body = cipher.update(plaintext);
  const tail = cipher.final();
  const sealed = new Uint8Array(body.length + tail.length + TAG_LENGTH);
  sealed.set(body, 0);
  sealed.set(tail, body.length);
  sealed.set(cipher.getAuthTag(), body.length + tail.length);
  return sealed;
}

/**
 * Verify and decrypt output of {@link seal}.
 *
 * @throws IntegrityError when the tag does not verify (wrong key, tampered bytes, or wrong associated data)
 */
export function open(
  key: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
  associatedData?: Uint8Array
): Uint8Array {
  assertLengths(key, nonce);
  if (ciphertext.length < TAG_LENGTH) {
    throw new IntegrityError();
  }

  const bodyLength = ciphertext.length - TAG_LENGTH;
  const decipher = createDecipheriv(CIPHER, key, nonce, { authTagLength: TAG_LENGTH });
  decipher.setAuthTag(ciphertext.subarray(bodyLength));
  if (associatedData) {
    decipher.setAAD(associatedData, { plaintextLength: bodyLength });
  }

  const body = decipher.update(ciphertext.subarray(0, bodyLength));
  let tail: Uint8Array;
  try {
    tail = decipher.final();
  } catch (error) {
    // unauthenticated output never leaves this function
    wipe(body);
    throw new IntegrityError(error);
  }

  const plaintext = new Uint8Array(body.length + tail.length);
  plaintext.set(body, 0);
  plaintext.set(tail, body.length);
  wipe(body, tail);
  return plaintext;
}

/** Seal under a freshly generated nonce. */
export function sealWithFreshNonce(
  key: Uint8Array,
  plaintext: Uint8Array,
  associatedData?: Uint8Array
): SealedPayload {
  const nonce = generateNonce();
  return { nonce, ciphertext: seal(key, nonce, plaintext, associatedData) };
}
