/**
 * Vault key derivation, container and entry types.
 *
 * Key flow:
 *   Password
 *       ↓ (Argon2id, params persisted in the container)
 *   Vault Key (32 bytes)
 *       ↓ (ChaCha20-Poly1305, fresh nonce per write)
 *   Serialized entry collection
 */

/** HMAC digest used for code generation */
export type DigestAlgorithm = 'SHA1' | 'SHA256' | 'SHA512';

export const DIGEST_ALGORITHMS: readonly DigestAlgorithm[] = ['SHA1', 'SHA256', 'SHA512'];

/** Argon2id parameters for key derivation */
export interface KdfParams {
  /** Time cost / iterations (default: 3) */
  timeCost: number;
  /** Memory cost in KiB (default: 65536 = 64MB) */
  memoryCost: number;
  /** Parallelism degree (default: 4) */
  parallelism: number;
}

/** Default Argon2id parameters for new containers (OWASP: 64MB, 3 iterations, 4 lanes) */
export const DEFAULT_KDF_PARAMS: KdfParams = {
  timeCost: 3,
  memoryCost: 65536, // 64 MB
  parallelism: 4,
};

/** KDF parameters as persisted in a container, including the per-container salt */
export interface StoredKdfParams extends KdfParams {
  algorithm: 'argon2id';
  /** Argon2 version number (0x13) */
  version: 19;
  /** Random salt, regenerated on every password change */
  salt: Uint8Array;
}

/** One account's OTP parameters */
export interface SecretEntry {
  readonly name: string;
  readonly secret: Uint8Array;
  readonly algorithm: DigestAlgorithm;
  readonly digits: number;
  /** Time step in seconds */
  readonly period: number;
  /** Unix time (seconds) at which counting starts */
  readonly t0: number;
}

/** Caller-facing input for a new entry */
export interface SecretEntryInput {
  name: string;
  /** Base32 text when `encoded` is true, otherwise raw bytes (strings are taken as UTF-8) */
  secret: string | Uint8Array;
  encoded?: boolean;
  algorithm?: DigestAlgorithm;
  digits?: number;
  period?: number;
  t0?: number;
}

/** Decrypted entry collection keyed by name */
export type VaultEntries = Map<string, SecretEntry>;

/** Encrypted container as held between decode and unlock */
export interface VaultContainer {
  version: 1;
  kdf: StoredKdfParams;
  /** 12-byte ChaCha20-Poly1305 nonce */
  nonce: Uint8Array;
  /** AEAD output, 16-byte tag appended */
  ciphertext: Uint8Array;
}

