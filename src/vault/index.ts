/**
 * Encrypted TOTP vault.
 *
 * ```
 * Password
 *     ↓ (Argon2id, per-container salt and cost params)
 * Vault Key (32 bytes)
 *     ↓ (ChaCha20-Poly1305, fresh nonce per write)
 * Entry collection (name → secret, algorithm, digits, period, t0)
 * ```
 *
 * @example
 * ```typescript
 * import { createVault, unlockVault, addEntry, currentCode, rotatePassword } from './vault';
 *
 * const vault = createVault('accounts.otpvault', 'correct horse');
 * addEntry(vault, { name: 'github', secret: 'JBSWY3DPEHPK3PXP', encoded: true });
 * vault.lock();
 *
 * // Later
 * const unlocked = unlockVault('accounts.otpvault', 'correct horse');
 * const { code, secondsRemaining } = currentCode(unlocked, 'github');
 * rotatePassword(unlocked, 'correct horse', 'battery staple');
 * unlocked.lock();
 * ```
 */

export {
  VaultHandle,
  createVault,
  unlockVault,
  addEntry,
  removeEntry,
  listEntries,
  getEntry,
  currentCode,
  rotatePassword,
  lockVault,
  vaultExists,
} from './vault';

export {
  createSecretEntry,
  decodeBase32Secret,
  isDigestAlgorithm,
  MIN_DIGITS,
  MAX_DIGITS,
  DEFAULT_DIGITS,
  DEFAULT_PERIOD,
  DEFAULT_ALGORITHM,
} from './entry';

export { deriveKey, generateSalt, createKdfParams, validateKdfParams, SALT_LENGTH, KEY_LENGTH } from './key-derivation';

export { seal, open, generateNonce, NONCE_LENGTH, TAG_LENGTH } from './encryption';

export {
  encodeContainer,
  decodeContainer,
  encodePayload,
  decodePayload,
  sealEntries,
  openEntries,
  CONTAINER_VERSION,
} from './container';

export { resolveVaultOptions, type VaultOptions, type ResolvedVaultOptions } from './config';

export { VaultLogger, readVaultLog, filterLogByType, type VaultLogEvent, type VaultLogEntry } from './logger';

export { writeFileAtomic, nodeFileSystem, type VaultFileSystem } from './storage';

export {
  VaultError,
  InvalidEntryError,
  KeyDerivationError,
  IntegrityError,
  FormatError,
  WrongPasswordOrCorruptError,
  AlreadyExistsError,
  DuplicateNameError,
  NotFoundError,
  VaultLockedError,
  VaultIoError,
  isVaultError,
  type VaultErrorCode,
} from './errors';

export {
  type DigestAlgorithm,
  type KdfParams,
  type StoredKdfParams,
  type SecretEntry,
  type SecretEntryInput,
  type VaultContainer,
  type VaultEntries,
  DEFAULT_KDF_PARAMS,
  DIGEST_ALGORITHMS,
} from './types';
