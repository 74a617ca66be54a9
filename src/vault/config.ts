/**
 * Vault options and their defaults.
 *
 * Nothing is read from the environment; callers pass options explicitly.
 */

import { validateKdfParams } from './key-derivation';
import { VaultLogger } from './logger';
import { type VaultFileSystem, nodeFileSystem } from './storage';
import { type KdfParams, DEFAULT_KDF_PARAMS } from './types';

export interface VaultOptions {
  /** Argon2id cost overrides for new containers and password rotation */
  kdf?: Partial<KdfParams>;
  /** Enables the JSONL audit log at this path */
  logPath?: string;
  /** Injected logger; takes precedence over logPath */
  logger?: VaultLogger;
  /** File operations used for persistence (default: node:fs) */
  fileSystem?: VaultFileSystem;
  /** Clock used when no instant is passed to code generation */
  clock?: () => Date;
}

export interface ResolvedVaultOptions {
  kdf: KdfParams;
  logger: VaultLogger;
  fileSystem: VaultFileSystem;
  clock: () => Date;
}

/**
 * Merge options with defaults.
 *
 * @throws KeyDerivationError if the merged KDF params are out of range
 */
export function resolveVaultOptions(options: VaultOptions = {}): ResolvedVaultOptions {
  const kdf: KdfParams = { ...DEFAULT_KDF_PARAMS, ...options.kdf };
  validateKdfParams(kdf);

  return {
    kdf,
    logger: options.logger ?? new VaultLogger(options.logPath),
    fileSystem: options.fileSystem ?? nodeFileSystem,
    clock: options.clock ?? (() => new Date()),
  };
}
