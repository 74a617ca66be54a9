import { timingSafeEqual } from 'node:crypto';
import { bytesToHex } from '@noble/hashes/utils.js';
import { generateTotp, type OtpCode } from '../otp/totp';
import { type ResolvedVaultOptions, type VaultOptions, resolveVaultOptions } from './config';
import { decodeContainer, encodeContainer, openEntries, sealEntries } from './container';
import { copyEntry, createSecretEntry } from './entry';
import {
  AlreadyExistsError,
  DuplicateNameError,
  IntegrityError,
  NotFoundError,
  VaultLockedError,
  WrongPasswordOrCorruptError,
  isVaultError,
} from './errors';
import { createKdfParams, deriveKey } from './key-derivation';
import { wipe } from './sensitive';
import { type VaultFileSystem, nodeFileSystem, readVaultFile, writeFileAtomic } from './storage';
import type { SecretEntry, SecretEntryInput, StoredKdfParams, VaultEntries } from './types';

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * An unlocked vault.
 *
 * Holds the derived key and decrypted entries until {@link lock} is called.
 * Every mutation re-encrypts the whole entry set under a fresh nonce and
 * atomically replaces the file before the in-memory state changes.
 */
export class VaultHandle {
  private key: Uint8Array | null;
  private kdf: StoredKdfParams;
  private entries: VaultEntries;
  private revisionCount = 0;
  private readonly nonces: string[] = [];

  private constructor(
    readonly path: string,
    key: Uint8Array,
    kdf: StoredKdfParams,
    entries: VaultEntries,
    private readonly options: ResolvedVaultOptions
  ) {
    this.key = key;
    this.kdf = kdf;
    this.entries = entries;
  }

  /**
   * Create a new, empty vault at `path` and return it unlocked.
   *
   * @throws AlreadyExistsError if `path` exists
   * @throws VaultIoError if the file cannot be written
   */
  static create(path: string, password: string, options: VaultOptions = {}): VaultHandle {
    const resolved = resolveVaultOptions(options);
    if (resolved.fileSystem.existsSync(path)) {
      throw new AlreadyExistsError(path);
    }

    const kdf = createKdfParams(resolved.kdf);
    const key = deriveKey(password, kdf.salt, kdf);
    const handle = new VaultHandle(path, key, kdf, new Map(), resolved);
    try {
      handle.commit(handle.entries, key, kdf);
    } catch (error) {
      handle.lock();
      throw error;
    }

    resolved.logger.log(path, {
      type: 'vault_created',
      timeCost: kdf.timeCost,
      memoryCost: kdf.memoryCost,
      parallelism: kdf.parallelism,
    });
    return handle;
  }

  /**
   * Read, verify and decrypt the vault at `path`.
   *
   * A wrong password and a tampered file fail identically.
   *
   * @throws WrongPasswordOrCorruptError if the tag does not verify
   * @throws FormatError if the file is not a readable container
   * @throws VaultIoError if the file cannot be read
   */
  static unlock(path: string, password: string, options: VaultOptions = {}): VaultHandle {
    const resolved = resolveVaultOptions(options);

    try {
      const container = decodeContainer(readVaultFile(resolved.fileSystem, path));
      const key = deriveKey(password, container.kdf.salt, container.kdf);

      let entries: VaultEntries;
      try {
        entries = openEntries(container, key);
      } catch (error) {
        wipe(key);
        if (error instanceof IntegrityError) {
          throw new WrongPasswordOrCorruptError();
        }
        throw error;
      }

      resolved.logger.log(path, { type: 'vault_unlocked', entryCount: entries.size });
      return new VaultHandle(path, key, container.kdf, entries, resolved);
    } catch (error) {
      resolved.logger.log(path, { type: 'unlock_failed', code: isVaultError(error) ? error.code : 'UNKNOWN' });
      throw error;
    }
  }

  get isLocked(): boolean {
    return this.key === null;
  }

  /** Number of writes committed through this handle */
  get revision(): number {
    return this.revisionCount;
  }

  /** Hex nonces of every write committed through this handle, oldest first */
  get writtenNonces(): readonly string[] {
    return [...this.nonces];
  }

  private requireKey(): Uint8Array {
    if (this.key === null) {
      throw new VaultLockedError();
    }
    return this.key;
  }

  private requireEntry(name: string): SecretEntry {
    this.requireKey();
    const entry = this.entries.get(name);
    if (!entry) {
      throw new NotFoundError(name);
    }
    return entry;
  }

  /** Seal `entries` and atomically replace the file. In-memory state is not touched. */
  private commit(entries: VaultEntries, key: Uint8Array, kdf: StoredKdfParams): void {
    const container = sealEntries(entries.values(), key, kdf);
    const bytes = encodeContainer(container);

    try {
      writeFileAtomic(this.options.fileSystem, this.path, bytes, this.options.logger);
    } catch (error) {
      this.options.logger.log(this.path, {
        type: 'write_failed',
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    this.revisionCount += 1;
    this.nonces.push(bytesToHex(container.nonce));
    this.options.logger.log(this.path, { type: 'write_committed', revision: this.revisionCount, bytes: bytes.length });
  }

  /**
   * Add an entry and persist.
   *
   * @throws InvalidEntryError before any crypto work if the input is invalid
   * @throws DuplicateNameError if the name is taken; nothing is written
   */
  add(input: SecretEntryInput): void {
    const key = this.requireKey();
    const entry = createSecretEntry(input);
    if (this.entries.has(entry.name)) {
      wipe(entry.secret);
      throw new DuplicateNameError(entry.name);
    }

    const next: VaultEntries = new Map(this.entries);
    next.set(entry.name, entry);
    try {
      this.commit(next, key, this.kdf);
    } catch (error) {
      wipe(entry.secret);
      throw error;
    }
    this.entries = next;

    this.options.logger.log(this.path, {
      type: 'entry_added',
      name: entry.name,
      algorithm: entry.algorithm,
      digits: entry.digits,
      period: entry.period,
    });
  }

  /**
   * Remove an entry and persist.
   *
   * @throws NotFoundError if absent; nothing is written
   */
  remove(name: string): void {
    const key = this.requireKey();
    const entry = this.requireEntry(name);

    const next: VaultEntries = new Map(this.entries);
    next.delete(name);
    this.commit(next, key, this.kdf);
    this.entries = next;
    wipe(entry.secret);

    this.options.logger.log(this.path, { type: 'entry_removed', name });
  }

  /** Entry names in lexicographic order. */
  list(): string[] {
    this.requireKey();
    return [...this.entries.keys()].sort(compareNames);
  }

  /** Copy of an entry's parameters and secret. */
  get(name: string): SecretEntry {
    return copyEntry(this.requireEntry(name));
  }

  /**
   * Current code for an entry.
   *
   * @param now - instant to compute for (defaults to the configured clock)
   */
  code(name: string, now?: Date | number): OtpCode {
    const entry = this.requireEntry(name);
    const result = generateTotp(entry, now ?? this.options.clock());
    this.options.logger.log(this.path, { type: 'code_generated', name });
    return result;
  }

  /**
   * Re-key the vault under a new password with a brand-new salt.
   *
   * The old file stays intact until the new one is fully written and renamed
   * into place; on any failure the handle keeps its old key.
   *
   * @throws WrongPasswordOrCorruptError if `oldPassword` does not match
   */
  rotatePassword(oldPassword: string, newPassword: string): void {
    const key = this.requireKey();

    const check = deriveKey(oldPassword, this.kdf.salt, this.kdf);
    const matches = timingSafeEqual(check, key);
    wipe(check);
    if (!matches) {
      throw new WrongPasswordOrCorruptError();
    }

    const kdf = createKdfParams(this.options.kdf);
    const newKey = deriveKey(newPassword, kdf.salt, kdf);
    try {
      this.commit(this.entries, newKey, kdf);
    } catch (error) {
      wipe(newKey);
      throw error;
    }

    wipe(key);
    this.key = newKey;
    this.kdf = kdf;

    this.options.logger.log(this.path, {
      type: 'password_rotated',
      timeCost: kdf.timeCost,
      memoryCost: kdf.memoryCost,
      parallelism: kdf.parallelism,
    });
  }

  /** Wipe the key and all secrets. Safe to call more than once. */
  lock(): void {
    if (this.key === null) return;

    wipe(this.key);
    this.key = null;
    for (const entry of this.entries.values()) {
      wipe(entry.secret);
    }
    this.entries = new Map();
    this.options.logger.log(this.path, { type: 'vault_locked' });
  }
}

export function vaultExists(path: string, fileSystem: VaultFileSystem = nodeFileSystem): boolean {
  return fileSystem.existsSync(path);
}

export function createVault(path: string, password: string, options?: VaultOptions): VaultHandle {
  return VaultHandle.create(path, password, options);
}

export function unlockVault(path: string, password: string, options?: VaultOptions): VaultHandle {
  return VaultHandle.unlock(path, password, options);
}

export function addEntry(handle: VaultHandle, input: SecretEntryInput): void {
  handle.add(input);
}

export function removeEntry(handle: VaultHandle, name: string): void {
  handle.remove(name);
}

export function listEntries(handle: VaultHandle): string[] {
  return handle.list();
}

export function getEntry(handle: VaultHandle, name: string): SecretEntry {
  return handle.get(name);
}

export function currentCode(handle: VaultHandle, name: string, now?: Date | number): OtpCode {
  return handle.code(name, now);
}

export function rotatePassword(handle: VaultHandle, oldPassword: string, newPassword: string): void {
  handle.rotatePassword(oldPassword, newPassword);
}

export function lockVault(handle: VaultHandle): void {
  handle.lock();
}
