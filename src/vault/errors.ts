/**
 * Error taxonomy for the vault.
 *
 * Every failure surfaces as a VaultError subclass with a stable `code`.
 * WrongPasswordOrCorruptError deliberately carries the same message whether
 * the password was wrong or the file was tampered with.
 */

export type VaultErrorCode =
  | 'INVALID_ENTRY'
  | 'KEY_DERIVATION'
  | 'INTEGRITY'
  | 'FORMAT'
  | 'WRONG_PASSWORD_OR_CORRUPT'
  | 'ALREADY_EXISTS'
  | 'DUPLICATE_NAME'
  | 'NOT_FOUND'
  | 'VAULT_LOCKED'
  | 'IO';

export class VaultError extends Error {
  constructor(message: string, public readonly code: VaultErrorCode, public readonly cause?: unknown) {
    super(message);
    this.name = 'VaultError';
  }
}

export class InvalidEntryError extends VaultError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_ENTRY', cause);
    this.name = 'InvalidEntryError';
  }
}

export class KeyDerivationError extends VaultError {
  constructor(message: string, cause?: unknown) {
    super(message, 'KEY_DERIVATION', cause);
    this.name = 'KeyDerivationError';
  }
}

export class IntegrityError extends VaultError {
  constructor(cause?: unknown) {
    super('Authentication tag mismatch', 'INTEGRITY', cause);
    this.name = 'IntegrityError';
  }
}

export class FormatError extends VaultError {
  constructor(message: string, cause?: unknown) {
    super(message, 'FORMAT', cause);
    this.name = 'FormatError';
  }
}

export class WrongPasswordOrCorruptError extends VaultError {
  constructor() {
    super('Could not open vault: wrong password or corrupted file', 'WRONG_PASSWORD_OR_CORRUPT');
    this.name = 'WrongPasswordOrCorruptError';
  }
}

export class AlreadyExistsError extends VaultError {
  constructor(public readonly path: string) {
    super(`Vault already exists: ${path}`, 'ALREADY_EXISTS');
    this.name = 'AlreadyExistsError';
  }
}

export class DuplicateNameError extends VaultError {
  constructor(public readonly entryName: string) {
    super(`Entry already exists: ${entryName}`, 'DUPLICATE_NAME');
    this.name = 'DuplicateNameError';
  }
}

export class NotFoundError extends VaultError {
  constructor(public readonly entryName: string) {
    super(`Entry not found: ${entryName}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class VaultLockedError extends VaultError {
  constructor() {
    super('Vault is locked', 'VAULT_LOCKED');
    this.name = 'VaultLockedError';
  }
}

export class VaultIoError extends VaultError {
  /** errno code reported by the file system, e.g. ENOENT */
  public readonly errno?: string;

  constructor(public readonly path: string, cause: unknown) {
    const errno = errnoOf(cause);
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`I/O failure on ${path}: ${detail}`, 'IO', cause);
    this.name = 'VaultIoError';
    this.errno = errno;
  }
}

export function isVaultError(err: unknown): err is VaultError {
  return err instanceof VaultError;
}

function errnoOf(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
