/**
 * Vault file persistence.
 *
 * Writes go to a sibling temp file which is fsynced and then renamed over the
 * target, so a reader sees either the old container or the new one, never a
 * partial write. There is no inter-process locking: concurrent writers race
 * and the last rename wins.
 */

import * as fs from 'node:fs';
import { bytesToHex, randomBytes } from '@noble/hashes/utils.js';
import { VaultIoError } from './errors';
import { VaultLogger } from './logger';

/** Synchronous file operations used for persistence (injectable for tests). */
export type VaultFileSystem = Pick<
  typeof fs,
  'existsSync' | 'readFileSync' | 'openSync' | 'writeSync' | 'fsyncSync' | 'closeSync' | 'renameSync' | 'rmSync'
>;

export const nodeFileSystem: VaultFileSystem = fs;

/** Temp file permissions: owner read/write only */
const FILE_MODE = 0o600;

/** Sibling temp path for an atomic write. */
export function tempPathFor(path: string): string {
  return `${path}.${bytesToHex(randomBytes(6))}.tmp`;
}

export function readVaultFile(fileSystem: VaultFileSystem, path: string): Uint8Array {
  try {
    return new Uint8Array(fileSystem.readFileSync(path));
  } catch (error) {
    throw new VaultIoError(path, error);
  }
}

const WARNING_CONTEXT = 'atomic-write';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function removeTemp(fileSystem: VaultFileSystem, path: string, tempPath: string, logger: VaultLogger): void {
  try {
    fileSystem.rmSync(tempPath, { force: true });
  } catch (cleanupError) {
    logger.warning(path, `Failed to remove temp file ${tempPath}: ${errorMessage(cleanupError)}`, WARNING_CONTEXT);
  }
}

/**
 * Write `data` to `path` via temp file + fsync + rename.
 *
 * On failure the target is untouched, the temp file is removed where possible
 * and the original error is rethrown as a VaultIoError. Cleanup problems are
 * reported to `logger` as warnings.
 */
export function writeFileAtomic(
  fileSystem: VaultFileSystem,
  path: string,
  data: Uint8Array,
  logger: VaultLogger = new VaultLogger()
): void {
  const tempPath = tempPathFor(path);
  let fd: number | undefined;

  try {
    fd = fileSystem.openSync(tempPath, 'wx', FILE_MODE);
    let offset = 0;
    while (offset < data.length) {
      offset += fileSystem.writeSync(fd, data, offset, data.length - offset);
    }
    fileSystem.fsyncSync(fd);
    fileSystem.closeSync(fd);
    fd = undefined;
    fileSystem.renameSync(tempPath, path);
  } catch (error) {
    if (fd !== undefined) {
      try {
        fileSystem.closeSync(fd);
      } catch (closeError) {
        logger.warning(path, `Failed to close ${tempPath}: ${errorMessage(closeError)}`, WARNING_CONTEXT);
      }
    }
    removeTemp(fileSystem, path, tempPath, logger);
    throw new VaultIoError(path, error);
  }
}
