/**
 * Key material and secrets are zeroed on every exit path.
 *
 * `wipe` and `argon2id` are wrapped in spies so the buffers they receive can
 * be inspected after the vault has let go of them.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { argon2id } from '@noble/hashes/argon2.js';
import { wipe } from '../sensitive';
import { deriveKey, generateSalt } from '../key-derivation';
import { KeyDerivationError, VaultIoError, WrongPasswordOrCorruptError } from '../errors';
import { addEntry, createVault, rotatePassword, unlockVault } from '../vault';
import type { VaultFileSystem } from '../storage';
import type { KdfParams } from '../types';

vi.mock('../sensitive', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../sensitive')>();
  return { ...actual, wipe: vi.fn(actual.wipe) };
});

vi.mock('@noble/hashes/argon2.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@noble/hashes/argon2.js')>();
  return { ...actual, argon2id: vi.fn(actual.argon2id) };
});

const FAST_TEST_PARAMS: KdfParams = { timeCost: 1, memoryCost: 1024, parallelism: 1 };
const PASSWORD = 'test-password';

function isZeroed(buffer: Uint8Array): boolean {
  return buffer.every((byte) => byte === 0);
}

function wipedBuffers(): Uint8Array[] {
  return vi
    .mocked(wipe)
    .mock.calls.flat()
    .filter((buffer): buffer is Uint8Array => buffer instanceof Uint8Array);
}

function passwordArgument(call: number): Uint8Array {
  const [password] = vi.mocked(argon2id).mock.calls[call];
  if (!(password instanceof Uint8Array)) throw new Error('expected password bytes');
  return password;
}

describe('Zeroization', () => {
  let testDir: string;
  let vaultPath: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'otp-vault-wipe-'));
    vaultPath = path.join(testDir, 'accounts.otpvault');
    vi.mocked(wipe).mockClear();
    vi.mocked(argon2id).mockClear();
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('deriveKey', () => {
    it('wipes the password bytes after a successful derivation', () => {
      const key = deriveKey(PASSWORD, generateSalt(), FAST_TEST_PARAMS);

      expect(key.length).toBe(32);
      expect(passwordArgument(0)).toEqual(new Uint8Array(PASSWORD.length));
    });

    it('wipes the password bytes when Argon2 throws', () => {
      vi.mocked(argon2id).mockImplementationOnce(() => {
        throw new Error('out of memory');
      });

      expect(() => deriveKey(PASSWORD, generateSalt(), FAST_TEST_PARAMS)).toThrow(KeyDerivationError);
      expect(passwordArgument(0)).toEqual(new Uint8Array(PASSWORD.length));
    });
  });

  describe('VaultHandle', () => {
    it('zeroes the key and every secret it held on lock', () => {
      const handle = createVault(vaultPath, PASSWORD, { kdf: FAST_TEST_PARAMS });
      addEntry(handle, { name: 'rfc', secret: '12345678901234567890' });
      addEntry(handle, { name: 'github', secret: 'JBSWY3DPEHPK3PXP', encoded: true });
      addEntry(handle, { name: 'bank', secret: new Uint8Array([9, 8, 7, 6, 5]) });
      vi.mocked(wipe).mockClear();

      handle.lock();

      const buffers = wipedBuffers();
      expect(buffers.map((buffer) => buffer.length).sort((a, b) => a - b)).toEqual([5, 10, 20, 32]);
      expect(buffers.every(isZeroed)).toBe(true);
    });

    it('zeroes the rejected key on a wrong password', () => {
      createVault(vaultPath, PASSWORD, { kdf: FAST_TEST_PARAMS }).lock();
      vi.mocked(wipe).mockClear();

      expect(() => unlockVault(vaultPath, 'wrong-password')).toThrow(WrongPasswordOrCorruptError);

      const buffers = wipedBuffers();
      expect(buffers.some((buffer) => buffer.length === 32)).toBe(true);
      expect(buffers.every(isZeroed)).toBe(true);
    });

    it('zeroes the new key when a rotation cannot be written', () => {
      createVault(vaultPath, PASSWORD, { kdf: FAST_TEST_PARAMS }).lock();
      const failing: VaultFileSystem = {
        ...fs,
        renameSync: () => {
          throw Object.assign(new Error('disk full'), { code: 'ENOSPC' });
        },
      };
      const handle = unlockVault(vaultPath, PASSWORD, { kdf: FAST_TEST_PARAMS, fileSystem: failing });
      vi.mocked(wipe).mockClear();

      expect(() => rotatePassword(handle, PASSWORD, 'new-test-password')).toThrow(VaultIoError);

      // the old-password check key and the unused new key
      const keys = wipedBuffers().filter((buffer) => buffer.length === 32);
      expect(keys).toHaveLength(2);
      expect(keys.every(isZeroed)).toBe(true);
      expect(handle.isLocked).toBe(false);
    });
  });
});
