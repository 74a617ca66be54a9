import { describe, it, expect } from 'vitest';
import {
  deriveKey,
  generateSalt,
  createKdfParams,
  validateKdfParams,
  KEY_LENGTH,
  SALT_LENGTH,
} from '../key-derivation';
import { KeyDerivationError } from '../errors';
import { DEFAULT_KDF_PARAMS, type KdfParams } from '../types';

/**
 * Fast Argon2 parameters for testing.
 * Production params are too slow for unit tests.
 */
const FAST_TEST_PARAMS: KdfParams = {
  timeCost: 1,
  memoryCost: 1024, // 1 MB (vs 64 MB in production)
  parallelism: 1,
};

describe('Key Derivation', () => {
  describe('generateSalt', () => {
    it('should generate a 16-byte salt', () => {
      const salt = generateSalt();
      expect(salt).toBeInstanceOf(Uint8Array);
      expect(salt.length).toBe(SALT_LENGTH);
    });

    it('should generate unique salts', () => {
      expect(generateSalt()).not.toEqual(generateSalt());
    });
  });

  describe('deriveKey', () => {
    it('should derive a 32-byte key', () => {
      const key = deriveKey('test-password', generateSalt(), FAST_TEST_PARAMS);
      expect(key).toBeInstanceOf(Uint8Array);
      expect(key.length).toBe(KEY_LENGTH);
    });

    it('should be deterministic for the same password, salt and params', () => {
      const salt = generateSalt();
      const key1 = deriveKey('test-password', salt, FAST_TEST_PARAMS);
      const key2 = deriveKey('test-password', salt, FAST_TEST_PARAMS);
      expect(key1).toEqual(key2);
    });

    it('should derive different keys for different passwords', () => {
      const salt = generateSalt();
      expect(deriveKey('password1', salt, FAST_TEST_PARAMS)).not.toEqual(
        deriveKey('password2', salt, FAST_TEST_PARAMS)
      );
    });

    it('should derive different keys for different salts', () => {
      expect(deriveKey('test-password', generateSalt(), FAST_TEST_PARAMS)).not.toEqual(
        deriveKey('test-password', generateSalt(), FAST_TEST_PARAMS)
      );
    });

    it('should derive different keys for different cost params', () => {
      const salt = generateSalt();
      expect(deriveKey('test-password', salt, FAST_TEST_PARAMS)).not.toEqual(
        deriveKey('test-password', salt, { ...FAST_TEST_PARAMS, timeCost: 2 })
      );
    });

    it('should accept any password content, including the empty string', () => {
      expect(deriveKey('', generateSalt(), FAST_TEST_PARAMS).length).toBe(KEY_LENGTH);
      expect(deriveKey('pässwörd 🔐', generateSalt(), FAST_TEST_PARAMS).length).toBe(KEY_LENGTH);
    });

    it('should reject a salt shorter than 8 bytes', () => {
      expect(() => deriveKey('test-password', new Uint8Array(7), FAST_TEST_PARAMS)).toThrow(KeyDerivationError);
    });

    it('should use OWASP-recommended parameters by default', () => {
      expect(DEFAULT_KDF_PARAMS).toEqual({ timeCost: 3, memoryCost: 65536, parallelism: 4 });
    });
  });

  describe('validateKdfParams', () => {
    it('accepts the minimums', () => {
      expect(() => validateKdfParams({ timeCost: 1, memoryCost: 8, parallelism: 1 })).not.toThrow();
    });

    it.each<[string, KdfParams]>([
      ['zero time cost', { timeCost: 0, memoryCost: 1024, parallelism: 1 }],
      ['fractional time cost', { timeCost: 1.5, memoryCost: 1024, parallelism: 1 }],
      ['time cost above the cap', { timeCost: 2 ** 32, memoryCost: 1024, parallelism: 1 }],
      ['parallelism above the cap', { timeCost: 1, memoryCost: 2 ** 21, parallelism: 2 ** 24 }],
      ['zero parallelism', { timeCost: 1, memoryCost: 1024, parallelism: 0 }],
      ['memory below 8 * parallelism', { timeCost: 1, memoryCost: 31, parallelism: 4 }],
      ['memory above the cap', { timeCost: 1, memoryCost: 4 * 1024 * 1024, parallelism: 1 }],
    ])('rejects %s', (_label, params) => {
      expect(() => validateKdfParams(params)).toThrow(KeyDerivationError);
      expect(() => deriveKey('test-password', generateSalt(), params)).toThrow(KeyDerivationError);
    });
  });

  describe('createKdfParams', () => {
    it('copies cost params and generates a fresh salt each time', () => {
      const first = createKdfParams(FAST_TEST_PARAMS);
      const second = createKdfParams(FAST_TEST_PARAMS);

      expect(first).toMatchObject({ algorithm: 'argon2id', version: 19, ...FAST_TEST_PARAMS });
      expect(first.salt.length).toBe(SALT_LENGTH);
      expect(first.salt).not.toEqual(second.salt);
    });
  });
});
