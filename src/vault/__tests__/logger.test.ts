/**
 * Tests for logger.ts — structured vault audit logging.
 *
 * Covers: VaultLogger (constructor, log, enable/disable, getLogPath),
 * readVaultLog, filterLogByType
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { VaultLogger, readVaultLog, filterLogByType } from '../logger';

describe('VaultLogger', () => {
  let testDir: string;
  let logPath: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'otp-vault-log-'));
    logPath = path.join(testDir, 'logs', 'audit.jsonl');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should create the log directory', () => {
      const logger = new VaultLogger(logPath);
      expect(fs.existsSync(path.dirname(logPath))).toBe(true);
      expect(logger.getLogPath()).toBe(logPath);
      expect(logger.isEnabled()).toBe(true);
    });

    it('should be disabled without a log path', () => {
      const logger = new VaultLogger();
      expect(logger.isEnabled()).toBe(false);
      expect(logger.getLogPath()).toBeNull();
      logger.enable();
      expect(logger.isEnabled()).toBe(false);
    });
  });

  describe('log', () => {
    it('should write JSONL entries to file', () => {
      const logger = new VaultLogger(logPath);
      logger.log('/vaults/a.otpvault', { type: 'entry_removed', name: 'github' });
      logger.log('/vaults/a.otpvault', { type: 'vault_locked' });

      const lines = fs.readFileSync(logPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);

      const first = JSON.parse(lines[0]);
      expect(first.vaultPath).toBe('/vaults/a.otpvault');
      expect(first.event).toEqual({ type: 'entry_removed', name: 'github' });
      expect(Number.isNaN(Date.parse(first.timestamp))).toBe(false);
    });

    it('should write nothing while disabled', () => {
      const logger = new VaultLogger(logPath);
      logger.disable();
      logger.log('/vaults/a.otpvault', { type: 'vault_locked' });
      expect(fs.existsSync(logPath)).toBe(false);

      logger.enable();
      logger.log('/vaults/a.otpvault', { type: 'vault_locked' });
      expect(readVaultLog(logPath)).toHaveLength(1);
    });

    it('should report write failures without throwing', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = new VaultLogger(logPath);
      fs.mkdirSync(logPath); // a directory where the file should be

      expect(() => logger.log('/vaults/a.otpvault', { type: 'vault_locked' })).not.toThrow();
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(String(errorSpy.mock.calls[0][0])).toMatch(/^\[VaultLogger\] Failed to write log/);
    });

    it('should record warnings as events', () => {
      const logger = new VaultLogger(logPath);
      logger.warning('/v', 'temp file left behind', 'atomic-write');

      expect(readVaultLog(logPath).map((entry) => entry.event)).toEqual([
        { type: 'warning', message: 'temp file left behind', context: 'atomic-write' },
      ]);
    });

    it('should send warnings to stderr while disabled', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = new VaultLogger();
      logger.warning('/v', 'temp file left behind', 'atomic-write');

      expect(errorSpy).toHaveBeenCalledWith('[VaultLogger] /v: temp file left behind');
    });
  });

  describe('readVaultLog', () => {
    it('should return an empty list for a missing file', () => {
      expect(readVaultLog(path.join(testDir, 'none.jsonl'))).toEqual([]);
    });

    it('should skip unparsable lines', () => {
      fs.mkdirSync(path.dirname(logPath), { recursive: true });
      fs.writeFileSync(
        logPath,
        [
          '{"timestamp":"2024-01-01T00:00:00.000Z","vaultPath":"/v","event":{"type":"vault_locked"}}',
          'not json',
          '{"unexpected":"shape"}',
          '',
        ].join('\n')
      );

      expect(readVaultLog(logPath)).toEqual([
        { timestamp: '2024-01-01T00:00:00.000Z', vaultPath: '/v', event: { type: 'vault_locked' } },
      ]);
    });
  });

  describe('filterLogByType', () => {
    it('should keep only the requested event types', () => {
      const logger = new VaultLogger(logPath);
      logger.log('/v', { type: 'vault_unlocked', entryCount: 2 });
      logger.log('/v', { type: 'entry_removed', name: 'a' });
      logger.log('/v', { type: 'unlock_failed', code: 'WRONG_PASSWORD_OR_CORRUPT' });

      const filtered = filterLogByType(readVaultLog(logPath), ['unlock_failed', 'vault_unlocked']);
      expect(filtered.map((entry) => entry.event.type)).toEqual(['vault_unlocked', 'unlock_failed']);
    });
  });
});
