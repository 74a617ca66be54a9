/**
 * Vault Logger - structured audit log for vault operations.
 *
 * Writes JSONL entries to a caller-chosen file. Entries name the vault path
 * and entry names only; passwords, secrets, keys and codes are never logged.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Log event types for vault operations.
 */
export type VaultLogEvent =
  | { type: 'vault_created'; timeCost: number; memoryCost: number; parallelism: number }
  | { type: 'vault_unlocked'; entryCount: number }
  | { type: 'unlock_failed'; code: string }
  | { type: 'entry_added'; name: string; algorithm: string; digits: number; period: number }
  | { type: 'entry_removed'; name: string }
  | { type: 'code_generated'; name: string }
  | { type: 'password_rotated'; timeCost: number; memoryCost: number; parallelism: number }
  | { type: 'write_committed'; revision: number; bytes: number }
  | { type: 'write_failed'; error: string }
  | { type: 'vault_locked' }
  | { type: 'warning'; message: string; context?: string };

/**
 * Full log entry with metadata.
 */
export interface VaultLogEntry {
  timestamp: string;
  vaultPath: string;
  event: VaultLogEvent;
}

/**
 * Audit logger. Disabled unless constructed with a log path.
 */
export class VaultLogger {
  private logPath: string | null;
  private enabled: boolean;

  constructor(logPath?: string) {
    this.logPath = logPath ?? null;
    this.enabled = this.logPath !== null;

    if (this.logPath) {
      const dir = dirname(this.logPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /**
   * Logs an event for a vault.
   */
  log(vaultPath: string, event: VaultLogEvent): void {
    if (!this.enabled || !this.logPath) return;

    const entry: VaultLogEntry = {
      timestamp: new Date().toISOString(),
      vaultPath,
      event,
    };

    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n', { mode: 0o600 });
    } catch (error) {
      console.error(`[VaultLogger] Failed to write log: ${error}`);
    }
  }

  /**
   * Logs a non-fatal problem. Goes to stderr while the log is disabled so it is never lost.
   */
  warning(vaultPath: string, message: string, context?: string): void {
    if (!this.enabled) {
      console.error(`[VaultLogger] ${vaultPath}: ${message}`);
      return;
    }
    this.log(vaultPath, { type: 'warning', message, context });
  }

  /**
   * Gets the path to the log file, if any.
   */
  getLogPath(): string | null {
    return this.logPath;
  }

  /**
   * Disables logging.
   */
  disable(): void {
    this.enabled = false;
  }

  /**
   * Enables logging. No-op without a log path.
   */
  enable(): void {
    this.enabled = this.logPath !== null;
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}

function isLogEntry(value: unknown): value is VaultLogEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    typeof value.timestamp === 'string' &&
    'vaultPath' in value &&
    typeof value.vaultPath === 'string' &&
    'event' in value &&
    typeof value.event === 'object' &&
    value.event !== null &&
    'type' in value.event &&
    typeof value.event.type === 'string'
  );
}

function parseLine(line: string): VaultLogEntry | null {
  try {
    const value: unknown = JSON.parse(line);
    return isLogEntry(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Reads all log entries from a log file. Unparsable lines are skipped.
 */
export function readVaultLog(logPath: string): VaultLogEntry[] {
  if (!existsSync(logPath)) {
    return [];
  }

  const content = readFileSync(logPath, 'utf-8');
  const lines = content.trim().split('\n').filter(line => line.length > 0);

  return lines.map(parseLine).filter((entry): entry is VaultLogEntry => entry !== null);
}

/**
 * Filters log entries by event type.
 */
export function filterLogByType(entries: VaultLogEntry[], types: VaultLogEvent['type'][]): VaultLogEntry[] {
  return entries.filter(entry => types.includes(entry.event.type));
}
