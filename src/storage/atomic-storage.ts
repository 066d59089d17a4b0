/**
 * Atomic Storage Module
 *
 * Crash-safe JSON files for the world state snapshot. Writes go to a temp
 * file, are fsynced, the previous file is kept as a backup, and the temp
 * file is renamed over the target. Readers verify a checksum and fall back
 * to the backup when the main file is missing or corrupt.
 */

import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { errorMessage } from '../errors';
import { logger } from '../logging/structured-logger';

/**
 * File wrapper with checksum for corruption detection
 */
export interface ChecksummedFile<T> {
  version: number;
  checksum: string;       // SHA-256 of JSON.stringify(data)
  data: T;
  writtenAt: number;
}

export type ReadResult<T> =
  | { success: true; data: T; recoveredFromBackup?: boolean }
  | { success: false; error: string };

function isChecksummedFile(value: unknown): value is ChecksummedFile<unknown> {
  if (typeof value !== 'object' || value === null) return false;
  return 'version' in value && 'checksum' in value && 'data' in value &&
    typeof value.checksum === 'string';
}

export class AtomicStorage {
  private static readonly CURRENT_VERSION = 1;
  private static readonly TEMP_SUFFIX = '.tmp';
  private static readonly BACKUP_SUFFIX = '.bak';

  /**
   * Serialize with checksum, write to temp, fsync, back up the current file,
   * then rename temp over the target. A crash at any step leaves either the
   * old or the new file intact.
   */
  static writeFileAtomic<T>(filePath: string, data: T): void {
    const tempPath = filePath + this.TEMP_SUFFIX;
    const backupPath = filePath + this.BACKUP_SUFFIX;

    const wrapper: ChecksummedFile<T> = {
      version: this.CURRENT_VERSION,
      checksum: sha256(JSON.stringify(data)),
      data,
      writtenAt: Date.now(),
    };
    const finalData = JSON.stringify(wrapper);

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeSync(fd, finalData);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    if (fs.existsSync(filePath)) {
      if (fs.existsSync(backupPath)) {
        fs.unlinkSync(backupPath);
      }
      fs.renameSync(filePath, backupPath);
    }

    fs.renameSync(tempPath, filePath);

    try {
      const dirFd = fs.openSync(dir, 'r');
      try {
        fs.fsyncSync(dirFd);
      } finally {
        fs.closeSync(dirFd);
      }
    } catch (err) {
      // Not every platform allows fsync on a directory handle.
      logger.debug('AtomicStorage', 'Directory sync skipped', { dir, error: errorMessage(err) });
    }
  }

  static readFileAtomic<T>(filePath: string, isData: (value: unknown) => value is T): ReadResult<T> {
    const mainResult = this.tryReadFile(filePath, isData);
    if (mainResult.success) {
      return mainResult;
    }

    const backupPath = filePath + this.BACKUP_SUFFIX;
    if (!fs.existsSync(backupPath)) {
      return mainResult;
    }

    logger.warn('AtomicStorage', 'Main file unreadable, recovering from backup', {
      filePath,
      error: mainResult.error,
    });

    const backupResult = this.tryReadFile(backupPath, isData);
    if (!backupResult.success) {
      return {
        success: false,
        error: `Both main file and backup are unreadable: ${mainResult.error}; ${backupResult.error}`,
      };
    }

    this.writeFileAtomic(filePath, backupResult.data);
    logger.warn('AtomicStorage', 'Restored backup to main file', { filePath });
    return { success: true, data: backupResult.data, recoveredFromBackup: true };
  }

  private static tryReadFile<T>(filePath: string, isData: (value: unknown) => value is T): ReadResult<T> {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File does not exist' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
      return { success: false, error: `Invalid JSON: ${errorMessage(err)}` };
    }

    if (!isChecksummedFile(parsed)) {
      return { success: false, error: 'Missing checksum wrapper' };
    }

    const calculated = sha256(JSON.stringify(parsed.data));
    if (calculated !== parsed.checksum) {
      return {
        success: false,
        error: `Checksum mismatch: expected ${parsed.checksum}, got ${calculated}`,
      };
    }

    if (!isData(parsed.data)) {
      return { success: false, error: 'Unexpected data shape' };
    }
    return { success: true, data: parsed.data };
  }

  static exists(filePath: string): boolean {
    return fs.existsSync(filePath) || fs.existsSync(filePath + this.BACKUP_SUFFIX);
  }

  /**
   * Remove temp files orphaned by an interrupted write.
   */
  static cleanupTempFiles(directory: string): number {
    if (!fs.existsSync(directory)) {
      return 0;
    }

    let cleaned = 0;
    for (const file of fs.readdirSync(directory)) {
      if (!file.endsWith(this.TEMP_SUFFIX)) continue;
      fs.unlinkSync(path.join(directory, file));
      cleaned++;
      logger.info('AtomicStorage', 'Cleaned up orphaned temp file', { file });
    }
    return cleaned;
  }
}
