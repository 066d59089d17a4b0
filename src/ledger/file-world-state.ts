/**
 * File-backed World State
 *
 * Same semantics as the in-memory state; after every applied write set the
 * whole namespace is snapshotted through AtomicStorage so a restart resumes
 * from the last committed transition.
 */

import * as path from 'path';
import { StorageError } from '../errors';
import { logger } from '../logging/structured-logger';
import { AtomicStorage } from '../storage';
import { WriteOperation } from './types';
import { SerializedWorldState, WorldState } from './world-state';

export const WORLD_STATE_FILE = 'world-state.json';

function isSerializedWorldState(value: unknown): value is SerializedWorldState {
  if (typeof value !== 'object' || value === null || !('entries' in value)) return false;
  const { entries } = value;
  return Array.isArray(entries) && entries.every(
    (e: unknown) => Array.isArray(e) && e.length === 2 && typeof e[0] === 'string' && typeof e[1] === 'string'
  );
}

export class FileWorldState extends WorldState {
  readonly filePath: string;

  private constructor(dataDir: string) {
    super();
    this.filePath = path.join(dataDir, WORLD_STATE_FILE);
  }

  static open(dataDir: string): FileWorldState {
    const state = new FileWorldState(dataDir);
    AtomicStorage.cleanupTempFiles(dataDir);

    if (!AtomicStorage.exists(state.filePath)) {
      logger.info('WorldState', 'Starting with an empty world state', { filePath: state.filePath });
      return state;
    }

    const result = AtomicStorage.readFileAtomic(state.filePath, isSerializedWorldState);
    if (!result.success) {
      throw new StorageError(`Cannot load world state from ${state.filePath}: ${result.error}`);
    }
    state.restore(result.data);
    logger.info('WorldState', 'Loaded world state', {
      filePath: state.filePath,
      keys: state.size,
      recoveredFromBackup: result.recoveredFromBackup === true,
    });
    return state;
  }

  override apply(writes: readonly WriteOperation[]): void {
    if (writes.length === 0) return;

    const before = this.snapshot();
    super.apply(writes);
    try {
      AtomicStorage.writeFileAtomic(this.filePath, this.snapshot());
    } catch (err) {
      // The in-memory state must not run ahead of what is on disk.
      this.restore(before);
      throw new StorageError(`Failed to persist world state to ${this.filePath}`, err);
    }
  }
}
