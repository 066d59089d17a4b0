/**
 * File-backed Event Log
 *
 * Keeps the retained ring and the next sequence number in a file beside the
 * world state, so `since` paging carries on across restarts.
 */

import * as path from 'path';
import { StorageError } from '../errors';
import { ContractEvent } from '../ledger';
import { logger } from '../logging/structured-logger';
import { AtomicStorage } from '../storage';
import { DEFAULT_EVENT_LOG_CAPACITY, EventLog, RecordedEvent, SerializedEventLog } from './event-log';

export const EVENT_LOG_FILE = 'event-log.json';

function isRecordedEvent(value: unknown): value is RecordedEvent {
  if (typeof value !== 'object' || value === null) return false;
  return 'sequence' in value && typeof value.sequence === 'number' &&
    'txId' in value && typeof value.txId === 'string' &&
    'name' in value && typeof value.name === 'string' &&
    'payload' in value && typeof value.payload === 'string' &&
    'committedAt' in value && typeof value.committedAt === 'number';
}

function isSerializedEventLog(value: unknown): value is SerializedEventLog {
  if (typeof value !== 'object' || value === null) return false;
  if (!('nextSequence' in value) || !('events' in value)) return false;
  const { nextSequence, events } = value;
  return typeof nextSequence === 'number' && Array.isArray(events) && events.every(isRecordedEvent);
}

export class FileEventLog extends EventLog {
  readonly filePath: string;

  private constructor(dataDir: string, capacity: number) {
    super(capacity);
    this.filePath = path.join(dataDir, EVENT_LOG_FILE);
  }

  static open(dataDir: string, capacity: number = DEFAULT_EVENT_LOG_CAPACITY): FileEventLog {
    const log = new FileEventLog(dataDir, capacity);
    if (!AtomicStorage.exists(log.filePath)) {
      return log;
    }

    const result = AtomicStorage.readFileAtomic(log.filePath, isSerializedEventLog);
    if (!result.success) {
      throw new StorageError(`Cannot load event log from ${log.filePath}: ${result.error}`);
    }
    log.restore(result.data);
    logger.info('EventLog', 'Loaded event log', {
      filePath: log.filePath,
      events: log.length,
      lastSequence: log.lastSequence,
      recoveredFromBackup: result.recoveredFromBackup === true,
    });
    return log;
  }

  override append(txId: string, event: ContractEvent): RecordedEvent {
    const before = this.snapshot();
    const recorded = super.append(txId, event);
    try {
      AtomicStorage.writeFileAtomic(this.filePath, this.snapshot());
    } catch (err) {
      this.restore(before);
      throw new StorageError(`Failed to persist event log to ${this.filePath}`, err);
    }
    return recorded;
  }
}
