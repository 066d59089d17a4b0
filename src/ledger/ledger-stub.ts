/**
 * Transaction Stub
 *
 * One stub per transition. Reads see the committed state the transition
 * started from; writes are buffered in order and only reach the world state
 * when the host commits the write set. Dropping the stub discards them.
 */

import { StorageError, errorMessage } from '../errors';
import { createCompositeKey, partialKeyRange, splitCompositeKey, CompositeKeyParts } from './composite-key';
import { ContractEvent, LedgerStub, StateEntry, StateReader, WriteOperation } from './types';

export class TransactionStub implements LedgerStub {
  private writes: Map<string, WriteOperation> = new Map();
  private event: ContractEvent | undefined;

  constructor(private readonly state: StateReader, private readonly txId: string) {}

  getTxID(): string {
    return this.txId;
  }

  getState(key: string): Uint8Array | undefined {
    if (!key) {
      throw new StorageError('key must not be empty');
    }
    try {
      return this.state.get(key);
    } catch (err) {
      throw new StorageError(`failed to read key ${JSON.stringify(key)}: ${errorMessage(err)}`, err);
    }
  }

  putState(key: string, value: Uint8Array): void {
    if (!key) {
      throw new StorageError('key must not be empty');
    }
    if (value.length === 0) {
      throw new StorageError(`value for key ${JSON.stringify(key)} must not be empty`);
    }
    // Re-insert so the write set keeps the order of the last write per key.
    this.writes.delete(key);
    this.writes.set(key, { kind: 'put', key, value: Uint8Array.from(value) });
  }

  deleteState(key: string): void {
    if (!key) {
      throw new StorageError('key must not be empty');
    }
    this.writes.delete(key);
    this.writes.set(key, { kind: 'delete', key });
  }

  createCompositeKey(objectType: string, attributes: readonly string[]): string {
    return createCompositeKey(objectType, attributes);
  }

  splitCompositeKey(key: string): CompositeKeyParts {
    return splitCompositeKey(key);
  }

  getStateByPartialCompositeKey(objectType: string, attributes: readonly string[]): Iterable<StateEntry> {
    const { start, end } = partialKeyRange(objectType, attributes);
    try {
      // Materialized so a failing store surfaces here rather than mid-iteration.
      return Array.from(this.state.range(start, end));
    } catch (err) {
      throw new StorageError(`failed to scan ${objectType} range: ${errorMessage(err)}`, err);
    }
  }

  setEvent(name: string, payload: Uint8Array): void {
    if (!name) {
      throw new StorageError('event name must not be empty');
    }
    this.event = { name, payload: Uint8Array.from(payload) };
  }

  getWriteSet(): WriteOperation[] {
    return Array.from(this.writes.values());
  }

  getEvent(): ContractEvent | undefined {
    return this.event;
  }
}
