/**
 * Ledger Types
 *
 * The key-value surface the token logic is written against, plus the write
 * set a transition hands back to the host for commit.
 */

import { CompositeKeyParts } from './composite-key';

export interface StateEntry {
  key: string;
  value: Uint8Array;
}

export type WriteOperation =
  | { kind: 'put'; key: string; value: Uint8Array }
  | { kind: 'delete'; key: string };

export interface ContractEvent {
  name: string;
  payload: Uint8Array;
}

/**
 * Read access to committed state. Ranges are half-open and ordered by
 * code point.
 */
export interface StateReader {
  get(key: string): Uint8Array | undefined;
  range(startKey: string, endKey: string): Iterable<StateEntry>;
}

/**
 * Per-transition accessor handed to contract code.
 */
export interface LedgerStub {
  getTxID(): string;
  getState(key: string): Uint8Array | undefined;
  putState(key: string, value: Uint8Array): void;
  deleteState(key: string): void;
  createCompositeKey(objectType: string, attributes: readonly string[]): string;
  splitCompositeKey(key: string): CompositeKeyParts;
  getStateByPartialCompositeKey(objectType: string, attributes: readonly string[]): Iterable<StateEntry>;
  setEvent(name: string, payload: Uint8Array): void;
}
