/**
 * World State
 *
 * The committed key-value namespace shared by every record type. Keys are
 * kept in code-point order so composite-key prefixes form contiguous ranges.
 * A write set is applied whole or not at all.
 */

import { StorageError } from '../errors';
import { StateEntry, StateReader, WriteOperation } from './types';

/** Orders strings by Unicode code point (UTF-16 code unit order misplaces astral characters). */
export function compareKeys(a: string, b: string): number {
  const ai = a[Symbol.iterator]();
  const bi = b[Symbol.iterator]();
  for (;;) {
    const an = ai.next();
    const bn = bi.next();
    if (an.done === true) return bn.done === true ? 0 : -1;
    if (bn.done === true) return 1;
    const ac = an.value.codePointAt(0) ?? 0;
    const bc = bn.value.codePointAt(0) ?? 0;
    if (ac !== bc) return ac < bc ? -1 : 1;
  }
}

export interface SerializedWorldState {
  entries: Array<[string, string]>; // key -> base64 value
}

export class WorldState implements StateReader {
  protected entries: Map<string, Uint8Array> = new Map();
  private sortedKeys: string[] | null = null;

  get size(): number {
    return this.entries.size;
  }

  get(key: string): Uint8Array | undefined {
    const value = this.entries.get(key);
    return value === undefined ? undefined : Uint8Array.from(value);
  }

  *range(startKey: string, endKey: string): Iterable<StateEntry> {
    const keys = this.keys();
    let i = this.lowerBound(keys, startKey);
    for (; i < keys.length; i++) {
      const key = keys[i];
      if (compareKeys(key, endKey) >= 0) break;
      const value = this.entries.get(key);
      if (value !== undefined) {
        yield { key, value: Uint8Array.from(value) };
      }
    }
  }

  /**
   * Apply a transition's write set. Validation runs over every operation
   * before the first mutation so a bad entry leaves the state untouched.
   */
  apply(writes: readonly WriteOperation[]): void {
    for (const op of writes) {
      if (!op.key) {
        throw new StorageError('write set contains an empty key');
      }
      if (op.kind === 'put' && op.value.length === 0) {
        throw new StorageError(`write set contains an empty value for key ${JSON.stringify(op.key)}`);
      }
    }

    for (const op of writes) {
      if (op.kind === 'put') {
        if (!this.entries.has(op.key)) this.sortedKeys = null;
        this.entries.set(op.key, Uint8Array.from(op.value));
      } else if (this.entries.delete(op.key)) {
        this.sortedKeys = null;
      }
    }
  }

  snapshot(): SerializedWorldState {
    return {
      entries: this.keys().map((key) => {
        const value = this.entries.get(key) ?? new Uint8Array();
        return [key, Buffer.from(value).toString('base64')];
      }),
    };
  }

  restore(serialized: SerializedWorldState): void {
    this.entries = new Map(
      serialized.entries.map(([key, value]): [string, Uint8Array] => [key, new Uint8Array(Buffer.from(value, 'base64'))])
    );
    this.sortedKeys = null;
  }

  private keys(): string[] {
    if (this.sortedKeys === null) {
      this.sortedKeys = Array.from(this.entries.keys()).sort(compareKeys);
    }
    return this.sortedKeys;
  }

  private lowerBound(keys: string[], target: string): number {
    let lo = 0;
    let hi = keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareKeys(keys[mid], target) < 0) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
