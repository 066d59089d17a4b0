/**
 * Storage Module Exports
 *
 * Atomic, checksummed JSON files backing the persistent world state.
 */

export { AtomicStorage } from './atomic-storage';
export type { ChecksummedFile, ReadResult } from './atomic-storage';
