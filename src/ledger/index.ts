/**
 * Ledger Module
 *
 * World state, composite keys and the per-transition stub.
 */

export * from './types';
export * from './composite-key';
export * from './world-state';
export * from './file-world-state';
export * from './ledger-stub';
