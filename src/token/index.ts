/**
 * Token Module
 *
 * Token records, the balance index, operator approvals and the contract
 * operations composed from them.
 */

export * from './types';
export * from './arguments';
export * from './codec';
export * from './context';
export * from './token-store';
export * from './approval-registry';
export * from './nft-contract';
