/**
 * Token Types
 *
 * Record shapes stored on the ledger and the events emitted by the
 * token operations.
 */

export const NFT_PREFIX = 'nft';
export const BALANCE_PREFIX = 'balance';
export const APPROVAL_PREFIX = 'approval';
export const METADATA_PREFIX = 'metadata';

export const NAME_KEY = 'name';
export const SYMBOL_KEY = 'symbol';

/** Party used for `from` on mint and `to` on burn. */
export const NO_PARTY = '0x0';

/** Balance index entries only mark existence; an empty value would read as a delete. */
export const INDEX_SENTINEL: Uint8Array = Uint8Array.of(0);

export interface Token {
  tokenID: number;
  tokenURI: string;
  /** Empty means the token does not exist. */
  owner: string;
  /** Empty means no per-token approval. */
  approved: string;
}

export interface OperatorApproval {
  owner: string;
  operator: string;
  approved: boolean;
}

export enum TokenEventName {
  TRANSFER = 'Transfer',
  APPROVAL = 'Approval',
  APPROVAL_FOR_ALL = 'ApprovalForAll',
}

export interface TransferEvent {
  from: string;
  to: string;
  tokenID: number;
}

export interface ApprovalEvent {
  owner: string;
  approved: string;
  tokenID: number;
}

export interface ApprovalForAllEvent {
  owner: string;
  operator: string;
  approved: boolean;
}

export type TokenEvent =
  | { name: TokenEventName.TRANSFER; body: TransferEvent }
  | { name: TokenEventName.APPROVAL; body: ApprovalEvent }
  | { name: TokenEventName.APPROVAL_FOR_ALL; body: ApprovalForAllEvent };
