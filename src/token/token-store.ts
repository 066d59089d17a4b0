/**
 * Token Store
 *
 * Owns the canonical token records (nft/[tokenID]) and the balance index
 * (balance/[owner, tokenID]). The ledger offers only point reads and ordered
 * prefix scans, so "tokens held by X" is answered from index entries that
 * share the owner's prefix. Record and index writes are separate calls;
 * the operations pair them within one transition.
 */

import { NotFoundError, StorageError } from '../errors';
import { LedgerStub } from '../ledger';
import { TokenId } from './arguments';
import { decodeJson, encodeJson, isToken, tokenRecord } from './codec';
import { BALANCE_PREFIX, INDEX_SENTINEL, NFT_PREFIX, Token } from './types';

export class TokenStore {
  constructor(private readonly stub: LedgerStub) {}

  private tokenKey(segment: string): string {
    return this.stub.createCompositeKey(NFT_PREFIX, [segment]);
  }

  private balanceKey(owner: string, id: TokenId): string {
    return this.stub.createCompositeKey(BALANCE_PREFIX, [owner, id.key]);
  }

  /**
   * Fetch a live token. A record with an empty owner counts as absent.
   */
  read(id: TokenId): Token {
    const token = this.find(id);
    if (!token) {
      throw new NotFoundError(`TokenID ${id.key} is invalid. It does not exist`);
    }
    return token;
  }

  exists(id: TokenId): boolean {
    return this.find(id) !== undefined;
  }

  private find(id: TokenId): Token | undefined {
    const bytes = this.stub.getState(this.tokenKey(id.key));
    if (!bytes || bytes.length === 0) {
      return undefined;
    }
    const token = decodeJson(bytes);
    if (!isToken(token)) {
      throw new StorageError(`record for token ${id.key} is malformed`);
    }
    return token.owner === '' ? undefined : token;
  }

  write(token: Token): void {
    this.stub.putState(this.tokenKey(String(token.tokenID)), encodeJson(tokenRecord(token)));
  }

  delete(id: TokenId): void {
    this.stub.deleteState(this.tokenKey(id.key));
  }

  indexAdd(owner: string, id: TokenId): void {
    this.stub.putState(this.balanceKey(owner, id), INDEX_SENTINEL);
  }

  indexRemove(owner: string, id: TokenId): void {
    this.stub.deleteState(this.balanceKey(owner, id));
  }

  countByOwner(owner: string): number {
    let count = 0;
    for (const _entry of this.stub.getStateByPartialCompositeKey(BALANCE_PREFIX, [owner])) {
      count++;
    }
    return count;
  }

  /** Live tokens across the ledger; a full scan of the nft prefix. */
  countAll(): number {
    let count = 0;
    for (const { value } of this.stub.getStateByPartialCompositeKey(NFT_PREFIX, [])) {
      const token = decodeJson(value);
      if (isToken(token) && token.owner !== '') count++;
    }
    return count;
  }
}
