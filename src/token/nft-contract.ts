/**
 * NFT Contract
 *
 * State transitions (mint, transfer, approve, set-approval-for-all, burn)
 * and read-only queries over the Token Store and Approval Registry. Each
 * mutating operation writes the token record first, then the balance index
 * deltas, then sets exactly one event. Nothing here commits: the host applies
 * the stub's write set only when the operation returns normally.
 */

import {
  ConflictError,
  InvalidArgumentError,
  NotFoundError,
  UnauthorizedError,
} from '../errors';
import { IdentityDirectory, OpenDirectory } from '../identity';
import { logger } from '../logging/structured-logger';
import { ApprovalRegistry } from './approval-registry';
import { parseTokenId, requireIdentity } from './arguments';
import { decodeText, encodeJson, encodeText } from './codec';
import { TransactionContext } from './context';
import { TokenStore } from './token-store';
import {
  METADATA_PREFIX,
  NAME_KEY,
  NO_PARTY,
  SYMBOL_KEY,
  Token,
  TokenEvent,
  TokenEventName,
} from './types';

export interface NftContractOptions {
  /** Organization whose members may mint and initialize. */
  issuerMspId: string;
  /** Decides who may be named in Approve. Defaults to any non-empty identity. */
  directory?: IdentityDirectory;
}

export class NftContract {
  private readonly issuerMspId: string;
  private readonly directory: IdentityDirectory;

  constructor(options: NftContractOptions) {
    if (!options.issuerMspId) {
      throw new InvalidArgumentError('issuer MSP ID must not be empty');
    }
    this.issuerMspId = options.issuerMspId;
    this.directory = options.directory ?? new OpenDirectory();
  }

  // ============================================================
  // Contract metadata
  // ============================================================

  initialize(ctx: TransactionContext, name: string, symbol: string): void {
    this.requireIssuer(ctx, 'initialize the contract');
    requireIdentity(name, 'name');
    requireIdentity(symbol, 'symbol');

    const nameKey = ctx.stub.createCompositeKey(METADATA_PREFIX, [NAME_KEY]);
    if (ctx.stub.getState(nameKey)) {
      throw new ConflictError('contract options are already set, client is not authorized to change them');
    }
    ctx.stub.putState(nameKey, encodeText(name));
    ctx.stub.putState(ctx.stub.createCompositeKey(METADATA_PREFIX, [SYMBOL_KEY]), encodeText(symbol));
    logger.info('NftContract', 'Contract initialized', { name, symbol });
  }

  name(ctx: TransactionContext): string {
    return this.readMetadata(ctx, NAME_KEY);
  }

  symbol(ctx: TransactionContext): string {
    return this.readMetadata(ctx, SYMBOL_KEY);
  }

  // ============================================================
  // State transitions
  // ============================================================

  mintWithTokenURI(ctx: TransactionContext, tokenId: string, tokenURI: string): Token {
    this.requireIssuer(ctx, 'mint new tokens');
    const id = parseTokenId(tokenId);
    const minter = ctx.clientIdentity.getID();

    const tokens = new TokenStore(ctx.stub);
    if (tokens.exists(id)) {
      throw new ConflictError(`token ${id.key} is already minted`);
    }

    const token: Token = { tokenID: id.value, tokenURI, owner: minter, approved: '' };
    tokens.write(token);
    tokens.indexAdd(minter, id);

    this.emit(ctx, {
      name: TokenEventName.TRANSFER,
      body: { from: NO_PARTY, to: minter, tokenID: id.value },
    });
    logger.debug('NftContract', 'Token minted', { tokenID: id.value, owner: minter, txId: ctx.stub.getTxID() });
    return token;
  }

  /**
   * Move a token to `to`. `from` is the party acting and must be the invoking
   * identity; it must also be the owner, the token's approved party, or an
   * operator of the owner. The index entry removed is the previous owner's.
   */
  transferFrom(ctx: TransactionContext, from: string, to: string, tokenId: string): void {
    const id = parseTokenId(tokenId);
    requireIdentity(from, 'from');
    requireIdentity(to, 'to');
    const sender = ctx.clientIdentity.getID();

    if (sender !== from) {
      throw new UnauthorizedError(`sender ${sender} cannot transfer on behalf of ${from}`);
    }

    const tokens = new TokenStore(ctx.stub);
    const token = tokens.read(id);
    if (!this.isAuthorized(ctx, from, token)) {
      throw new UnauthorizedError(`from ${from} is not the current owner ${token.owner} nor authorized operator of token ${id.key}`);
    }

    const previousOwner = token.owner;
    tokens.write({ ...token, owner: to, approved: '' });
    tokens.indexRemove(previousOwner, id);
    tokens.indexAdd(to, id);

    this.emit(ctx, {
      name: TokenEventName.TRANSFER,
      body: { from: previousOwner, to, tokenID: id.value },
    });
    logger.debug('NftContract', 'Token transferred', { tokenID: id.value, from: previousOwner, to, sender });
  }

  approve(ctx: TransactionContext, approved: string, tokenId: string): void {
    const id = parseTokenId(tokenId);
    requireIdentity(approved, 'approved');
    const sender = ctx.clientIdentity.getID();

    const tokens = new TokenStore(ctx.stub);
    const token = tokens.read(id);

    if (!this.directory.isKnown(approved)) {
      throw new NotFoundError(`'approved' account ${approved} is invalid. It does not exist`);
    }

    const approvals = new ApprovalRegistry(ctx.stub);
    if (sender !== token.owner && !approvals.isApprovedForAll(token.owner, sender)) {
      throw new UnauthorizedError(`sender ${sender} is not the current owner nor an authorized operator of token ${id.key}`);
    }

    tokens.write({ ...token, approved });

    this.emit(ctx, {
      name: TokenEventName.APPROVAL,
      body: { owner: token.owner, approved, tokenID: id.value },
    });
    logger.debug('NftContract', 'Token approval set', { tokenID: id.value, owner: token.owner, approved });
  }

  setApprovalForAll(ctx: TransactionContext, operator: string, approved: boolean): void {
    requireIdentity(operator, 'operator');
    const sender = ctx.clientIdentity.getID();

    new ApprovalRegistry(ctx.stub).setApprovalForAll(sender, operator, approved);

    this.emit(ctx, {
      name: TokenEventName.APPROVAL_FOR_ALL,
      body: { owner: sender, operator, approved },
    });
    logger.debug('NftContract', 'Operator approval set', { owner: sender, operator, approved });
  }

  /**
   * Destroy a token. Only the owner may burn; approvals are not honored.
   */
  burn(ctx: TransactionContext, tokenId: string): void {
    const id = parseTokenId(tokenId);
    const sender = ctx.clientIdentity.getID();

    const tokens = new TokenStore(ctx.stub);
    const token = tokens.read(id);
    if (token.owner !== sender) {
      throw new UnauthorizedError(`non-fungible token ${id.key} is not owned by ${sender}`);
    }

    tokens.delete(id);
    tokens.indexRemove(token.owner, id);

    this.emit(ctx, {
      name: TokenEventName.TRANSFER,
      body: { from: token.owner, to: NO_PARTY, tokenID: id.value },
    });
    logger.debug('NftContract', 'Token burned', { tokenID: id.value, owner: token.owner });
  }

  // ============================================================
  // Queries
  // ============================================================

  ownerOf(ctx: TransactionContext, tokenId: string): string {
    return new TokenStore(ctx.stub).read(parseTokenId(tokenId)).owner;
  }

  getApproved(ctx: TransactionContext, tokenId: string): string {
    return new TokenStore(ctx.stub).read(parseTokenId(tokenId)).approved;
  }

  tokenURI(ctx: TransactionContext, tokenId: string): string {
    return new TokenStore(ctx.stub).read(parseTokenId(tokenId)).tokenURI;
  }

  isApprovedForAll(ctx: TransactionContext, owner: string, operator: string): boolean {
    return new ApprovalRegistry(ctx.stub).isApprovedForAll(owner, operator);
  }

  balanceOf(ctx: TransactionContext, owner: string): number {
    requireIdentity(owner, 'owner');
    return new TokenStore(ctx.stub).countByOwner(owner);
  }

  totalSupply(ctx: TransactionContext): number {
    return new TokenStore(ctx.stub).countAll();
  }

  clientAccountID(ctx: TransactionContext): string {
    return ctx.clientIdentity.getID();
  }

  clientAccountBalance(ctx: TransactionContext): number {
    return this.balanceOf(ctx, ctx.clientIdentity.getID());
  }

  // ============================================================
  // Helpers
  // ============================================================

  private isAuthorized(ctx: TransactionContext, actor: string, token: Token): boolean {
    if (actor === token.owner) return true;
    if (token.approved !== '' && actor === token.approved) return true;
    return new ApprovalRegistry(ctx.stub).isApprovedForAll(token.owner, actor);
  }

  private requireIssuer(ctx: TransactionContext, action: string): void {
    if (ctx.clientIdentity.getMSPID() !== this.issuerMspId) {
      throw new UnauthorizedError(`client is not authorized to ${action}`);
    }
  }

  private readMetadata(ctx: TransactionContext, key: string): string {
    const bytes = ctx.stub.getState(ctx.stub.createCompositeKey(METADATA_PREFIX, [key]));
    if (!bytes || bytes.length === 0) {
      throw new NotFoundError(`contract ${key} is not set, call Initialize first`);
    }
    return decodeText(bytes);
  }

  private emit(ctx: TransactionContext, event: TokenEvent): void {
    ctx.stub.setEvent(event.name, encodeJson(event.body));
  }
}
