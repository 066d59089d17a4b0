import {
  ConflictError,
  InvalidArgumentError,
  NotFoundError,
  StorageError,
  UnauthorizedError,
} from '../errors';
import { ClientIdentity, StaticClientIdentity, StaticDirectory } from '../identity';
import { ContractEvent, createCompositeKey, partialKeyRange, TransactionStub, WorldState } from '../ledger';
import { LogLevel, logger } from '../logging/structured-logger';
import { decodeJson, encodeText, isToken } from './codec';
import { TransactionContext } from './context';
import { NftContract } from './nft-contract';
import { NFT_PREFIX } from './types';

const ISSUER_MSP = 'Org1MSP';
const issuer = new StaticClientIdentity('issuer', ISSUER_MSP);
const alice = new StaticClientIdentity('alice', 'Org2MSP');
const bob = new StaticClientIdentity('bob', 'Org2MSP');
const carol = new StaticClientIdentity('carol', 'Org2MSP');

describe('NftContract', () => {
  let state: WorldState;
  let contract: NftContract;

  /** Runs one transition and commits it only if it returns. */
  function submit<T>(identity: ClientIdentity, fn: (ctx: TransactionContext) => T): { result: T; event?: ContractEvent } {
    const stub = new TransactionStub(state, 'tx');
    const result = fn({ stub, clientIdentity: identity });
    state.apply(stub.getWriteSet());
    return { result, event: stub.getEvent() };
  }

  function query<T>(fn: (ctx: TransactionContext) => T, identity: ClientIdentity = alice): T {
    return fn({ stub: new TransactionStub(state, 'query'), clientIdentity: identity });
  }

  function eventText(event: ContractEvent | undefined): string {
    return event ? `${event.name} ${new TextDecoder().decode(event.payload)}` : '';
  }

  function mint(tokenId: string, uri: string = `ipfs://${tokenId}`): void {
    submit(issuer, (ctx) => contract.mintWithTokenURI(ctx, tokenId, uri));
  }

  /** Owner counts derived straight from the token records. */
  function ownersFromRecords(): Map<string, number> {
    const counts = new Map<string, number>();
    const { start, end } = partialKeyRange(NFT_PREFIX, []);
    for (const { value } of state.range(start, end)) {
      const token = decodeJson(value);
      if (isToken(token) && token.owner !== '') {
        counts.set(token.owner, (counts.get(token.owner) ?? 0) + 1);
      }
    }
    return counts;
  }

  beforeAll(() => {
    logger.setLevel(LogLevel.SILENT);
  });

  beforeEach(() => {
    state = new WorldState();
    contract = new NftContract({ issuerMspId: ISSUER_MSP });
  });

  it('refuses an empty issuer organization', () => {
    expect(() => new NftContract({ issuerMspId: '' })).toThrow(InvalidArgumentError);
  });

  describe('mint, approve, transfer, burn', () => {
    it('walks a token through its whole life', () => {
      const minted = submit(issuer, (ctx) => contract.mintWithTokenURI(ctx, '1', 'ipfs://x'));
      expect(minted.result).toEqual({ tokenID: 1, tokenURI: 'ipfs://x', owner: 'issuer', approved: '' });
      expect(eventText(minted.event)).toBe('Transfer {"from":"0x0","to":"issuer","tokenID":1}');
      expect(query((ctx) => contract.ownerOf(ctx, '1'))).toBe('issuer');
      expect(query((ctx) => contract.balanceOf(ctx, 'issuer'))).toBe(1);

      expect(() => submit(carol, (ctx) => contract.approve(ctx, 'bob', '1'))).toThrow(UnauthorizedError);

      const approved = submit(issuer, (ctx) => contract.approve(ctx, 'bob', '1'));
      expect(eventText(approved.event)).toBe('Approval {"owner":"issuer","approved":"bob","tokenID":1}');
      expect(query((ctx) => contract.getApproved(ctx, '1'))).toBe('bob');

      const moved = submit(bob, (ctx) => contract.transferFrom(ctx, 'bob', 'carol', '1'));
      expect(eventText(moved.event)).toBe('Transfer {"from":"issuer","to":"carol","tokenID":1}');
      expect(query((ctx) => contract.ownerOf(ctx, '1'))).toBe('carol');
      expect(query((ctx) => contract.getApproved(ctx, '1'))).toBe('');
      expect(query((ctx) => contract.balanceOf(ctx, 'issuer'))).toBe(0);
      expect(query((ctx) => contract.balanceOf(ctx, 'carol'))).toBe(1);

      const burned = submit(carol, (ctx) => contract.burn(ctx, '1'));
      expect(eventText(burned.event)).toBe('Transfer {"from":"carol","to":"0x0","tokenID":1}');
      expect(query((ctx) => contract.balanceOf(ctx, 'carol'))).toBe(0);
      expect(() => query((ctx) => contract.ownerOf(ctx, '1'))).toThrow(NotFoundError);
    });
  });

  describe('mintWithTokenURI', () => {
    it('is create-only', () => {
      mint('1');
      const before = state.snapshot();

      expect(() => mint('1', 'ipfs://other')).toThrow(ConflictError);
      expect(state.snapshot()).toEqual(before);
      expect(query((ctx) => contract.tokenURI(ctx, '1'))).toBe('ipfs://1');
    });

    it('is reserved to the issuer organization', () => {
      expect(() => submit(alice, (ctx) => contract.mintWithTokenURI(ctx, '1', 'ipfs://x')))
        .toThrow('client is not authorized to mint new tokens');
      expect(state.size).toBe(0);
    });

    it('rejects a non-integer token ID', () => {
      expect(() => mint('one')).toThrow(InvalidArgumentError);
    });

    it('addresses the same token through equivalent decimal spellings', () => {
      mint('1');
      expect(query((ctx) => contract.ownerOf(ctx, '01'))).toBe('issuer');
      expect(() => mint('001')).toThrow(ConflictError);
    });

    it('reuses a token ID whose record has no owner', () => {
      state.apply([{
        kind: 'put',
        key: createCompositeKey(NFT_PREFIX, ['9']),
        value: encodeText('{"tokenID":9,"tokenURI":"","owner":"","approved":""}'),
      }]);

      expect(() => query((ctx) => contract.ownerOf(ctx, '9'))).toThrow(NotFoundError);
      mint('9');
      expect(query((ctx) => contract.ownerOf(ctx, '9'))).toBe('issuer');
    });
  });

  describe('transferFrom', () => {
    beforeEach(() => {
      mint('7');
    });

    it('lets an operator of the owner move the token', () => {
      submit(issuer, (ctx) => contract.setApprovalForAll(ctx, 'alice', true));

      submit(alice, (ctx) => contract.transferFrom(ctx, 'alice', 'bob', '7'));

      expect(query((ctx) => contract.ownerOf(ctx, '7'))).toBe('bob');
      expect(query((ctx) => contract.balanceOf(ctx, 'issuer'))).toBe(0);
    });

    it('refuses a caller acting under someone else\'s identity', () => {
      submit(issuer, (ctx) => contract.approve(ctx, 'bob', '7'));

      expect(() => submit(carol, (ctx) => contract.transferFrom(ctx, 'bob', 'carol', '7')))
        .toThrow('sender carol cannot transfer on behalf of bob');
      expect(query((ctx) => contract.ownerOf(ctx, '7'))).toBe('issuer');
    });

    it('refuses a party with no relationship to the token', () => {
      expect(() => submit(carol, (ctx) => contract.transferFrom(ctx, 'carol', 'carol', '7')))
        .toThrow(UnauthorizedError);
    });

    it('forgets the per-token approval after a transfer', () => {
      submit(issuer, (ctx) => contract.approve(ctx, 'bob', '7'));
      submit(issuer, (ctx) => contract.transferFrom(ctx, 'issuer', 'alice', '7'));

      expect(query((ctx) => contract.getApproved(ctx, '7'))).toBe('');
      expect(() => submit(bob, (ctx) => contract.transferFrom(ctx, 'bob', 'bob', '7'))).toThrow(UnauthorizedError);
    });

    it('keeps the balance when the owner transfers to itself', () => {
      submit(issuer, (ctx) => contract.transferFrom(ctx, 'issuer', 'issuer', '7'));
      expect(query((ctx) => contract.balanceOf(ctx, 'issuer'))).toBe(1);
    });

    it('fails for an unknown token', () => {
      expect(() => submit(issuer, (ctx) => contract.transferFrom(ctx, 'issuer', 'bob', '8'))).toThrow(NotFoundError);
    });

    it('requires a recipient', () => {
      expect(() => submit(issuer, (ctx) => contract.transferFrom(ctx, 'issuer', '', '7'))).toThrow(InvalidArgumentError);
    });
  });

  describe('approve', () => {
    beforeEach(() => {
      mint('3');
    });

    it('lets an operator grant a per-token approval on the owner\'s behalf', () => {
      submit(issuer, (ctx) => contract.setApprovalForAll(ctx, 'alice', true));

      const { event } = submit(alice, (ctx) => contract.approve(ctx, 'bob', '3'));

      expect(eventText(event)).toBe('Approval {"owner":"issuer","approved":"bob","tokenID":3}');
      expect(query((ctx) => contract.getApproved(ctx, '3'))).toBe('bob');
    });

    it('does not let the approved party pass the approval on', () => {
      submit(issuer, (ctx) => contract.approve(ctx, 'bob', '3'));
      expect(() => submit(bob, (ctx) => contract.approve(ctx, 'carol', '3'))).toThrow(UnauthorizedError);
    });

    it('requires the approvee to be a known identity', () => {
      contract = new NftContract({ issuerMspId: ISSUER_MSP, directory: new StaticDirectory(['bob']) });

      expect(() => submit(issuer, (ctx) => contract.approve(ctx, 'mallory', '3')))
        .toThrow("'approved' account mallory is invalid. It does not exist");
      submit(issuer, (ctx) => contract.approve(ctx, 'bob', '3'));
      expect(query((ctx) => contract.getApproved(ctx, '3'))).toBe('bob');
    });

    it('lets the owner approve itself', () => {
      const { event } = submit(issuer, (ctx) => contract.approve(ctx, 'issuer', '3'));

      expect(eventText(event)).toBe('Approval {"owner":"issuer","approved":"issuer","tokenID":3}');
      expect(query((ctx) => contract.getApproved(ctx, '3'))).toBe('issuer');
    });

    it('rejects an empty approvee', () => {
      expect(() => submit(issuer, (ctx) => contract.approve(ctx, '', '3'))).toThrow(InvalidArgumentError);
    });

    it('fails for an unknown token', () => {
      expect(() => submit(issuer, (ctx) => contract.approve(ctx, 'bob', '4'))).toThrow(NotFoundError);
    });
  });

  describe('setApprovalForAll', () => {
    it('grants and revokes a standing approval', () => {
      const granted = submit(alice, (ctx) => contract.setApprovalForAll(ctx, 'bob', true));
      expect(eventText(granted.event)).toBe('ApprovalForAll {"owner":"alice","operator":"bob","approved":true}');
      expect(query((ctx) => contract.isApprovedForAll(ctx, 'alice', 'bob'))).toBe(true);

      submit(alice, (ctx) => contract.setApprovalForAll(ctx, 'bob', false));
      expect(query((ctx) => contract.isApprovedForAll(ctx, 'alice', 'bob'))).toBe(false);
    });

    it('lets a caller name itself as operator', () => {
      const { event } = submit(alice, (ctx) => contract.setApprovalForAll(ctx, 'alice', true));

      expect(eventText(event)).toBe('ApprovalForAll {"owner":"alice","operator":"alice","approved":true}');
      expect(query((ctx) => contract.isApprovedForAll(ctx, 'alice', 'alice'))).toBe(true);
    });
  });

  describe('burn', () => {
    beforeEach(() => {
      mint('5');
    });

    it('is refused to the approved party', () => {
      submit(issuer, (ctx) => contract.approve(ctx, 'bob', '5'));
      expect(() => submit(bob, (ctx) => contract.burn(ctx, '5'))).toThrow('non-fungible token 5 is not owned by bob');
    });

    it('is refused to an operator', () => {
      submit(issuer, (ctx) => contract.setApprovalForAll(ctx, 'alice', true));
      expect(() => submit(alice, (ctx) => contract.burn(ctx, '5'))).toThrow(UnauthorizedError);
      expect(query((ctx) => contract.ownerOf(ctx, '5'))).toBe('issuer');
    });

    it('removes the record and the index entry', () => {
      submit(issuer, (ctx) => contract.burn(ctx, '5'));
      expect(state.size).toBe(0);
    });

    it('fails for an unknown token', () => {
      expect(() => submit(issuer, (ctx) => contract.burn(ctx, '6'))).toThrow(NotFoundError);
    });
  });

  describe('balance index', () => {
    it('matches the token records after a mix of operations', () => {
      for (const id of ['1', '2', '3', '4', '5']) mint(id);
      submit(issuer, (ctx) => contract.transferFrom(ctx, 'issuer', 'alice', '2'));
      submit(issuer, (ctx) => contract.transferFrom(ctx, 'issuer', 'alice', '3'));
      submit(alice, (ctx) => contract.transferFrom(ctx, 'alice', 'bob', '3'));
      submit(issuer, (ctx) => contract.burn(ctx, '1'));

      const fromRecords = ownersFromRecords();
      expect(Object.fromEntries(fromRecords)).toEqual({ issuer: 2, alice: 1, bob: 1 });
      for (const owner of ['issuer', 'alice', 'bob', 'carol']) {
        expect(query((ctx) => contract.balanceOf(ctx, owner))).toBe(fromRecords.get(owner) ?? 0);
      }
      expect(query((ctx) => contract.totalSupply(ctx))).toBe(4);
    });

    it('requires an owner to count for', () => {
      expect(() => query((ctx) => contract.balanceOf(ctx, ''))).toThrow(InvalidArgumentError);
    });
  });

  describe('queries', () => {
    it('reports the caller and the caller\'s balance', () => {
      mint('1');
      mint('2');
      expect(query((ctx) => contract.clientAccountID(ctx), issuer)).toBe('issuer');
      expect(query((ctx) => contract.clientAccountBalance(ctx), issuer)).toBe(2);
      expect(query((ctx) => contract.clientAccountBalance(ctx), bob)).toBe(0);
    });

    it('fails on a corrupt token record', () => {
      state.apply([{ kind: 'put', key: createCompositeKey(NFT_PREFIX, ['4']), value: encodeText('{') }]);
      expect(() => query((ctx) => contract.getApproved(ctx, '4'))).toThrow(StorageError);
    });
  });

  describe('contract metadata', () => {
    it('is set once by the issuer', () => {
      expect(() => query((ctx) => contract.name(ctx))).toThrow(NotFoundError);
      expect(() => submit(alice, (ctx) => contract.initialize(ctx, 'Collectibles', 'CLT'))).toThrow(UnauthorizedError);

      submit(issuer, (ctx) => contract.initialize(ctx, 'Collectibles', 'CLT'));
      expect(query((ctx) => contract.name(ctx))).toBe('Collectibles');
      expect(query((ctx) => contract.symbol(ctx))).toBe('CLT');

      expect(() => submit(issuer, (ctx) => contract.initialize(ctx, 'Other', 'OTH'))).toThrow(ConflictError);
      expect(query((ctx) => contract.name(ctx))).toBe('Collectibles');
    });
  });
});
