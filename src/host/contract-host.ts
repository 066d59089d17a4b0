/**
 * Contract Host
 *
 * Runs one named contract operation per invocation against the committed
 * world state. Each invocation gets its own TransactionStub; `submit` commits
 * the stub's write set and event only when the operation returns, `evaluate`
 * always discards them. Failures come back as a result envelope, never as a
 * thrown error, and are never retried here. An event the log cannot record
 * after commit is logged; the transaction stays committed.
 */

import { generateTxId } from '../crypto';
import { ContractErrorCode, InvalidArgumentError, errorMessage, isContractError } from '../errors';
import { ClientIdentity } from '../identity';
import { ContractEvent, TransactionStub, WorldState } from '../ledger';
import { logger } from '../logging/structured-logger';
import { NftContract, TransactionContext, parseBoolean } from '../token';
import { EventLog, RecordedEvent } from './event-log';

export type InvocationResult =
  | { ok: true; txId: string; payload: string; event?: RecordedEvent }
  | { ok: false; txId: string; error: { code: ContractErrorCode; message: string } };

type Handler = (contract: NftContract, ctx: TransactionContext, args: string[]) => unknown;

interface OperationSpec {
  params: readonly string[];
  handler: Handler;
}

const OPERATIONS: Record<string, OperationSpec> = {
  Initialize: { params: ['name', 'symbol'], handler: (c, ctx, [name, symbol]) => c.initialize(ctx, name, symbol) },
  Name: { params: [], handler: (c, ctx) => c.name(ctx) },
  Symbol: { params: [], handler: (c, ctx) => c.symbol(ctx) },
  MintWithTokenURI: {
    params: ['tokenID', 'tokenURI'],
    handler: (c, ctx, [tokenId, tokenURI]) => c.mintWithTokenURI(ctx, tokenId, tokenURI),
  },
  TransferFrom: {
    params: ['from', 'to', 'tokenID'],
    handler: (c, ctx, [from, to, tokenId]) => c.transferFrom(ctx, from, to, tokenId),
  },
  Approve: { params: ['approved', 'tokenID'], handler: (c, ctx, [approved, tokenId]) => c.approve(ctx, approved, tokenId) },
  SetApprovalForAll: {
    params: ['operator', 'approved'],
    handler: (c, ctx, [operator, approved]) => c.setApprovalForAll(ctx, operator, parseBoolean(approved, 'approved')),
  },
  IsApprovedForAll: {
    params: ['owner', 'operator'],
    handler: (c, ctx, [owner, operator]) => c.isApprovedForAll(ctx, owner, operator),
  },
  Burn: { params: ['tokenID'], handler: (c, ctx, [tokenId]) => c.burn(ctx, tokenId) },
  OwnerOf: { params: ['tokenID'], handler: (c, ctx, [tokenId]) => c.ownerOf(ctx, tokenId) },
  GetApproved: { params: ['tokenID'], handler: (c, ctx, [tokenId]) => c.getApproved(ctx, tokenId) },
  TokenURI: { params: ['tokenID'], handler: (c, ctx, [tokenId]) => c.tokenURI(ctx, tokenId) },
  BalanceOf: { params: ['owner'], handler: (c, ctx, [owner]) => c.balanceOf(ctx, owner) },
  TotalSupply: { params: [], handler: (c, ctx) => c.totalSupply(ctx) },
  ClientAccountID: { params: [], handler: (c, ctx) => c.clientAccountID(ctx) },
  ClientAccountBalance: { params: [], handler: (c, ctx) => c.clientAccountBalance(ctx) },
};

export function operationNames(): string[] {
  return Object.keys(OPERATIONS);
}

function toPayload(value: unknown): string {
  if (value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export class ContractHost {
  constructor(
    private readonly contract: NftContract,
    private readonly state: WorldState,
    readonly events: EventLog = new EventLog()
  ) {}

  /** Run an operation and commit its writes and event if it succeeds. */
  submit(fn: string, args: readonly string[], identity: ClientIdentity): InvocationResult {
    return this.invoke(fn, args, identity, true);
  }

  /** Run an operation and discard whatever it wrote. */
  evaluate(fn: string, args: readonly string[], identity: ClientIdentity): InvocationResult {
    return this.invoke(fn, args, identity, false);
  }

  get stateSize(): number {
    return this.state.size;
  }

  private invoke(fn: string, args: readonly string[], identity: ClientIdentity, commit: boolean): InvocationResult {
    const txId = generateTxId();
    const stub = new TransactionStub(this.state, txId);
    const ctx: TransactionContext = { stub, clientIdentity: identity };

    let payload: string;
    try {
      const operation = this.resolve(fn, args);
      payload = toPayload(operation.handler(this.contract, ctx, [...args]));
      if (commit) {
        this.state.apply(stub.getWriteSet());
      }
    } catch (error) {
      const code: ContractErrorCode = isContractError(error) ? error.code : 'STORAGE';
      const message = errorMessage(error);
      logger.warn('ContractHost', 'Invocation rejected', { fn, txId, caller: identity.getID(), code, message });
      return { ok: false, txId, error: { code, message } };
    }

    if (!commit) {
      return { ok: true, txId, payload };
    }

    const event = this.record(txId, fn, stub.getEvent());
    logger.info('ContractHost', 'Transaction committed', {
      fn,
      txId,
      writes: stub.getWriteSet().length,
      event: event?.name,
    });
    return event ? { ok: true, txId, payload, event } : { ok: true, txId, payload };
  }

  /** The write set is already committed here, so a failure is logged and the result stays ok. */
  private record(txId: string, fn: string, event: ContractEvent | undefined): RecordedEvent | undefined {
    if (!event) return undefined;
    try {
      return this.events.append(txId, event);
    } catch (error) {
      logger.error('ContractHost', 'Committed transaction event not recorded', {
        fn,
        txId,
        event: event.name,
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private resolve(fn: string, args: readonly string[]): OperationSpec {
    const operation = Object.prototype.hasOwnProperty.call(OPERATIONS, fn) ? OPERATIONS[fn] : undefined;
    if (!operation) {
      throw new InvalidArgumentError(`unknown function ${JSON.stringify(fn)}`);
    }
    if (args.length !== operation.params.length) {
      throw new InvalidArgumentError(
        `${fn} expects ${operation.params.length} argument(s) (${operation.params.join(', ')}), got ${args.length}`
      );
    }
    return operation;
  }
}
