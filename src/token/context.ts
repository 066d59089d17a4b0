import { ClientIdentity } from '../identity';
import { LedgerStub } from '../ledger';

/**
 * Everything one transition may touch: the ledger accessor and the caller.
 * Passed explicitly to each operation.
 */
export interface TransactionContext {
  stub: LedgerStub;
  clientIdentity: ClientIdentity;
}
