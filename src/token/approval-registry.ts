/**
 * Approval Registry
 *
 * Blanket operator approvals (approval/[owner, operator]), kept apart from
 * the per-token `approved` field on the token record.
 */

import { LedgerStub } from '../ledger';
import { logger } from '../logging/structured-logger';
import { decodeJson, encodeJson, isOperatorApproval } from './codec';
import { APPROVAL_PREFIX, OperatorApproval } from './types';

export class ApprovalRegistry {
  constructor(private readonly stub: LedgerStub) {}

  private approvalKey(owner: string, operator: string): string {
    return this.stub.createCompositeKey(APPROVAL_PREFIX, [owner, operator]);
  }

  /**
   * Absent or unreadable records grant nothing.
   */
  isApprovedForAll(owner: string, operator: string): boolean {
    if (!owner || !operator) {
      return false;
    }
    const bytes = this.stub.getState(this.approvalKey(owner, operator));
    if (!bytes || bytes.length === 0) {
      return false;
    }

    const record = decodeJson(bytes);
    if (!isOperatorApproval(record)) {
      logger.warn('ApprovalRegistry', 'Ignoring malformed operator approval', { owner, operator });
      return false;
    }
    return record.approved;
  }

  setApprovalForAll(owner: string, operator: string, approved: boolean): OperatorApproval {
    const record: OperatorApproval = { owner, operator, approved };
    this.stub.putState(this.approvalKey(owner, operator), encodeJson(record));
    return record;
  }
}
