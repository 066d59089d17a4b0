/**
 * Client identity of the current invocation, as supplied by the
 * authentication layer in front of the host.
 */

import { InvalidArgumentError } from '../errors';

export interface ClientIdentity {
  /** Unique identifier of the calling principal. */
  getID(): string;
  /** Organization (membership service provider) the caller belongs to. */
  getMSPID(): string;
}

export class StaticClientIdentity implements ClientIdentity {
  constructor(private readonly id: string, private readonly mspId: string) {
    if (!id) {
      throw new InvalidArgumentError('client identity must not be empty');
    }
  }

  getID(): string {
    return this.id;
  }

  getMSPID(): string {
    return this.mspId;
  }
}

/**
 * Decides whether an identity is a known, addressable principal. Consulted
 * before a per-token approval is granted.
 */
export interface IdentityDirectory {
  isKnown(id: string): boolean;
}

/** Every non-empty identity is known. */
export class OpenDirectory implements IdentityDirectory {
  isKnown(id: string): boolean {
    return id.length > 0;
  }
}

export class StaticDirectory implements IdentityDirectory {
  private readonly ids: ReadonlySet<string>;

  constructor(ids: Iterable<string>) {
    this.ids = new Set(Array.from(ids).filter((id) => id.length > 0));
  }

  isKnown(id: string): boolean {
    return this.ids.has(id);
  }
}
