/**
 * Contract error taxonomy.
 *
 * Every failed invocation surfaces one of these; the host maps the code onto
 * its result envelope and the API server onto an HTTP status.
 */

export type ContractErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'CONFLICT'
  | 'STORAGE';

export class ContractError extends Error {
  readonly code: ContractErrorCode;

  constructor(code: ContractErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidArgumentError extends ContractError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class NotFoundError extends ContractError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class UnauthorizedError extends ContractError {
  constructor(message: string) {
    super('UNAUTHORIZED', message);
  }
}

export class ConflictError extends ContractError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

/** Accessor failures and records that no longer decode. */
export class StorageError extends ContractError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE', message, cause === undefined ? undefined : { cause });
  }
}

export function isContractError(error: unknown): error is ContractError {
  return error instanceof ContractError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
