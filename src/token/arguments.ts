/**
 * Parsing of the string arguments operations receive at the boundary.
 */

import { InvalidArgumentError } from '../errors';

const INTEGER_PATTERN = /^-?\d+$/;

export interface TokenId {
  value: number;
  /** Canonical decimal form used as the key segment. */
  key: string;
}

export function parseTokenId(raw: string): TokenId {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new InvalidArgumentError(`tokenID ${JSON.stringify(raw)} is invalid. tokenID must be an integer`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`tokenID ${JSON.stringify(raw)} is out of range`);
  }
  // Number('-0') is -0; String(-0) is "0", so both spell the same key.
  return { value: value === 0 ? 0 : value, key: String(value) };
}

export function parseBoolean(raw: string, name: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw new InvalidArgumentError(`${name} must be "true" or "false", got ${JSON.stringify(raw)}`);
  }
}

export function requireIdentity(raw: string, name: string): string {
  if (!raw) {
    throw new InvalidArgumentError(`${name} must not be empty`);
  }
  return raw;
}
