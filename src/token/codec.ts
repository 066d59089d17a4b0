/**
 * JSON encoding of ledger records and events, and decoding with shape checks.
 */

import { OperatorApproval, Token } from './types';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function encodeJson(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export function encodeText(value: string): Uint8Array {
  return encoder.encode(value);
}

export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/** Parsed JSON, or undefined when the bytes are not UTF-8 JSON. */
export function decodeJson(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(decodeText(bytes));
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isToken(value: unknown): value is Token {
  return isRecord(value) &&
    typeof value.tokenID === 'number' && Number.isSafeInteger(value.tokenID) &&
    typeof value.tokenURI === 'string' &&
    typeof value.owner === 'string' &&
    typeof value.approved === 'string';
}

export function isOperatorApproval(value: unknown): value is OperatorApproval {
  return isRecord(value) &&
    typeof value.owner === 'string' &&
    typeof value.operator === 'string' &&
    typeof value.approved === 'boolean';
}

/** Stored form of a token; fixes the field order of the JSON document. */
export function tokenRecord(token: Token): Token {
  return {
    tokenID: token.tokenID,
    tokenURI: token.tokenURI,
    owner: token.owner,
    approved: token.approved,
  };
}
