/**
 * Composite keys
 *
 * Layout: NUL + objectType + NUL + (attribute + NUL)*. Every key of one
 * object type, and every key sharing a leading run of attributes, is a
 * contiguous range in an ordered namespace, which is what partial-key
 * scans rely on.
 */

import { InvalidArgumentError } from '../errors';

export const COMPOSITE_KEY_NAMESPACE = '\u0000';
export const MIN_UNICODE_RUNE = '\u0000';
export const MAX_UNICODE_RUNE = '\u{10FFFF}';

export interface CompositeKeyParts {
  objectType: string;
  attributes: string[];
}

function validateSegment(segment: string, what: string): void {
  for (const ch of segment) {
    if (ch === MIN_UNICODE_RUNE || ch === MAX_UNICODE_RUNE) {
      throw new InvalidArgumentError(
        `${what} "${segment.replace(/[\u0000\u{10FFFF}]/gu, '?')}" contains a reserved character`
      );
    }
  }
}

export function createCompositeKey(objectType: string, attributes: readonly string[]): string {
  if (!objectType) {
    throw new InvalidArgumentError('composite key object type must not be empty');
  }
  validateSegment(objectType, 'object type');

  let key = COMPOSITE_KEY_NAMESPACE + objectType + MIN_UNICODE_RUNE;
  for (const attribute of attributes) {
    validateSegment(attribute, 'attribute');
    key += attribute + MIN_UNICODE_RUNE;
  }
  return key;
}

export function isCompositeKey(key: string): boolean {
  return key.startsWith(COMPOSITE_KEY_NAMESPACE);
}

export function splitCompositeKey(key: string): CompositeKeyParts {
  if (!isCompositeKey(key) || !key.endsWith(MIN_UNICODE_RUNE) || key.length < 3) {
    throw new InvalidArgumentError('not a composite key');
  }
  // Drop the leading namespace and the trailing terminator before splitting.
  const [objectType, ...attributes] = key.slice(1, -1).split(MIN_UNICODE_RUNE);
  return { objectType, attributes };
}

/** Half-open [start, end) range covering every key that extends the partial key. */
export function partialKeyRange(objectType: string, attributes: readonly string[]): { start: string; end: string } {
  const start = createCompositeKey(objectType, attributes);
  return { start, end: start + MAX_UNICODE_RUNE };
}
