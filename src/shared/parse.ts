import { NumberFormatError } from '../errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a property value as a base-10 integer.
 * Unlike `parseInt`, trailing garbage ("3x") and blanks are rejected.
 * @throws NumberFormatError
 */
export function parseIntegerProperty(property: string, value: string): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new NumberFormatError(property, value);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new NumberFormatError(property, value);
  }
  return parsed;
}
