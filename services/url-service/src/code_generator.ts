import { nanoid, urlAlphabet } from "nanoid";

export const CODE_ALPHABET = urlAlphabet;

export const SHORT_CODE_LENGTH = 6;
export const RECORD_ID_LENGTH = 10;

/**
 * Random identifier of `length` characters drawn from nanoid's URL-safe alphabet.
 * Uniqueness is probabilistic only; callers that need it must check.
 */
export function generateCode(length: number): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`code length must be a positive integer, got ${length}`);
  }
  return nanoid(length);
}
