import { InvalidInputError } from '@/lib/errors';

export interface ProcessOptions {
  /** Drop every code point outside 7-bit ASCII before normalizing. */
  forceAscii?: boolean;
}

const NON_ASCII = /[^\u0000-\u007F]/gu;
const NON_ALPHANUMERIC = /[^\p{L}\p{N}]/gu;
const WHITESPACE_RUN = /\s+/g;

/**
 * Turn a scorer input into text. Numbers, bigints and booleans use their display form,
 * so two equal values always produce equal strings.
 */
export function coerceToText(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'bigint':
    case 'boolean':
      return String(value);
    default:
      throw new InvalidInputError(
        `Cannot compare a value of type ${value === null ? 'null' : typeof value}; expected a string, number, bigint or boolean`
      );
  }
}

export function asciiOnly(s: string): string {
  return s.replace(NON_ASCII, '');
}

/**
 * Normalize a value for comparison:
 * 1. Coerce to text (optionally ASCII only)
 * 2. Replace anything that is not a letter or number with a space
 * 3. Collapse whitespace + trim
 * 4. Lowercase
 */
export function fullProcess(value: unknown, options: ProcessOptions = {}): string {
  let s = coerceToText(value);
  if (options.forceAscii) s = asciiOnly(s);
  s = s.replace(NON_ALPHANUMERIC, ' ');
  s = s.replace(WHITESPACE_RUN, ' ').trim();
  return s.toLowerCase();
}

/** A processed string is comparable only if something is left of it. */
export function validateString(s: string): boolean {
  return s.length > 0;
}
