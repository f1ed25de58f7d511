/**
 * ASCII character-class predicates. Every predicate is false for the empty
 * string, and none of them accepts non-ASCII letters or digits.
 */

export function isAlphabetic(value: string): boolean {
  return /^[A-Za-z]+$/.test(value);
}

export function isNumeric(value: string): boolean {
  return /^[0-9]+$/.test(value);
}

export function isAlphanumeric(value: string): boolean {
  return /^[A-Za-z0-9]+$/.test(value);
}

export function isAlphanumericOrDash(value: string): boolean {
  return /^[A-Za-z0-9-]+$/.test(value);
}

// ASCII-only folding: output length always equals input length.

export function toLowerAscii(value: string): string {
  return value.replace(/[A-Z]/g, (c) => c.toLowerCase());
}

export function toUpperAscii(value: string): string {
  return value.replace(/[a-z]/g, (c) => c.toUpperCase());
}

/** Upper-cases the first character and lower-cases the rest (e.g. "latn" → "Latn"). */
export function toTitleAscii(value: string): string {
  return toUpperAscii(value.slice(0, 1)) + toLowerAscii(value.slice(1));
}

const utf8 = new TextEncoder();

/** Length in UTF-8 bytes; equals `value.length` for ASCII text. */
export function byteLength(value: string): number {
  return utf8.encode(value).length;
}
