import { isAlphabetic, isAlphanumeric, isNumeric } from "../charset.js";

/**
 * Shape guards for single subtags per RFC 5646 section 2.1. They check
 * length and character class only, in any letter case; membership in the
 * IANA registry is not checked.
 */

/** Primary language: 2–8 letters. */
export function isLanguageSubtag(value: string): boolean {
  return value.length >= 2 && value.length <= 8 && isAlphabetic(value);
}

/** Extended language: exactly 3 letters. */
export function isExtlangSubtag(value: string): boolean {
  return value.length === 3 && isAlphabetic(value);
}

/** Script subtag per ISO 15924: 4 letters (e.g., Latn, Cyrl, Hans). */
export function isScriptSubtag(value: string): boolean {
  return value.length === 4 && isAlphabetic(value);
}

/**
 * Region per BCP 47:
 * - ISO 3166-1 alpha-2: 2 letters (e.g., GB, US)
 * - UN M.49 numeric: 3 digits (e.g., 419 for Latin America)
 */
export function isRegionSubtag(value: string): boolean {
  return (
    (value.length === 2 && isAlphabetic(value)) ||
    (value.length === 3 && isNumeric(value))
  );
}

/** Variant: 5–8 alnum starting with a letter, or 4–8 starting with a digit. */
export function isVariantSubtag(value: string): boolean {
  if (value.length > 8 || !isAlphanumeric(value)) return false;
  return isNumeric(value.slice(0, 1)) ? value.length >= 4 : value.length >= 5;
}

/** Extension singleton: any alnum except 'x', which opens private use. */
export function isExtensionSingleton(value: string): boolean {
  return value.length === 1 && isAlphanumeric(value) && !isPrivateUseSingleton(value);
}
export function isExtensionSubtag(value: string): boolean {
  return value.length >= 2 && value.length <= 8 && isAlphanumeric(value);
}

export function isPrivateUseSingleton(value: string): boolean {
  return value === "x" || value === "X";
}
export function isPrivateUseSubtag(value: string): boolean {
  return value.length >= 1 && value.length <= 8 && isAlphanumeric(value);
}
