import { LanguageTag } from "../languageTag.js";
import type { LanguageValidationMode } from "../types.js";

/**
 * Validates a BCP 47 language tag, e.g.:
 *  - plain language: "en"
 *  - language + region: "en-GB"
 *  - language + script + region: "sr-Cyrl-RS"
 *  - language + variants: "sl-rozaj-biske", "de-CH-1996"
 *  - extensions: "en-GB-u-ca-gregory"
 *  - private-use: "en-x-klingon" or just "x-piglatin"
 *  - grandfathered: "i-klingon"
 *
 * @param options.mode
 *   - "valid" (default): well-formed and free of duplicate variants,
 *     duplicate extension singletons and repeated extlangs.
 *   - "well-formed": only the RFC 5646 grammar is checked.
 *   - "range": well-formed and usable as a language range (no extension
 *     or private use subtags).
 */
export function validateLanguage(
  value: unknown,
  options?: { mode?: LanguageValidationMode }
): boolean {
  const mode = options?.mode ?? "valid";

  if (typeof value !== "string") return false;

  const result = LanguageTag.parse(value);
  if (!result.ok) return false;

  if (mode === "well-formed") return true;
  if (mode === "range") return result.value.isLanguageRange();
  return result.value.isValid();
}

export function validateLanguageRange(value: unknown): boolean {
  return validateLanguage(value, { mode: "range" });
}

export function validateLanguageArray(value: unknown): boolean {
  if (!Array.isArray(value)) return false;
  return value.every((item) => validateLanguage(item));
}
