import type { LanguageTag } from "./languageTag.js";

/** Reasons a string is not a well-formed language tag. */
export type ParseError =
  | "EmptyExtension"
  | "EmptyPrivateUse"
  | "ForbiddenChar"
  | "InvalidSubtag"
  | "InvalidLanguage"
  | "SubtagTooLong"
  | "EmptySubtag"
  | "TooManyExtlangs";

/** Reasons a well-formed tag is still not "valid" in RFC 5646 terms. */
export type ValidationError =
  | "DuplicateVariant"
  | "DuplicateExtension"
  | "MultipleExtendedLanguageSubtags";

export type ParseResult =
  | { ok: true; value: LanguageTag }
  | { ok: false; error: ParseError; message: string };

export type TagValidationResult =
  | { valid: true }
  | { valid: false; error: ValidationError; message: string };

/**
 * End offsets (exclusive) of each component within the serialization, in
 * grammar order. An absent component ends where the previous one ends.
 */
export interface TagBoundaries {
  languageEnd: number;
  extlangEnd: number;
  scriptEnd: number;
  regionEnd: number;
  variantEnd: number;
  extensionEnd: number;
}

/** A subtag as produced by segmentation, with its end offset in the output. */
export interface Subtag {
  text: string;
  end: number;
}

/** One value of an extension block, keyed by the singleton introducing it. */
export interface ExtensionSubtag {
  singleton: string;
  value: string;
}

export interface GrandfatheredEntry {
  tag: string;
  /** Modern replacement, when the registry names one. */
  preferred: string | null;
}

export interface CanonicalizeOptions {
  /** Receives one line per rewrite applied. */
  log?: (msg: string) => void;
}

export type LanguageValidationMode = "well-formed" | "valid" | "range";
