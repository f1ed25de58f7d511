import type { ParseError, ValidationError } from "./types.js";

export const PARSE_ERROR_MESSAGES: Readonly<Record<ParseError, string>> = {
  EmptyExtension: "If an extension subtag is present, it must not be empty",
  EmptyPrivateUse: "If the `x` subtag is present, it must not be empty",
  ForbiddenChar: "The language tag contains a char not allowed",
  InvalidSubtag: "A subtag fails to parse, it does not match any other subtags",
  InvalidLanguage: "The given language subtag is invalid",
  SubtagTooLong: "A subtag may be eight characters in length at maximum",
  EmptySubtag: "A subtag should not be empty",
  TooManyExtlangs: "At maximum three extlangs are allowed",
};

export const VALIDATION_ERROR_MESSAGES: Readonly<
  Record<ValidationError, string>
> = {
  DuplicateVariant: "The same variant subtag is only allowed once in a tag",
  DuplicateExtension: "The same extension subtag is only allowed once in a tag",
  MultipleExtendedLanguageSubtags:
    "Only one extended language subtag is allowed",
};

export type LanguageTagErrorCode = ParseError | "NotALanguageRange";

/** Thrown where a caller broke a precondition or asked for an exception. */
export class LanguageTagError extends Error {
  constructor(
    public readonly code: LanguageTagErrorCode,
    message: string
  ) {
    super(message);
    this.name = "LanguageTagError";
  }
}

/** Raised by the codec when an encoded value cannot be turned back into a tag. */
export class DeserializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeserializationError";
  }
}
