export { LanguageTag, parseLanguageTag, filterLanguageTags } from "./languageTag.js";
export { languageTagCodec, languageTagReviver } from "./codec.js";
export {
  LanguageTagError,
  DeserializationError,
  PARSE_ERROR_MESSAGES,
  VALIDATION_ERROR_MESSAGES,
} from "./errors.js";
export type { LanguageTagErrorCode } from "./errors.js";
export {
  DEPRECATED_LANGUAGES,
  DEPRECATED_REGIONS,
  GRANDFATHERED,
  findGrandfathered,
  deprecatedLanguageReplacement,
  deprecatedRegionReplacement,
} from "./registry.js";
export {
  isAlphabetic,
  isNumeric,
  isAlphanumeric,
  isAlphanumericOrDash,
} from "./charset.js";
export type * from "./types.js";
export * from "./validation/index.js";
