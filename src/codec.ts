import { DeserializationError } from "./errors.js";
import { LanguageTag } from "./languageTag.js";

/** Text form of a tag for storage or transport, and back. */
export const languageTagCodec = {
  encode(tag: LanguageTag): string {
    return tag.asText();
  },

  /** @throws DeserializationError when the value is not a well-formed tag. */
  decode(value: unknown): LanguageTag {
    if (typeof value !== "string") {
      throw new DeserializationError(
        `Expected a language tag string, got ${value === null ? "null" : typeof value}`
      );
    }
    const result = LanguageTag.parse(value);
    if (!result.ok) {
      throw new DeserializationError(
        `Invalid language tag "${value}": ${result.message}`,
        { cause: result.error }
      );
    }
    return result.value;
  },
};

/**
 * A `JSON.parse` reviver decoding the named properties into tags.
 *
 * @example
 * JSON.parse('{"lang":"fr-be"}', languageTagReviver("lang")).lang.region; // "BE"
 */
export function languageTagReviver(
  ...keys: string[]
): (key: string, value: unknown) => unknown {
  const wanted = new Set(keys);
  return (key, value) =>
    wanted.has(key) ? languageTagCodec.decode(value) : value;
}
