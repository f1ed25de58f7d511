import { describe, it, expect } from "vitest";
import { LanguageTag, parseLanguageTag } from "../src/languageTag.js";
import { scanLanguageTag } from "../src/parser.js";
import { expectParseError, parseOrFail } from "./test-utils.js";

describe("parse: normalization", () => {
  it("keeps an already normalized tag as is", () => {
    expect(parseOrFail("fr-BE").asText()).toBe("fr-BE");
  });

  it("normalizes the case of every component", () => {
    const tag = parseOrFail("EN-latn-gb-BOONT-R-Extended-Sequence-X-Private");
    expect(tag.asText()).toBe("en-Latn-GB-boont-r-extended-sequence-x-private");
    expect(parseOrFail("zh-HANT-tw").asText()).toBe("zh-Hant-TW");
    expect(parseOrFail("ES-419").asText()).toBe("es-419");
  });

  it("produces text that parses to an identical tag", () => {
    for (const text of [
      "EN-latn-gb-BOONT-R-Extended-Sequence-X-Private",
      "zh-YUE-hk",
      "DE-ch-1996",
      "I-Klingon",
      "X-Whatever",
    ]) {
      const once = parseOrFail(text);
      const twice = parseOrFail(once.asText());
      expect(twice.equals(once)).toBe(true);
      expect(twice.boundaries).toEqual(once.boundaries);
    }
  });
});

describe("parse: boundaries", () => {
  it("records the end of every component", () => {
    expect(
      parseOrFail("en-Latn-GB-boont-r-extended-sequence-x-private").boundaries
    ).toEqual({
      languageEnd: 2,
      extlangEnd: 2,
      scriptEnd: 7,
      regionEnd: 10,
      variantEnd: 16,
      extensionEnd: 36,
    });
  });

  it("collapses absent components onto the previous boundary", () => {
    expect(parseOrFail("zh-yue-HK").boundaries).toEqual({
      languageEnd: 2,
      extlangEnd: 6,
      scriptEnd: 6,
      regionEnd: 9,
      variantEnd: 9,
      extensionEnd: 9,
    });
    expect(parseOrFail("en-x-twain").boundaries).toEqual({
      languageEnd: 2,
      extlangEnd: 2,
      scriptEnd: 2,
      regionEnd: 2,
      variantEnd: 2,
      extensionEnd: 2,
    });
  });
});

describe("parse: grammar", () => {
  it("accepts up to three extended languages after a short language", () => {
    expect(parseOrFail("zh-aaa-bbb-ccc").extendedLanguageSubtags).toEqual([
      "aaa",
      "bbb",
      "ccc",
    ]);
    expectParseError("zh-aaa-bbb-ccc-ddd", "TooManyExtlangs");
  });

  it("does not accept extended languages after a long language", () => {
    expectParseError("abcd-abc", "InvalidSubtag");
  });

  it("accepts numeric regions and digit-led variants", () => {
    expect(parseOrFail("es-419").region).toBe("419");
    expect(parseOrFail("de-1996").variant).toBe("1996");
    expect(parseOrFail("de-CH-1901").variantSubtags).toEqual(["1901"]);
  });

  it("rejects subtags out of order", () => {
    expectParseError("en-GB-Latn", "InvalidSubtag");
    expectParseError("en-Latn-Cyrl", "InvalidSubtag");
    expectParseError("en-GB-US", "InvalidSubtag");
    expectParseError("en-Latn-abc", "InvalidSubtag");
  });

  it("keeps singletons inside private use as private use", () => {
    const tag = parseOrFail("en-a-bbb-x-a-ccc");
    expect(tag.extension).toBe("a-bbb");
    expect(tag.privateUseSubtags).toEqual(["a", "ccc"]);
  });
});

describe("parse: errors", () => {
  it("rejects empty subtags", () => {
    expectParseError("", "EmptySubtag");
    expectParseError("en--GB", "EmptySubtag");
    expectParseError("-en", "EmptySubtag");
    expectParseError("en-", "EmptySubtag");
    expectParseError("en-GB--x", "EmptySubtag");
  });

  it("rejects subtags longer than eight characters", () => {
    expectParseError("en-abcdefghi", "SubtagTooLong");
    expectParseError("abcdefghi", "SubtagTooLong");
  });

  it("measures subtag length in UTF-8 bytes", () => {
    expectParseError("en\u00e9\u00e9\u00e9\u00e9", "SubtagTooLong");
    expectParseError("en-\u00e9\u00e9\u00e9\u00e9\u00e9", "SubtagTooLong");
    expectParseError("\u00e9\u00e9\u00e9\u00e9", "InvalidLanguage");
  });

  it("rejects invalid primary languages", () => {
    expectParseError("e", "InvalidLanguage");
    expectParseError("12", "InvalidLanguage");
    expectParseError("x", "InvalidLanguage");
    expectParseError("é", "InvalidLanguage");
  });

  it("rejects unknown subtag shapes", () => {
    expectParseError("en-é", "InvalidSubtag");
    expectParseError("en-u-é", "InvalidSubtag");
    expectParseError("en-x-é", "InvalidSubtag");
  });

  it("requires a value after an extension singleton", () => {
    expectParseError("en-a", "EmptyExtension");
    expectParseError("en-a-b-foo", "EmptyExtension");
    expectParseError("en-a-x-foo", "EmptyExtension");
  });

  it("requires a value after the private use singleton", () => {
    expectParseError("en-x", "EmptyPrivateUse");
    expectParseError("en-a-bbb-x", "EmptyPrivateUse");
  });

  it("is also exposed as a plain function", () => {
    expect(parseLanguageTag("en-GB-")).toMatchObject({
      ok: false,
      error: "EmptySubtag",
    });
  });

  it("reports a message alongside the error code", () => {
    expect(LanguageTag.parse("en-a")).toEqual({
      ok: false,
      error: "EmptyExtension",
      message: "If an extension subtag is present, it must not be empty",
    });
  });
});

describe("parse: special cases", () => {
  it("keeps grandfathered tags in their registered spelling", () => {
    expect(parseOrFail("I-KLINGON").asText()).toBe("i-klingon");
    expect(parseOrFail("sgn-be-fr").asText()).toBe("sgn-BE-FR");
    expect(scanLanguageTag("zh-min-nan")).toEqual({
      ok: true,
      value: {
        serialization: "zh-min-nan",
        boundaries: {
          languageEnd: 10,
          extlangEnd: 10,
          scriptEnd: 10,
          regionEnd: 10,
          variantEnd: 10,
          extensionEnd: 10,
        },
      },
    });
  });

  it("matches grandfathered tags by ASCII case only", () => {
    // U+212A KELVIN SIGN lowercases to "k" under full Unicode folding
    expectParseError("i-\u212Alingon", "InvalidLanguage");
    expectParseError("no-bo\u212A", "InvalidSubtag");
    expectParseError("zh-ha\u212A\u212Aa", "SubtagTooLong");
  });

  it("lowercases private use only tags", () => {
    const tag = parseOrFail("X-Whatever-Else");
    expect(tag.asText()).toBe("x-whatever-else");
    expect(tag.privateUseSubtags).toEqual(["whatever", "else"]);
  });

  it("checks private use only tags", () => {
    expectParseError("x-", "EmptyPrivateUse");
    expectParseError("x-foo_bar", "ForbiddenChar");
    expectParseError("x-a--b", "EmptySubtag");
    expectParseError("x-a-", "EmptySubtag");
    expectParseError("x-abcdefghi", "SubtagTooLong");
  });
});
