import { describe, it, expect } from "vitest";
import {
  isExtensionSingleton,
  isExtensionSubtag,
  isExtlangSubtag,
  isLanguageSubtag,
  isPrivateUseSingleton,
  isPrivateUseSubtag,
  isRegionSubtag,
  isScriptSubtag,
  isVariantSubtag,
  validateLanguage,
  validateLanguageArray,
  validateLanguageRange,
} from "../src/validation/index.js";

describe("validateLanguage", () => {
  it("accepts BCP47 language tags", () => {
    expect(validateLanguage("en")).toBe(true);
    expect(validateLanguage("sr-Cyrl-RS")).toBe(true);
    expect(validateLanguage("en-GB-u-ca-gregory")).toBe(true);
    expect(validateLanguage("x-piglatin")).toBe(true);
    expect(validateLanguage("i-klingon")).toBe(true);
  });

  it("rejects malformed language tags", () => {
    expect(validateLanguage("en-GB-123456789")).toBe(false); // subtag too long
    expect(validateLanguage("")).toBe(false);
    expect(validateLanguage(42)).toBe(false);
    expect(validateLanguage(undefined)).toBe(false);
    expect(validateLanguage("no-bo\u212A")).toBe(false);
    expect(validateLanguage("zh-ha\u212A\u212Aa")).toBe(false);
  });

  it("applies the requested conformance level", () => {
    expect(validateLanguage("de-1901-1901")).toBe(false);
    expect(validateLanguage("de-1901-1901", { mode: "valid" })).toBe(false);
    expect(validateLanguage("de-1901-1901", { mode: "well-formed" })).toBe(true);
    expect(validateLanguage("en-x-foo", { mode: "range" })).toBe(false);
    expect(validateLanguage("en-GB", { mode: "range" })).toBe(true);
  });
});

describe("validateLanguageRange", () => {
  it("accepts only tags without extensions or private use", () => {
    expect(validateLanguageRange("de-CH-1996")).toBe(true);
    expect(validateLanguageRange("de-u-co-phonebk")).toBe(false);
    expect(validateLanguageRange("en--GB")).toBe(false);
  });
});

describe("validateLanguageArray", () => {
  it("validates every entry", () => {
    expect(validateLanguageArray(["en", "fr-BE"])).toBe(true);
    expect(validateLanguageArray(["en", "en--GB"])).toBe(false);
    expect(validateLanguageArray("en")).toBe(false);
  });
});

describe("subtag shapes", () => {
  it("checks language and extended language subtags", () => {
    expect(isLanguageSubtag("en")).toBe(true);
    expect(isLanguageSubtag("e")).toBe(false);
    expect(isLanguageSubtag("abcdefghi")).toBe(false);
    expect(isExtlangSubtag("YUE")).toBe(true);
    expect(isExtlangSubtag("yu1")).toBe(false);
  });

  it("checks script and region subtags in any case", () => {
    expect(isScriptSubtag("latn")).toBe(true);
    expect(isScriptSubtag("Lat1")).toBe(false);
    expect(isRegionSubtag("gb")).toBe(true);
    expect(isRegionSubtag("419")).toBe(true);
    expect(isRegionSubtag("41")).toBe(false);
    expect(isRegionSubtag("GBR")).toBe(false);
  });

  it("checks variant subtags by leading character", () => {
    expect(isVariantSubtag("1996")).toBe(true);
    expect(isVariantSubtag("rozaj")).toBe(true);
    expect(isVariantSubtag("abcd")).toBe(false);
    expect(isVariantSubtag("123")).toBe(false);
    expect(isVariantSubtag("123456789")).toBe(false);
  });

  it("checks extension and private use subtags", () => {
    expect(isExtensionSingleton("u")).toBe(true);
    expect(isExtensionSingleton("7")).toBe(true);
    expect(isExtensionSingleton("x")).toBe(false);
    expect(isExtensionSingleton("X")).toBe(false);
    expect(isExtensionSubtag("a")).toBe(false);
    expect(isExtensionSubtag("gregory")).toBe(true);
    expect(isPrivateUseSingleton("X")).toBe(true);
    expect(isPrivateUseSubtag("a")).toBe(true);
    expect(isPrivateUseSubtag("toolongxx")).toBe(false);
  });
});
