import {
  LanguageTagError,
  PARSE_ERROR_MESSAGES,
  VALIDATION_ERROR_MESSAGES,
} from "./errors.js";
import {
  scanLanguageTag,
  scanRegularTag,
  singleComponent,
  type ScannedTag,
} from "./parser.js";
import {
  deprecatedLanguageReplacement,
  deprecatedRegionReplacement,
  grandfatheredReplacement,
} from "./registry.js";
import { toLowerAscii } from "./charset.js";
import { splitExtensions, splitSubtagList } from "./subtags.js";
import type {
  CanonicalizeOptions,
  ExtensionSubtag,
  ParseResult,
  TagBoundaries,
  TagValidationResult,
  ValidationError,
} from "./types.js";

const RENAMED_VARIANTS: ReadonlyMap<string, string> = new Map([
  ["heploc", "alalc97"],
]);

/**
 * A language tag as described in RFC 5646.
 *
 * The normalized serialization is the single source of truth; every
 * component is a slice of it delimited by the stored boundaries. Instances
 * are immutable and only come out of {@link LanguageTag.parse} or
 * {@link LanguageTag.canonicalize}.
 *
 * @example
 * const tag = LanguageTag.from("en-x-twain");
 * tag.primaryLanguage; // "en"
 * tag.privateUseSubtags; // ["twain"]
 */
export class LanguageTag {
  private readonly serialization: string;
  private readonly bounds: Readonly<TagBoundaries>;

  private constructor({ serialization, boundaries }: ScannedTag) {
    this.serialization = serialization;
    this.bounds = Object.freeze({ ...boundaries });
  }

  /**
   * Parses a "well-formed" tag. Run {@link validate} on the result for the
   * stricter "valid" conformance level.
   */
  static parse(text: string): ParseResult {
    const scanned = scanLanguageTag(text);
    if (!scanned.ok) {
      return {
        ok: false,
        error: scanned.error,
        message: PARSE_ERROR_MESSAGES[scanned.error],
      };
    }
    return { ok: true, value: new LanguageTag(scanned.value) };
  }

  /** Like {@link parse}, but throws a {@link LanguageTagError} on malformed input. */
  static from(text: string): LanguageTag {
    const result = LanguageTag.parse(text);
    if (!result.ok) {
      throw new LanguageTagError(result.error, `${result.message}: "${text}"`);
    }
    return result.value;
  }

  asText(): string {
    return this.serialization;
  }

  toString(): string {
    return this.serialization;
  }

  toJSON(): string {
    return this.serialization;
  }

  /** The component boundaries, as end offsets into {@link asText}. */
  get boundaries(): Readonly<TagBoundaries> {
    return this.bounds;
  }

  /** Tags are equal when their normalized serializations are. */
  equals(other: LanguageTag): boolean {
    return this.serialization === other.serialization;
  }

  get primaryLanguage(): string {
    return this.serialization.slice(0, this.bounds.languageEnd);
  }

  /** All extended language subtags, dash-joined. Valid tags have at most one. */
  get extendedLanguage(): string | undefined {
    return this.component(this.bounds.languageEnd, this.bounds.extlangEnd);
  }

  get extendedLanguageSubtags(): string[] {
    return splitSubtagList(this.extendedLanguage);
  }

  /** Primary language together with its extended language subtags. */
  get fullLanguage(): string {
    return this.serialization.slice(0, this.bounds.extlangEnd);
  }

  get script(): string | undefined {
    return this.component(this.bounds.extlangEnd, this.bounds.scriptEnd);
  }

  get region(): string | undefined {
    return this.component(this.bounds.scriptEnd, this.bounds.regionEnd);
  }

  get variant(): string | undefined {
    return this.component(this.bounds.regionEnd, this.bounds.variantEnd);
  }

  get variantSubtags(): string[] {
    return splitSubtagList(this.variant);
  }

  /** Every extension block, singletons included, e.g. "u-ca-gregory". */
  get extension(): string | undefined {
    return this.component(this.bounds.variantEnd, this.bounds.extensionEnd);
  }

  get extensionSubtags(): ExtensionSubtag[] {
    return splitExtensions(this.extension);
  }

  /** The private use part including its leading "x", e.g. "x-twain". */
  get privateUse(): string | undefined {
    if (this.serialization.startsWith("x-")) return this.serialization;
    if (this.bounds.extensionEnd === this.serialization.length) return undefined;
    return this.serialization.slice(this.bounds.extensionEnd + 1);
  }

  get privateUseSubtags(): string[] {
    return splitSubtagList(this.privateUse?.slice(2));
  }

  /** A language range has neither extensions nor private use subtags. */
  isLanguageRange(): boolean {
    return this.extension === undefined && this.privateUse === undefined;
  }

  /**
   * Checks the "valid" conformance level of RFC 5646 section 2.2.9, except
   * for registry membership of each subtag.
   */
  validate(): TagValidationResult {
    const variants = this.variantSubtags;
    if (variants.some((variant, i) => variants.indexOf(variant) !== i)) {
      return invalid("DuplicateVariant");
    }

    const seen = new SingletonSet();
    for (const subtag of splitSubtagList(this.extension)) {
      if (subtag.length !== 1) continue;
      if (seen.has(subtag)) return invalid("DuplicateExtension");
      seen.add(subtag);
    }

    // RFC 5646 errata 5457
    if (this.extendedLanguage?.includes("-")) {
      return invalid("MultipleExtendedLanguageSubtags");
    }

    return { valid: true };
  }

  isValid(): boolean {
    return this.validate().valid;
  }

  /**
   * Returns the canonical form of this tag. It currently:
   *
   * - replaces grandfathered tags with their preferred value, if any;
   * - promotes the extended language to primary language;
   * - replaces deprecated languages and regions with their successors;
   * - replaces the `heploc` variant with `alalc97`.
   *
   * This is not the full algorithm of RFC 5646 section 4.5 and the result
   * is not validated.
   */
  canonicalize(options: CanonicalizeOptions = {}): LanguageTag {
    const { log } = options;

    const preferred = grandfatheredReplacement(this.primaryLanguage);
    if (preferred !== undefined) {
      log?.(`Replacing grandfathered tag ${this.primaryLanguage} → ${preferred}`);
      const rescanned = scanRegularTag(preferred);
      return new LanguageTag(
        rescanned.ok ? rescanned.value : singleComponent(preferred)
      );
    }
    if (this.serialization.startsWith("x-")) return this;

    const [promoted, ...extlangs] = this.extendedLanguageSubtags;
    let language = this.primaryLanguage;
    if (promoted !== undefined) {
      log?.(`Promoting extended language ${promoted} over ${language}`);
      language = promoted;
    }
    const modernLanguage = deprecatedLanguageReplacement(language);
    if (modernLanguage !== undefined) {
      log?.(`Replacing deprecated language ${language} → ${modernLanguage}`);
      language = modernLanguage;
    }

    const builder = new TagBuilder(language);
    for (const extlang of extlangs) builder.push(extlang);
    const extlangEnd = builder.length;

    if (this.script !== undefined) builder.push(this.script);
    const scriptEnd = builder.length;

    const region = this.region;
    if (region !== undefined) {
      const modernRegion = deprecatedRegionReplacement(region);
      if (modernRegion !== undefined) {
        log?.(`Replacing deprecated region ${region} → ${modernRegion}`);
      }
      builder.push(modernRegion ?? region);
    }
    const regionEnd = builder.length;

    for (const variant of this.variantSubtags) {
      const renamed = RENAMED_VARIANTS.get(variant);
      if (renamed !== undefined) {
        log?.(`Replacing deprecated variant ${variant} → ${renamed}`);
      }
      builder.push(renamed ?? variant);
    }
    const variantEnd = builder.length;

    if (this.extension !== undefined) builder.push(this.extension);
    const extensionEnd = builder.length;

    if (this.privateUse !== undefined) builder.push(this.privateUse);

    return new LanguageTag({
      serialization: builder.toString(),
      boundaries: {
        languageEnd: language.length,
        extlangEnd,
        scriptEnd,
        regionEnd,
        variantEnd,
        extensionEnd,
      },
    });
  }

  /**
   * Basic filtering of RFC 4647 with this tag as the language range.
   * Components the range leaves out match anything; variants are compared
   * pairwise up to the shorter of the two lists.
   *
   * @throws LanguageTagError if this tag is not a language range.
   *
   * @example
   * LanguageTag.from("de").matches(LanguageTag.from("de-AT")); // true
   * LanguageTag.from("de-AT").matches(LanguageTag.from("de")); // false
   */
  matches(other: LanguageTag): boolean {
    if (!this.isLanguageRange()) {
      throw new LanguageTagError(
        "NotALanguageRange",
        `"${this.serialization}" has extension or private use subtags and cannot be used as a language range`
      );
    }
    const rangeVariants = this.variantSubtags;
    const tagVariants = other.variantSubtags;
    const shared = Math.min(rangeVariants.length, tagVariants.length);
    return (
      this.fullLanguage === other.fullLanguage &&
      matchesOptional(this.script, other.script) &&
      matchesOptional(this.region, other.region) &&
      rangeVariants.slice(0, shared).every((v, i) => v === tagVariants[i])
    );
  }

  private component(start: number, end: number): string | undefined {
    return start === end ? undefined : this.serialization.slice(start + 1, end);
  }
}

function invalid(error: ValidationError): TagValidationResult {
  return { valid: false, error, message: VALIDATION_ERROR_MESSAGES[error] };
}

function matchesOptional(
  range: string | undefined,
  tag: string | undefined
): boolean {
  return range === undefined || range === tag;
}

/** Presence set over the 36 possible singletons (a–z, 0–9). */
class SingletonSet {
  private readonly slots: boolean[] = new Array<boolean>(36).fill(false);

  has(singleton: string): boolean {
    const slot = SingletonSet.slotOf(singleton);
    return slot !== -1 && this.slots[slot] === true;
  }

  add(singleton: string): void {
    const slot = SingletonSet.slotOf(singleton);
    if (slot !== -1) this.slots[slot] = true;
  }

  private static slotOf(singleton: string): number {
    const code = toLowerAscii(singleton).charCodeAt(0);
    if (code >= 0x61 && code <= 0x7a) return code - 0x61;
    if (code >= 0x30 && code <= 0x39) return 26 + code - 0x30;
    return -1;
  }
}

class TagBuilder {
  private text: string;

  constructor(first: string) {
    this.text = first;
  }

  get length(): number {
    return this.text.length;
  }

  push(component: string): void {
    this.text += "-" + component;
  }

  toString(): string {
    return this.text;
  }
}

/** Parses a tag; see {@link LanguageTag.parse}. */
export function parseLanguageTag(text: string): ParseResult {
  return LanguageTag.parse(text);
}

/**
 * Keeps the tags matched by a single language range, in their original
 * order.
 */
export function filterLanguageTags(
  range: LanguageTag,
  tags: Iterable<LanguageTag>
): LanguageTag[] {
  const out: LanguageTag[] = [];
  for (const tag of tags) {
    if (range.matches(tag)) out.push(tag);
  }
  return out;
}
