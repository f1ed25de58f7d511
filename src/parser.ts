import {
  byteLength,
  isAlphanumeric,
  isAlphanumericOrDash,
  toLowerAscii,
  toTitleAscii,
  toUpperAscii,
} from "./charset.js";
import { findGrandfathered } from "./registry.js";
import { segmentSubtags } from "./subtags.js";
import type { ParseError, TagBoundaries } from "./types.js";
import {
  isExtensionSingleton,
  isExtlangSubtag,
  isLanguageSubtag,
  isPrivateUseSingleton,
  isRegionSubtag,
  isScriptSubtag,
  isVariantSubtag,
} from "./validation/subtag.RFC5646.js";

/** Normalized serialization plus component boundaries, before it becomes a tag. */
export interface ScannedTag {
  serialization: string;
  boundaries: TagBoundaries;
}

export type ScanResult =
  | { ok: true; value: ScannedTag }
  | { ok: false; error: ParseError };

const MAX_SUBTAG_LENGTH = 8;
const MAX_EXTLANGS = 3;

type PositionalState =
  | "afterLanguage"
  | "afterExtlang"
  | "afterScript"
  | "afterRegion";

type GrammarState =
  | { kind: "start" }
  | { kind: PositionalState }
  | { kind: "inExtension"; expected: boolean }
  | { kind: "inPrivateUse"; expected: boolean };

type Slot = "extlang" | "script" | "region" | "variant";

// Slots each positional state may fill, tried in this order. Extended
// language always comes first so a 3-letter subtag after a short primary
// language is never taken for anything else.
const ACCEPTED_SLOTS: Readonly<Record<PositionalState, readonly Slot[]>> = {
  afterLanguage: ["extlang", "script", "region", "variant"],
  afterExtlang: ["script", "region", "variant"],
  afterScript: ["region", "variant"],
  afterRegion: ["variant"],
};

const SLOT_SHAPES: Readonly<Record<Slot, (subtag: string) => boolean>> = {
  extlang: isExtlangSubtag,
  script: isScriptSubtag,
  region: isRegionSubtag,
  variant: isVariantSubtag,
};

function failure(error: ParseError): ScanResult {
  return { ok: false, error };
}

/** A tag whose every boundary sits at the end: one opaque component. */
export function singleComponent(serialization: string): ScannedTag {
  const end = serialization.length;
  return {
    serialization,
    boundaries: {
      languageEnd: end,
      extlangEnd: end,
      scriptEnd: end,
      regionEnd: end,
      variantEnd: end,
      extensionEnd: end,
    },
  };
}

/**
 * Scans any input: grandfathered tags and private-use-only tags are
 * recognized up front, everything else goes through the grammar.
 */
export function scanLanguageTag(input: string): ScanResult {
  const grandfathered = findGrandfathered(input);
  if (grandfathered) {
    return { ok: true, value: singleComponent(grandfathered.tag) };
  }
  if (input.startsWith("x-") || input.startsWith("X-")) {
    return scanPrivateUseTag(input);
  }
  return scanRegularTag(input);
}

function scanPrivateUseTag(input: string): ScanResult {
  if (!isAlphanumericOrDash(input)) return failure("ForbiddenChar");
  if (input.length === 2) return failure("EmptyPrivateUse");
  for (const { text } of segmentSubtags(input.slice(2))) {
    if (text.length === 0) return failure("EmptySubtag");
    if (text.length > MAX_SUBTAG_LENGTH) return failure("SubtagTooLong");
  }
  return { ok: true, value: singleComponent(toLowerAscii(input)) };
}

/**
 * Single pass over the subtags of a langtag production
 * (language, extlang, script, region, variant, extension, privateuse),
 * emitting the case-normalized serialization and the component boundaries.
 */
export function scanRegularTag(input: string): ScanResult {
  let serialization = "";
  let state: GrammarState = { kind: "start" };
  let extlangCount = 0;
  const bounds: TagBoundaries = {
    languageEnd: 0,
    extlangEnd: 0,
    scriptEnd: 0,
    regionEnd: 0,
    variantEnd: 0,
    extensionEnd: 0,
  };

  for (const { text: subtag, end } of segmentSubtags(input)) {
    if (subtag.length === 0) return failure("EmptySubtag");
    if (byteLength(subtag) > MAX_SUBTAG_LENGTH) return failure("SubtagTooLong");

    if (state.kind === "start") {
      if (!isLanguageSubtag(subtag)) return failure("InvalidLanguage");
      serialization = toLowerAscii(subtag);
      bounds.languageEnd = end;
      // extlangs only follow short primary languages
      state = { kind: subtag.length < 4 ? "afterLanguage" : "afterExtlang" };
      continue;
    }

    if (state.kind === "inPrivateUse") {
      if (!isAlphanumeric(subtag)) return failure("InvalidSubtag");
      serialization += "-" + toLowerAscii(subtag);
      state = { kind: "inPrivateUse", expected: false };
      continue;
    }

    if (isPrivateUseSingleton(subtag) || isExtensionSingleton(subtag)) {
      if (state.kind === "inExtension" && state.expected) {
        return failure("EmptyExtension");
      }
      serialization += "-" + toLowerAscii(subtag);
      state = isPrivateUseSingleton(subtag)
        ? { kind: "inPrivateUse", expected: true }
        : { kind: "inExtension", expected: true };
      continue;
    }

    if (state.kind === "inExtension") {
      if (!isAlphanumeric(subtag)) return failure("InvalidSubtag");
      serialization += "-" + toLowerAscii(subtag);
      bounds.extensionEnd = end;
      state = { kind: "inExtension", expected: false };
      continue;
    }

    const slot = ACCEPTED_SLOTS[state.kind].find((candidate) =>
      SLOT_SHAPES[candidate](subtag)
    );
    switch (slot) {
      case "extlang":
        extlangCount += 1;
        if (extlangCount > MAX_EXTLANGS) return failure("TooManyExtlangs");
        serialization += "-" + toLowerAscii(subtag);
        bounds.extlangEnd = end;
        break;
      case "script":
        serialization += "-" + toTitleAscii(subtag);
        bounds.scriptEnd = end;
        state = { kind: "afterScript" };
        break;
      case "region":
        serialization += "-" + toUpperAscii(subtag);
        bounds.regionEnd = end;
        state = { kind: "afterRegion" };
        break;
      case "variant":
        serialization += "-" + toLowerAscii(subtag);
        bounds.variantEnd = end;
        state = { kind: "afterRegion" };
        break;
      case undefined:
        return failure("InvalidSubtag");
    }
  }

  if (state.kind === "inExtension" && state.expected) {
    return failure("EmptyExtension");
  }
  if (state.kind === "inPrivateUse" && state.expected) {
    return failure("EmptyPrivateUse");
  }

  // Absent components collapse onto the previous boundary.
  bounds.extlangEnd = Math.max(bounds.extlangEnd, bounds.languageEnd);
  bounds.scriptEnd = Math.max(bounds.scriptEnd, bounds.extlangEnd);
  bounds.regionEnd = Math.max(bounds.regionEnd, bounds.scriptEnd);
  bounds.variantEnd = Math.max(bounds.variantEnd, bounds.regionEnd);
  bounds.extensionEnd = Math.max(bounds.extensionEnd, bounds.variantEnd);

  return { ok: true, value: { serialization, boundaries: bounds } };
}
