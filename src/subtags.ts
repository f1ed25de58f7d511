import type { ExtensionSubtag, Subtag } from "./types.js";

/**
 * Splits a tag on "-" lazily, yielding each subtag with its exclusive end
 * offset. Empty subtags are yielded as-is so the caller can reject them.
 */
export function* segmentSubtags(input: string): Generator<Subtag, void, undefined> {
  let start = 0;
  for (;;) {
    const dash = input.indexOf("-", start);
    const end = dash === -1 ? input.length : dash;
    yield { text: input.slice(start, end), end };
    if (dash === -1) return;
    start = dash + 1;
  }
}

/** Sub-values of a dash-joined component; nothing for an empty component. */
export function splitSubtagList(list: string | undefined): string[] {
  if (!list) return [];
  return list.split("-").filter((subtag) => subtag.length > 0);
}

/**
 * Pairs every extension value with its singleton,
 * e.g. "u-ca-gregory-t-m0" → u/ca, u/gregory, t/m0.
 */
export function splitExtensions(list: string | undefined): ExtensionSubtag[] {
  const out: ExtensionSubtag[] = [];
  let singleton: string | undefined;
  for (const subtag of splitSubtagList(list)) {
    if (subtag.length === 1) {
      singleton = subtag;
      continue;
    }
    if (singleton === undefined) {
      throw new Error(`Extension value "${subtag}" has no singleton`);
    }
    out.push({ singleton, value: subtag });
  }
  return out;
}
