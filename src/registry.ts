import { toLowerAscii } from "./charset.js";
import type { GrandfatheredEntry } from "./types.js";

// Tables from the IANA Language Subtag Registry. Frozen at module load;
// nothing writes to them afterwards.

function registered(tag: string, preferred: string | null): GrandfatheredEntry {
  return Object.freeze({ tag, preferred });
}

/** All grandfathered tags, with their preferred replacement when one exists. */
export const GRANDFATHERED: readonly GrandfatheredEntry[] = Object.freeze([
  registered("art-lojban", "jbo"),
  registered("cel-gaulish", null),
  registered("en-GB-oed", "en-GB-oxendict"),
  registered("i-ami", "ami"),
  registered("i-bnn", "bnn"),
  registered("i-default", null),
  registered("i-enochian", null),
  registered("i-hak", "hak"),
  registered("i-klingon", "tlh"),
  registered("i-lux", "lb"),
  registered("i-mingo", null),
  registered("i-navajo", "nv"),
  registered("i-pwn", "pwn"),
  registered("i-tao", "tao"),
  registered("i-tay", "tay"),
  registered("i-tsu", "tsu"),
  registered("no-bok", "nb"),
  registered("no-nyn", "nn"),
  registered("sgn-BE-FR", "sfb"),
  registered("sgn-BE-NL", "vgt"),
  registered("sgn-CH-DE", "sgg"),
  registered("zh-guoyu", "cmn"),
  registered("zh-hakka", "hak"),
  registered("zh-min", null),
  registered("zh-min-nan", "nan"),
  registered("zh-xiang", "hsn"),
]);

export const DEPRECATED_LANGUAGES: ReadonlyMap<string, string> = new Map([
  ["in", "id"],
  ["iw", "he"],
  ["ji", "yi"],
  ["jw", "jv"],
  ["mo", "ro"],
  ["aam", "aas"],
  ["adp", "dz"],
  ["aue", "ktz"],
  ["ayx", "nun"],
  ["bjd", "drl"],
  ["ccq", "rki"],
  ["cjr", "mom"],
  ["cka", "cmr"],
  ["cmk", "xch"],
  ["drh", "khk"],
  ["drw", "prs"],
  ["gav", "dev"],
  ["gfx", "vaj"],
  ["gti", "nyc"],
  ["hrr", "jal"],
  ["ibi", "opa"],
  ["ilw", "gal"],
  ["kgh", "kml"],
  ["koj", "kwv"],
  ["kwq", "yam"],
  ["kxe", "tvd"],
  ["lii", "raq"],
  ["lmm", "rmx"],
  ["meg", "cir"],
  ["mst", "mry"],
  ["mwj", "vaj"],
  ["myt", "mry"],
  ["nnx", "ngv"],
  ["oun", "vaj"],
  ["pcr", "adx"],
  ["pmu", "phr"],
  ["ppr", "lcq"],
  ["puz", "pub"],
  ["sca", "hle"],
  ["thx", "oyb"],
  ["tie", "ras"],
  ["tkk", "twm"],
  ["tlw", "weo"],
  ["tnf", "prs"],
  ["tsf", "taj"],
  ["uok", "ema"],
  ["xia", "acn"],
  ["xsj", "suj"],
  ["ybd", "rki"],
  ["yma", "lrr"],
  ["ymt", "mtm"],
  ["yos", "zom"],
  ["yuu", "yug"],
]);

export const DEPRECATED_REGIONS: ReadonlyMap<string, string> = new Map([
  ["BU", "MM"],
  ["DD", "DE"],
  ["FX", "FR"],
  ["TP", "TL"],
  ["YD", "YE"],
  ["ZR", "CD"],
]);

/** Case-insensitive (ASCII only) lookup of a whole tag in the grandfathered table. */
export function findGrandfathered(
  text: string
): GrandfatheredEntry | undefined {
  const needle = toLowerAscii(text);
  return GRANDFATHERED.find((entry) => toLowerAscii(entry.tag) === needle);
}

/**
 * Replacement for a grandfathered tag given in its registered spelling.
 * Undefined when the tag is unknown or has no replacement.
 */
export function grandfatheredReplacement(tag: string): string | undefined {
  return GRANDFATHERED.find((entry) => entry.tag === tag)?.preferred ?? undefined;
}

export function deprecatedLanguageReplacement(
  language: string
): string | undefined {
  return DEPRECATED_LANGUAGES.get(language);
}

export function deprecatedRegionReplacement(
  region: string
): string | undefined {
  return DEPRECATED_REGIONS.get(region);
}
