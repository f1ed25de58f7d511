export * from "./languageCode.BCP47.js";
export * from "./subtag.RFC5646.js";
