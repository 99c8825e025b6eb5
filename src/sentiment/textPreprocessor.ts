import { compileTermPattern } from "./keywordTaxonomy";

// Applied in order, whole words only.
const INFORMAL_REPLACEMENTS: ReadonlyArray<[from: string, to: string]> = [
  ["u", "you"],
  ["ur", "your"],
  ["cant", "cannot"],
  ["wont", "will not"],
  ["dont", "do not"],
  ["im", "i am"],
  ["ive", "i have"],
  ["thats", "that is"]
];

const REPLACEMENT_PATTERNS = INFORMAL_REPLACEMENTS.map(([from, to]) => ({
  pattern: new RegExp(compileTermPattern(from).source, "gu"),
  to
}));

export const preprocessText = (text: string): string => {
  let cleaned = text.toLowerCase().replace(/\s+/g, " ").trim();

  for (const { pattern, to } of REPLACEMENT_PATTERNS) {
    cleaned = cleaned.replace(pattern, to);
  }

  return cleaned;
};

export const isBlank = (text: string): boolean => text.trim().length === 0;
