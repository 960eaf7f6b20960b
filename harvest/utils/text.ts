import { SENTINEL } from "../adapter.types.js";

// Control characters, zero-width marks, BOM and the replacement char left behind by bad decoding.
const ARTIFACTS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u200B-\u200D\u2060\uFEFF\uFFFD]/g;

const SMALL_WORDS = new Set(["and", "or", "of", "the", "in", "on", "for", "to", "at", "by", "with"]);

const COUNTRY_ALIASES: Record<string, string> = {
  "Us": "United States",
  "US": "United States",
  "U.S.": "United States",
  "Usa": "United States",
  "USA": "United States",
  "Uk": "United Kingdom",
  "UK": "United Kingdom",
  "England": "United Kingdom",
};

export function isSentinel(value: string): boolean {
  return value === SENTINEL;
}

export function cleanText(value: unknown): string {
  if (value === null || value === undefined) return SENTINEL;
  const text = String(value).replace(ARTIFACTS, "").replace(/\s+/g, " ").trim();
  return text || SENTINEL;
}

function isUpper(word: string): boolean {
  return word !== word.toLowerCase() && word === word.toUpperCase();
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/** Title-cases a label, keeping short acronyms ("IIT") and mapping country aliases. */
export function smartTitleCase(value: unknown): string {
  const text = cleanText(value);
  if (isSentinel(text)) return text;

  const titled = text
    .split(" ")
    .map((word, i) => {
      if (isUpper(word) && word.length <= 5) return word;
      if (i > 0 && SMALL_WORDS.has(word.toLowerCase())) return word.toLowerCase();
      return capitalize(word);
    })
    .join(" ");
  return COUNTRY_ALIASES[titled] ?? titled;
}

/** Keeps the first record per key, in encounter order. */
export function dedupe<T>(records: readonly T[], keyFn: (record: T) => string): T[] {
  const seen = new Set<string>();
  return records.filter((r) => {
    const key = keyFn(r);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
