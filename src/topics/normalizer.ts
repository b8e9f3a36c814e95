/**
 * Topic normalization.
 *
 * Canonicalizes raw topic strings so that trivially different spellings
 * ("Calvin Cycle", "calvin  cycle.", "Cálvin cycle") collapse to one key.
 * Every function here is pure and deterministic.
 *
 * Steps, in order:
 *   1. NFKD decomposition, then removal of combining marks (diacritics)
 *   2. Lower-casing, then folding of letters NFKD leaves whole ("ø", "ß")
 *   3. Deletion of the fixed punctuation set (hyphens are kept)
 *   4. Removal of hyphens that do not join two characters
 *   5. Whitespace collapse and trim
 */

import { InvalidTopicError } from "../errors.js";
import type { Topic } from "./schema.js";

/**
 * ASCII punctuation except "-", plus typographic quotes, dashes and ellipsis.
 */
const STRIPPED_PUNCTUATION = /[!"#$%&'()*+,./:;<=>?@[\\\]^_`{|}~‘’‚‛“”„–—…«»·]/g;

const COMBINING_MARKS = /\p{M}/gu;

/** Lower-case letters with no canonical decomposition */
const LETTER_FOLDS: Readonly<Record<string, string>> = {
  "ø": "o",
  "ł": "l",
  "đ": "d",
  "ð": "d",
  "ħ": "h",
  "ŧ": "t",
  "ı": "i",
  "æ": "ae",
  "œ": "oe",
  "ß": "ss",
  "þ": "th",
};

const FOLDED_LETTERS = /[øłđðħŧıæœßþ]/g;

/** Hyphens at a word boundary: "-foo", "foo-", " - " */
const DANGLING_HYPHENS = /(^|\s)-+|-+(?=\s|$)/g;

const WHITESPACE = /\s+/g;

/**
 * Compute the normalized key for a raw string.
 * Returns an empty string when nothing survives normalization.
 */
export function normalizeKey(raw: string): string {
  return raw
    .normalize("NFKD")
    .replace(COMBINING_MARKS, "")
    .toLowerCase()
    .replace(FOLDED_LETTERS, (letter) => LETTER_FOLDS[letter] ?? letter)
    .replace(STRIPPED_PUNCTUATION, "")
    .replace(DANGLING_HYPHENS, "$1")
    .replace(WHITESPACE, " ")
    .trim();
}

/**
 * Normalize a raw topic string into a Topic.
 *
 * @throws InvalidTopicError when the normalized key is empty
 *
 * @example
 *   normalizeTopic("  Théorie   des Jeux! ")
 *   // => { key: "theorie des jeux", display: "Théorie des Jeux!" }
 */
export function normalizeTopic(raw: string): Topic {
  const key = normalizeKey(raw);
  if (key.length === 0) {
    throw new InvalidTopicError(raw);
  }
  return Object.freeze({
    key,
    display: raw.replace(WHITESPACE, " ").trim(),
  });
}

/**
 * Non-throwing variant of normalizeTopic.
 */
export function tryNormalizeTopic(raw: string): Topic | undefined {
  const key = normalizeKey(raw);
  return key.length === 0 ? undefined : normalizeTopic(raw);
}

/**
 * Normalize a session tag. Tags share the topic normalization so that
 * "AI", "ai" and "A.I." filter the same sessions.
 *
 * @throws InvalidTopicError when the tag is empty after normalization
 */
export function normalizeTag(raw: string): string {
  return normalizeTopic(raw).key;
}

/**
 * Split text into unique search tokens, in first-seen order.
 * Hyphenated words contribute each part: "state-of-the-art" yields
 * "state", "of", "the", "art".
 */
export function tokenize(text: string): string[] {
  const seen = new Set<string>();
  for (const token of normalizeKey(text).split(/[\s-]+/)) {
    if (token.length > 0) {
      seen.add(token);
    }
  }
  return [...seen];
}

/**
 * Title-case a topic for presentation ("calvin cycle" -> "Calvin Cycle").
 */
export function formatTopic(display: string): string {
  return display
    .split(WHITESPACE)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
