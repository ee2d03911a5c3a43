// ============================================
// Key-Term Extractor
// Pure: same text in, same ordered terms out.
// ============================================

import { findCurrencyAmounts } from "./literals.js";

/** Capitalized phrases that are question scaffolding, not names */
const PHRASE_STOPLIST = new Set([
  "how much",
  "did i",
  "i send",
  "i paid",
  "much did",
  "send to",
  "paid for",
  "what is",
  "what was",
  "when did",
  "where did",
  "check emails",
  "check email",
  "find email",
]);

/** Query-scaffolding words never useful as match terms */
const WORD_STOPLIST = new Set(["check", "emails", "much", "what", "how", "was", "the", "and"]);

const IDENTIFIER = /\b\d{3,}\b/g;
const CAPITALIZED_PHRASE = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)+\b/g;
const WORD = /[a-z]+/g;

/**
 * Extract salient terms from free text.
 *
 * Terms are, in extraction order: currency amounts, 3+ digit identifiers,
 * capitalized multi-word names, lowercase content words longer than three
 * characters. The result is deduplicated (case-insensitively) and sorted
 * longest first, with ties kept in extraction order, so multi-word names
 * are tried before single keywords.
 */
export function extractKeyTerms(text: string): string[] {
  const terms: string[] = [];

  terms.push(...findCurrencyAmounts(text));
  terms.push(...(text.match(IDENTIFIER) ?? []));

  for (const phrase of text.match(CAPITALIZED_PHRASE) ?? []) {
    if (!PHRASE_STOPLIST.has(phrase.toLowerCase())) {
      terms.push(phrase);
    }
  }

  for (const word of text.toLowerCase().match(WORD) ?? []) {
    if (word.length > 3 && !WORD_STOPLIST.has(word)) {
      terms.push(word);
    }
  }

  const seen = new Set<string>();
  const deduped = terms.filter((term) => {
    const key = term.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  // Array.prototype.sort is stable, ties keep extraction order
  return deduped.sort((a, b) => b.length - a.length);
}

/** Number of terms occurring in `text`, case-insensitive substring match. */
export function countTermHits(text: string, terms: readonly string[]): number {
  const haystack = text.toLowerCase();
  return terms.reduce((hits, term) => (haystack.includes(term.toLowerCase()) ? hits + 1 : hits), 0);
}

/** "andy eckman" -> "Andy Eckman", "o'neil" -> "O'Neil" */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, sep: string, ch: string) => `${sep}${ch.toUpperCase()}`);
}
