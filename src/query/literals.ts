// ============================================
// Literal patterns — amounts and dates
// Shared by key-term extraction, synthesizers and validation.
// ============================================

/** `$1,234.56`, `$15`, `$4,500` */
const CURRENCY_AMOUNT = /\$\d+(?:,\d{3})*(?:\.\d{2})?/g;

/** Decimal without a currency sign, e.g. statement lines `1,234.56` */
const BARE_DECIMAL_AMOUNT = /\b\d+(?:,\d{3})*\.\d{2}\b/g;

const MONTHS =
  "January|February|March|April|May|June|July|August|September|October|November|December";

const DATE_PATTERNS: RegExp[] = [
  /\b\d{1,2}\/\d{1,2}\/\d{4}\b/g, // MM/DD/YYYY
  /\b\d{4}-\d{2}-\d{2}\b/g, // YYYY-MM-DD
  new RegExp(`\\b(?:${MONTHS})\\s+\\d{4}\\b`, "g"), // Month YYYY
];

/** Positioned match, used where proximity matters */
export interface LiteralMatch {
  value: string;
  index: number;
}

function allMatches(text: string, pattern: RegExp): LiteralMatch[] {
  const found: LiteralMatch[] = [];
  for (const match of text.matchAll(pattern)) {
    found.push({ value: match[0], index: match.index ?? 0 });
  }
  return found;
}

/** Every `$` amount in order of appearance (duplicates kept). */
export function findCurrencyAmounts(text: string): string[] {
  return allMatches(text, CURRENCY_AMOUNT).map((m) => m.value);
}

export function findCurrencyAmountMatches(text: string): LiteralMatch[] {
  return allMatches(text, CURRENCY_AMOUNT);
}

/**
 * First amount in a passage. Falls back to a bare decimal, which is
 * reported with a `$` prefix.
 */
export function firstAmount(text: string): string | null {
  const [currency] = findCurrencyAmounts(text);
  if (currency) return currency;

  const [bare] = allMatches(text, BARE_DECIMAL_AMOUNT);
  return bare ? `$${bare.value}` : null;
}

/** Every date literal in order of appearance (duplicates kept). */
export function findDateLiterals(text: string): string[] {
  const found: LiteralMatch[] = [];
  for (const pattern of DATE_PATTERNS) {
    found.push(...allMatches(text, pattern));
  }
  return found.sort((a, b) => a.index - b.index).map((m) => m.value);
}

/** Order-preserving dedupe */
export function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}
