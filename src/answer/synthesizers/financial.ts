// ============================================
// Financial extractor — "how much did I pay X"
// Amounts come from the passage that matched, never from the whole context.
// ============================================

import { extractKeyTerms, titleCase } from "../../query/keyTerms.js";
import { firstAmount, unique } from "../../query/literals.js";
import type { Passage } from "../../types/index.js";
import type { SynthesisInput } from "./types.js";

const AMOUNT_TRIGGERS = ["how much", "amount", "paid", "cost", "sent"];
const SPEND_TRIGGERS = [...AMOUNT_TRIGGERS, "spent", "spend"];

/** Query words that describe the transaction rather than its counterparty */
const FINANCIAL_STOPWORDS = new Set([
  "much",
  "paid",
  "send",
  "sent",
  "money",
  "amount",
  "cost",
  "spent",
  "with",
  "from",
  "this",
  "that",
  "what",
  "when",
  "where",
  "have",
  "does",
]);

const PAYMENT_METHODS: ReadonlyArray<{ key: string; label: string }> = [
  { key: "zelle", label: "Zelle" },
  { key: "venmo", label: "Venmo" },
  { key: "paypal", label: "PayPal" },
];

/** Locations and the carrier/airport names that mark a related charge */
const LOCATION_ALIASES: ReadonlyArray<{ location: string; aliases: string[] }> = [
  { location: "istanbul", aliases: ["thy", "turkish", "turkey"] },
  { location: "turkey", aliases: ["thy", "turkish"] },
  { location: "london", aliases: ["british", "ba", "heathrow"] },
  { location: "paris", aliases: ["air france", "af", "cdg"] },
  { location: "new york", aliases: ["jfk", "lga", "newark"] },
  { location: "tokyo", aliases: ["jal", "ana", "narita"] },
];

function includesAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((n) => haystack.includes(n));
}

function mentionsWord(haystack: string, word: string): boolean {
  return new RegExp(`\\b${word}\\b`).test(haystack);
}

function isForeignExchangeLine(textLower: string): boolean {
  return textLower.includes("foreign") && textLower.includes("exch");
}

/** "You paid $5 to X." or "You paid these amounts to X: $5, $6." */
function amountsAnswer(verb: string, relation: string, amounts: readonly string[]): string {
  return amounts.length === 1
    ? `You ${verb} ${amounts[0]} ${relation}.`
    : `You ${verb} these amounts ${relation}: ${amounts.join(", ")}.`;
}

function locationAnswer(questionLower: string, passages: readonly Passage[]): string | null {
  for (const { location, aliases } of LOCATION_ALIASES) {
    if (!questionLower.includes(location)) continue;

    const amounts: string[] = [];
    for (const passage of passages) {
      const textLower = passage.text.toLowerCase();
      const related =
        aliases.some((alias) => mentionsWord(textLower, alias)) || isForeignExchangeLine(textLower);
      if (!related) continue;
      const amount = firstAmount(passage.text);
      if (amount) amounts.push(amount);
    }

    if (amounts.length > 0) {
      return amountsAnswer("spent", `related to ${titleCase(location)}`, unique(amounts));
    }
  }
  return null;
}

export function synthesizeFinancial({ question, passages }: SynthesisInput): string | null {
  const lower = question.toLowerCase();

  if (includesAny(lower, SPEND_TRIGGERS)) {
    const byLocation = locationAnswer(lower, passages);
    if (byLocation) return byLocation;
  }

  if (!includesAny(lower, AMOUNT_TRIGGERS)) return null;

  const method = PAYMENT_METHODS.find((m) => lower.includes(m.key));
  const terms = extractKeyTerms(question).filter((term) => {
    const key = term.toLowerCase();
    return !FINANCIAL_STOPWORDS.has(key) && !PAYMENT_METHODS.some((m) => m.key === key);
  });
  if (terms.length === 0) return null;

  const amounts: string[] = [];
  let matchedTerm: string | undefined;

  for (const passage of passages) {
    const textLower = passage.text.toLowerCase();
    if (method && !textLower.includes(method.key)) continue;

    // Terms are longest first, so the most specific name wins
    const term = terms.find((t) => textLower.includes(t.toLowerCase()));
    if (!term) continue;

    // The named party and the amount must come from the same passage
    const amount = firstAmount(passage.text);
    if (!amount) continue;
    amounts.push(amount);
    matchedTerm ??= term;
  }

  const distinct = unique(amounts);
  if (distinct.length === 0 || !matchedTerm) return null;

  const target = method ? `${titleCase(matchedTerm)} via ${method.label}` : titleCase(matchedTerm);

  // Without a method, several amounts are likely unrelated transactions
  if (!method) {
    return `You paid ${distinct[0]} to ${target}.`;
  }
  return amountsAnswer("paid", `to ${target}`, distinct);
}
