// ============================================
// Email receipt extractor — "what was my Apple invoice"
// Only looks at passages carrying the email provenance prefix.
// ============================================

import { titleCase } from "../../query/keyTerms.js";
import { findCurrencyAmountMatches, unique } from "../../query/literals.js";
import { isEmailText } from "../../retrieval/passages.js";
import type { SynthesisInput } from "./types.js";

const EMAIL_TRIGGERS = ["email", "invoice", "receipt"];

/** Company name and the product names its receipts use */
const COMPANY_VARIANTS: ReadonlyArray<{ company: string; variants: string[] }> = [
  { company: "apple", variants: ["apple", "icloud", "app store", "itunes"] },
  { company: "google", variants: ["google", "gmail", "google play", "youtube"] },
  { company: "amazon", variants: ["amazon", "aws", "prime"] },
  { company: "microsoft", variants: ["microsoft", "office", "outlook", "azure"] },
  { company: "netflix", variants: ["netflix"] },
  { company: "spotify", variants: ["spotify"] },
  { company: "dropbox", variants: ["dropbox"] },
  { company: "adobe", variants: ["adobe", "creative cloud"] },
];

/** Capitalized question words that are not company names */
const NOT_COMPANIES = new Set([
  "check",
  "find",
  "show",
  "what",
  "when",
  "where",
  "which",
  "email",
  "emails",
  "invoice",
  "invoices",
  "receipt",
  "receipts",
  "much",
]);

interface QueryEntity {
  name: string;
  /** Lowercase strings that count as a mention */
  mentions: string[];
}

export function extractCompanyEntities(question: string): QueryEntity[] {
  const lower = question.toLowerCase();
  const entities: QueryEntity[] = [];

  for (const { company, variants } of COMPANY_VARIANTS) {
    if (variants.some((v) => lower.includes(v))) {
      entities.push({ name: company, mentions: variants });
    }
  }

  for (const raw of question.split(/\s+/)) {
    const word = raw.replace(/^[^A-Za-z]+|[^A-Za-z]+$/g, "");
    if (word.length <= 3 || !/^[A-Z][a-z]+$/.test(word)) continue;
    const key = word.toLowerCase();
    if (NOT_COMPANIES.has(key) || entities.some((e) => e.mentions.includes(key))) continue;
    entities.push({ name: key, mentions: [key] });
  }

  return entities;
}

/** Amount closest to the first mention; earliest wins a tie */
function amountNearMention(text: string, mentions: readonly string[]): string | null {
  const lower = text.toLowerCase();
  const positions = mentions.map((m) => lower.indexOf(m)).filter((i) => i >= 0);
  if (positions.length === 0) return null;
  const mentionAt = Math.min(...positions);

  let best: { value: string; distance: number } | null = null;
  for (const match of findCurrencyAmountMatches(text)) {
    const distance = Math.abs(match.index - mentionAt);
    if (!best || distance < best.distance) {
      best = { value: match.value, distance };
    }
  }
  return best?.value ?? null;
}

export function synthesizeEmail({ question, passages }: SynthesisInput): string | null {
  const lower = question.toLowerCase();
  if (!EMAIL_TRIGGERS.some((t) => lower.includes(t))) return null;

  const emailTexts = passages.map((p) => p.text).filter(isEmailText);
  if (emailTexts.length === 0) return null;

  for (const entity of extractCompanyEntities(question)) {
    const amounts = unique(
      emailTexts
        .map((text) => amountNearMention(text, entity.mentions))
        .filter((amount): amount is string => amount !== null)
    );
    if (amounts.length === 0) continue;

    const name = titleCase(entity.name);
    return amounts.length === 1
      ? `The ${name} invoice was ${amounts[0]}.`
      : `The ${name} invoices were: ${amounts.join(", ")}.`;
  }

  return null;
}
