// ============================================
// Response Validator — generated answers checked against context
//
// Entities must appear in the context (exactly, or as a close fuzzy match).
// Amounts and dates must appear literally. No re-prompting: an invalid
// answer is replaced by one built from context entities.
// ============================================

import { findCurrencyAmounts, findDateLiterals, unique } from "../query/literals.js";
import type { ValidationResult } from "../types/index.js";
import { similarityRatio } from "./similarity.js";

export const MIN_CONFIDENCE = 0.7;
export const SIMILARITY_THRESHOLD = 0.8;
const MAX_SUGGESTIONS_PER_ENTITY = 3;

const PROPER_NOUN = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\b/g;
const PAYMENT_TERM = /\b(?:Zelle|Venmo|PayPal|Credit Card|Debit Card|Cash|Check)\b/gi;
const CONTEXT_WORD = /\b\w+\b/g;
const PAYEE = /(?:To|From)\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)/g;

/** Capitalized because they open a sentence, not because they name anything */
const SENTENCE_WORDS = new Set([
  "you",
  "the",
  "this",
  "that",
  "based",
  "according",
  "your",
  "it",
  "there",
  "these",
  "yes",
  "no",
  "however",
]);

function stripSentenceWords(phrase: string): string | null {
  const words = phrase.split(/\s+/);
  while (words.length > 0 && SENTENCE_WORDS.has((words[0] ?? "").toLowerCase())) {
    words.shift();
  }
  return words.length > 0 ? words.join(" ") : null;
}

/** Proper nouns, amounts, dates and payment terms, deduplicated in order. */
export function extractEntities(text: string): string[] {
  const entities: string[] = [];

  for (const phrase of text.match(PROPER_NOUN) ?? []) {
    const name = stripSentenceWords(phrase);
    if (name) entities.push(name);
  }
  entities.push(...findCurrencyAmounts(text));
  entities.push(...findDateLiterals(text));
  entities.push(...(text.match(PAYMENT_TERM) ?? []));

  return unique(entities);
}

interface EntityCheck {
  found: boolean;
  confidence: number;
  similar: string[];
}

function checkEntity(entity: string, contextLower: string, contextWords: readonly string[]): EntityCheck {
  const needle = entity.toLowerCase();
  if (contextLower.includes(needle)) {
    return { found: true, confidence: 1, similar: [] };
  }

  const similar: string[] = [];
  let best = 0;
  for (const word of contextWords) {
    const ratio = similarityRatio(needle, word);
    if (ratio > SIMILARITY_THRESHOLD) {
      similar.push(word);
      best = Math.max(best, ratio);
    }
  }

  return {
    found: best > SIMILARITY_THRESHOLD,
    confidence: best,
    similar: similar.slice(0, MAX_SUGGESTIONS_PER_ENTITY),
  };
}

export function validateResponse(answer: string, contextTexts: readonly string[]): ValidationResult {
  const context = contextTexts.join(" ");
  const contextLower = context.toLowerCase();
  const contextWords = unique((contextLower.match(CONTEXT_WORD) ?? []).filter((w) => w.length > 3));

  const issues: string[] = [];
  const suggestions: string[] = [];
  const scores: number[] = [];

  for (const entity of extractEntities(answer)) {
    const check = checkEntity(entity, contextLower, contextWords);
    scores.push(check.confidence);
    if (!check.found) {
      issues.push(`Entity '${entity}' not found in context`);
      suggestions.push(...check.similar);
    }
  }

  // Literal checks: no fuzzy matching for amounts or dates
  const contextAmounts = new Set(findCurrencyAmounts(context));
  for (const amount of unique(findCurrencyAmounts(answer))) {
    if (!contextAmounts.has(amount)) {
      issues.push(`Amount ${amount} not found in context`);
    }
  }

  const contextDates = new Set(findDateLiterals(context));
  for (const date of unique(findDateLiterals(answer))) {
    if (!contextDates.has(date)) {
      issues.push(`Date ${date} not found in context`);
    }
  }

  // An answer that names nothing grounds nothing
  const confidence = scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : 0;

  return {
    isValid: confidence >= MIN_CONFIDENCE && issues.length === 0,
    confidence,
    issues,
    suggestedCorrections: unique(suggestions),
  };
}

export const GENERIC_CLARIFY_MESSAGE =
  "I found some information in your documents, but I need to be more specific about what you're looking for. Could you clarify your question?";

const SAFE_LIST_LIMIT = 3;

/**
 * Answer built only from literals present in the context, phrased for
 * the kind of question asked. Never contains generated text.
 */
export function buildSafeAnswer(question: string, contextTexts: readonly string[]): string {
  const lower = question.toLowerCase();
  const context = contextTexts.join(" ");

  if (lower.includes("how much") || lower.includes("total")) {
    const amounts = findCurrencyAmounts(context);
    if (amounts.length > 0) {
      return `Based on the available information, I found these amounts: ${amounts.slice(0, SAFE_LIST_LIMIT).join(", ")}`;
    }
  } else if (lower.includes("when") || lower.includes("date")) {
    const dates = findDateLiterals(context);
    if (dates.length > 0) {
      return `Based on the available information, I found these dates: ${dates.slice(0, SAFE_LIST_LIMIT).join(", ")}`;
    }
  } else if (lower.includes("who") || lower.includes("payee")) {
    const payees = [...context.matchAll(PAYEE)].map((m) => m[1] ?? "").filter(Boolean);
    if (payees.length > 0) {
      return `Based on the available information, I found these payees: ${payees.slice(0, SAFE_LIST_LIMIT).join(", ")}`;
    }
  }

  return GENERIC_CLARIFY_MESSAGE;
}
