// ============================================
// Chunk Combiner — merge channel results per the plan's priority policy
// ============================================

import type { Passage } from "../types/index.js";

export type CombineResult =
  | { kind: "passages"; passages: Passage[] }
  /** Email was prioritized and the email channel found nothing */
  | { kind: "no_email_evidence" };

/** With this many email passages, documents are only weak support */
const EMAIL_EVIDENCE_SUFFICIENT = 3;
const DOCS_WITH_ENOUGH_EMAIL = 2;
const DOCS_WITH_SPARSE_EMAIL = 5;

export function combinePassages(
  documents: readonly Passage[],
  emails: readonly Passage[],
  prioritizeEmails: boolean
): CombineResult {
  if (!prioritizeEmails) {
    return { kind: "passages", passages: [...documents, ...emails] };
  }

  if (emails.length === 0) {
    return { kind: "no_email_evidence" };
  }

  const docBudget = emails.length >= EMAIL_EVIDENCE_SUFFICIENT ? DOCS_WITH_ENOUGH_EMAIL : DOCS_WITH_SPARSE_EMAIL;
  return { kind: "passages", passages: [...emails, ...documents.slice(0, docBudget)] };
}
