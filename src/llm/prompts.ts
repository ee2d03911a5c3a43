// ============================================
// LLM Prompts — grounded answering over retrieved passages
// ============================================

import type { Passage } from "../types/index.js";

export const ANSWER_SYSTEM_PROMPT = `You answer questions about the user's own documents and emails.

## Rules

- Use ONLY the context passages provided. If the answer is not in them, say you could not find it.
- Quote amounts, dates and names exactly as they appear in the context. Never round, convert or estimate.
- Answer only what was asked. Do not summarise unrelated parts of a document or email.
- Passages starting with [EMAIL from ...] come from the user's mailbox; all others come from uploaded documents.
- Keep answers short: one to three sentences unless the question asks for a list.`;

/**
 * Passages that fit the character budget, in list order. A passage that
 * would overflow is truncated; nothing after it is included.
 */
export function selectContext(passages: readonly Passage[], maxChars: number): Passage[] {
  const selected: Passage[] = [];
  let remaining = maxChars;

  for (const passage of passages) {
    if (remaining <= 0) break;
    if (passage.text.length <= remaining) {
      selected.push(passage);
      remaining -= passage.text.length;
    } else {
      selected.push({ ...passage, text: passage.text.slice(0, remaining) });
      break;
    }
  }

  return selected;
}

export function buildAnswerMessage(question: string, contextTexts: readonly string[]): string {
  const context = contextTexts.map((text, i) => `[${i + 1}] ${text}`).join("\n\n");
  return `## Context\n\n${context}\n\n## Question\n\n${question}`;
}
