// ============================================
// Relevance Attributor — which passages justify a citation
// Citations follow evidence, not generation input order.
// ============================================

import { countTermHits, extractKeyTerms } from "../query/keyTerms.js";
import type { Passage, SourceCitation } from "../types/index.js";

/** Passages with term overlap that are always cited */
const RELEVANT_LIMIT = 3;
/** Leading passages of the merged list that are always cited */
const CONTEXT_LIMIT = 2;

export interface Attribution {
  /** Deduplicated by (kind, id), first label wins */
  citations: SourceCitation[];
  /** Selected passages, in merged-list order */
  selected: Passage[];
}

export function attributeSources(question: string, passages: readonly Passage[]): Attribution {
  const terms = extractKeyTerms(question);

  const scored = passages.map((passage, index) => ({
    index,
    score: countTermHits(passage.text, terms),
  }));

  // Stable: equal scores keep merged-list order
  const relevant = scored
    .filter((s) => s.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, RELEVANT_LIMIT)
    .map((s) => s.index);

  const context = passages.slice(0, CONTEXT_LIMIT).map((_, i) => i);

  const indices = [...new Set([...relevant, ...context])].sort((a, b) => a - b);
  const selected: Passage[] = [];
  for (const i of indices) {
    const passage = passages[i];
    if (passage) selected.push(passage);
  }

  return { citations: toCitations(selected), selected };
}

export function citationKey(kind: SourceCitation["kind"], id: string): string {
  return `${kind}:${id}`;
}

export function toCitations(passages: readonly Passage[]): SourceCitation[] {
  const seen = new Set<string>();
  const citations: SourceCitation[] = [];

  for (const passage of passages) {
    if (!passage.sourceIdentity) continue;
    const key = citationKey(passage.sourceKind, passage.sourceIdentity);
    if (seen.has(key)) continue;
    seen.add(key);
    citations.push({ kind: passage.sourceKind, id: passage.sourceIdentity, label: passage.displayLabel });
  }

  return citations;
}
