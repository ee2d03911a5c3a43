import type { Passage, QueryClassification } from "../../types/index.js";

/** Closed set of deterministic extractors, in dispatch order */
export const SYNTHESIZER_KINDS = ["financial", "email", "vacation"] as const;

export type SynthesizerKind = (typeof SYNTHESIZER_KINDS)[number];

export interface SynthesisInput {
  question: string;
  /** Merged passage list, in combiner order */
  passages: readonly Passage[];
  classification: QueryClassification;
}
