// ============================================
// Deterministic synthesis — first extractor with an answer wins
// ============================================

import { synthesizeEmail } from "./synthesizers/email.js";
import { synthesizeFinancial } from "./synthesizers/financial.js";
import { synthesizeVacation } from "./synthesizers/vacation.js";
import { SYNTHESIZER_KINDS, type SynthesisInput, type SynthesizerKind } from "./synthesizers/types.js";

export type { SynthesisInput, SynthesizerKind } from "./synthesizers/types.js";

export interface SynthesizedAnswer {
  kind: SynthesizerKind;
  answer: string;
}

function runSynthesizer(kind: SynthesizerKind, input: SynthesisInput): string | null {
  switch (kind) {
    case "financial":
      return synthesizeFinancial(input);
    case "email":
      return synthesizeEmail(input);
    case "vacation":
      return synthesizeVacation(input);
  }
}

export function synthesizeAnswer(input: SynthesisInput): SynthesizedAnswer | null {
  if (input.passages.length === 0) return null;

  for (const kind of SYNTHESIZER_KINDS) {
    const answer = runSynthesizer(kind, input);
    if (answer) return { kind, answer };
  }
  return null;
}
