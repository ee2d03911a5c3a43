// ============================================
// Technical-difficulty messages — shown when generation fails and
// nothing could be extracted. Never include internal error text.
// ============================================

export type DifficultyFamily = "generic" | "connection" | "search" | "generation";

const MESSAGES: Record<DifficultyFamily, readonly string[]> = {
  generic: [
    "I'm experiencing technical difficulties right now. Please try your question again in a moment.",
    "There's a temporary issue with my processing system. Please retry your question shortly.",
    "I'm having trouble connecting to my language model. Please try again in a few moments.",
    "My AI processing is temporarily unavailable. Please wait a moment and try again.",
    "I encountered a technical problem while processing your request. Please try again.",
  ],
  connection: [
    "I lost connection to my processing system. Please try your question again.",
    "There was a connection interruption. Please retry your question.",
    "I'm having connectivity issues. Please try again in a moment.",
    "My connection to the language model was interrupted. Please retry shortly.",
  ],
  search: [
    "I'm having trouble searching your documents right now. Please try again.",
    "There's an issue with document search. Please retry your question.",
    "I encountered a problem while looking through your documents. Please try again.",
    "Document search is temporarily unavailable. Please try again shortly.",
  ],
  generation: [
    "I'm having trouble generating a response right now. Please try again.",
    "There's an issue with my response generation. Please retry your question.",
    "I encountered a problem while creating your answer. Please try again.",
    "Response generation is temporarily unavailable. Please try again shortly.",
  ],
};

export function difficultyFamily(errorText?: string): DifficultyFamily {
  if (!errorText) return "generic";
  const lower = errorText.toLowerCase();
  if (lower.includes("broken pipe") || lower.includes("epipe") || lower.includes("econnreset")) {
    return "connection";
  }
  if (lower.includes("search")) return "search";
  if (lower.includes("generat")) return "generation";
  return "generic";
}

/**
 * Pick a message from the family matching the failure.
 * `random` returns a value in [0, 1); tests pass a fixed one.
 */
export function technicalDifficultyMessage(errorText?: string, random: () => number = Math.random): string {
  const options = MESSAGES[difficultyFamily(errorText)];
  const index = Math.min(options.length - 1, Math.floor(random() * options.length));
  return options[index] ?? MESSAGES.generic[0] ?? "";
}

export function difficultyMessages(family: DifficultyFamily): readonly string[] {
  return MESSAGES[family];
}
