// ============================================
// Core domain types for the query answering engine
// All values here are request-scoped.
// ============================================

/** Which corpus a passage came from */
export type SourceKind = "document" | "email";

/** Canonical email categories, used for source selection and indexing */
export const EMAIL_TYPES = [
  "business",
  "personal",
  "promotional",
  "transactional",
  "support",
  "generic",
] as const;

export type EmailType = (typeof EMAIL_TYPES)[number];

export function isEmailType(value: string): value is EmailType {
  return EMAIL_TYPES.some((type) => type === value);
}

/** One retrieved unit of context */
export interface Passage {
  /** Content; email passages carry the `[EMAIL from …] Subject: …` prefix */
  text: string;
  /** Channel-local similarity, not comparable across channels */
  score: number;
  sourceKind: SourceKind;
  /** document_id (or filename/namespace fallback) or email_id */
  sourceIdentity: string;
  /** Citation label: document title/filename, or email subject/sender */
  displayLabel: string;
}

/** Requested scope of a question */
export type SearchScope =
  | { type: "all" }
  | { type: "document"; documentId: string }
  | { type: "email_type"; emailType: EmailType | "all" }
  /** Pre-source-selection single-document requests */
  | { type: "legacy_document"; documentId: string };

/** Concrete plan produced by the source resolver */
export interface SearchPlan {
  searchDocuments: boolean;
  searchEmails: boolean;
  documentId?: string;
  emailTypeFilter?: EmailType;
  prioritizeEmails: boolean;
}

export interface SourceCitation {
  kind: SourceKind;
  id: string;
  label: string;
}

export interface ValidationResult {
  isValid: boolean;
  /** In [0, 1] */
  confidence: number;
  issues: string[];
  suggestedCorrections: string[];
}

/** Closed topic set used to pick a fallback template */
export type QueryTopic = "expense" | "skills" | "vacation" | "prompt_engineering";

export interface QueryClassification {
  isExpense: boolean;
  isSkills: boolean;
  isVacation: boolean;
  isPromptEngineering: boolean;
  /** 4-digit years in order of appearance */
  years: string[];
}

/** How the final answer was produced */
export type AnswerOutcome =
  | "synthesized"
  | "generated"
  | "safe_extraction"
  | "no_evidence"
  | "no_email_evidence"
  | "no_documents"
  | "technical_difficulty";

/** Result of answerQuestion */
export interface AnswerResponse {
  answer: string;
  sources: SourceCitation[];
  fromCache: boolean;
  elapsedMs: number;
  outcome: AnswerOutcome;
}
