// ============================================
// Fallback Messenger — "nothing found" messages
// Tailored to the question's topic and to what the user has uploaded.
// ============================================

import path from "path";
import type { OwnedDocument } from "../db/ownership.js";
import { activeTopics } from "../query/classify.js";
import type { QueryClassification, QueryTopic } from "../types/index.js";

/** Categories inferred from uploaded file names */
export type DocumentCategory = "expense" | "resume" | "travel" | "prompt";

type TemplateKey = QueryTopic | "combined" | "default";

const CATEGORY_NAMES: Record<DocumentCategory, string> = {
  expense: "financial records",
  resume: "resume/CV",
  travel: "travel documents",
  prompt: "AI/ML documents",
};

/** Checked in order; a document gets the first category that matches */
const CATEGORY_KEYWORDS: ReadonlyArray<[DocumentCategory, string[]]> = [
  ["expense", ["expense", "budget", "financial"]],
  ["resume", ["resume", "cv"]],
  ["travel", ["travel", "vacation", "trip"]],
  ["prompt", ["prompt", "ai", "ml"]],
];

const NEEDED_CATEGORY: Record<TemplateKey, string | null> = {
  expense: CATEGORY_NAMES.expense,
  combined: CATEGORY_NAMES.expense,
  skills: CATEGORY_NAMES.resume,
  vacation: CATEGORY_NAMES.travel,
  prompt_engineering: CATEGORY_NAMES.prompt,
  default: null,
};

const MISSING_DOCS: Record<TemplateKey, string> = {
  expense:
    "To answer expense questions, please upload financial records, budget documents, or monthly expense reports.",
  skills: "To answer skills questions, please upload your resume, CV, or professional profile.",
  vacation: "To answer travel questions, please upload travel documents, itineraries, or trip reports.",
  prompt_engineering:
    "To answer AI/prompt engineering questions, please upload relevant documents about AI, machine learning, or prompt engineering.",
  combined: "Please upload relevant documents for the topics you're asking about.",
  default: "Please upload relevant documents or try a more specific question.",
};

const TOPIC_DISPLAY: Record<QueryTopic, string> = {
  expense: "expenses",
  skills: "skills",
  vacation: "vacation",
  prompt_engineering: "prompt engineering",
};

export const NO_DOCUMENTS_MESSAGE =
  "You haven't uploaded any documents yet. Please upload some documents before asking questions.";

export const NO_EMAIL_EVIDENCE_MESSAGE =
  "Sorry I couldn't find this information in the email, do you want me to check the pdf's?";

/**
 * Category of one document, from its file name (or title when there is
 * no file). Short keywords ("ai", "cv") must be a whole token.
 */
export function documentCategory(doc: Pick<OwnedDocument, "filePath" | "title">): DocumentCategory | null {
  const name = (doc.filePath ? path.basename(doc.filePath) : doc.title ?? "").toLowerCase();
  const tokens = new Set(name.split(/[^a-z0-9]+/).filter(Boolean));

  const matches = (keyword: string) => (keyword.length <= 2 ? tokens.has(keyword) : name.includes(keyword));

  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some(matches)) return category;
  }
  return null;
}

/** Distinct categories, in order of first appearance */
export function userDocumentCategories(documents: readonly Pick<OwnedDocument, "filePath" | "title">[]): DocumentCategory[] {
  const categories: DocumentCategory[] = [];
  for (const doc of documents) {
    const category = documentCategory(doc);
    if (category && !categories.includes(category)) categories.push(category);
  }
  return categories;
}

function suggestion(template: TemplateKey, categories: readonly DocumentCategory[]): string {
  const has = categories.map((c) => CATEGORY_NAMES[c]);
  const needed = NEEDED_CATEGORY[template];

  if (has.length > 0 && needed) {
    if (has.includes(needed)) {
      return "Try rephrasing your question or check if the information is in your uploaded documents.";
    }
    return `You have uploaded: ${has.join(", ")}. To answer this question, please upload ${needed}.`;
  }
  if (has.length > 0) {
    return `You have uploaded: ${has.join(", ")}. Please upload additional relevant documents or try a different question.`;
  }
  return MISSING_DOCS[template];
}

/** "a", "a or b", "a, b or c" */
function joinTopics(topics: readonly QueryTopic[]): string {
  const names = topics.map((t) => TOPIC_DISPLAY[t]);
  if (names.length <= 1) return names[0] ?? "";
  return `${names.slice(0, -1).join(", ")} or ${names[names.length - 1]}`;
}

/**
 * Message for a question that retrieved no usable passages.
 */
export function noEvidenceMessage(
  classification: QueryClassification,
  categories: readonly DocumentCategory[]
): string {
  const topics = activeTopics(classification);
  const years = classification.years.join(", ");

  if (topics.length > 1) {
    return `I couldn't find information about ${joinTopics(topics)} in your documents. ${suggestion("combined", categories)}`;
  }

  const [topic]: (QueryTopic | undefined)[] = topics;
  switch (topic) {
    case "expense":
      return years
        ? `I couldn't find expense information for ${years}. ${suggestion("expense", categories)}`
        : `I couldn't find expense information in your documents. ${suggestion("expense", categories)}`;
    case "skills":
      return `I couldn't find technical skills information in your documents. ${suggestion("skills", categories)}`;
    case "vacation":
      return years
        ? `I couldn't find vacation information for ${years}. ${suggestion("vacation", categories)}`
        : `I couldn't find vacation information in your documents. ${suggestion("vacation", categories)}`;
    case "prompt_engineering":
      return `I couldn't find information about prompt engineering in your documents. ${suggestion("prompt_engineering", categories)}`;
    case undefined:
      return `I don't have enough information to answer that question. ${suggestion("default", categories)}`;
  }
}
