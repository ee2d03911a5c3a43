// ============================================
// Query Classification — topic flags + years
// Only selects a fallback template, never gates retrieval.
// ============================================

import { z } from "zod";
import { config } from "../config/env.js";
import { readDataFile } from "../lib/dataFiles.js";
import type { QueryClassification, QueryTopic } from "../types/index.js";

const keywordTableSchema = z.object({
  vacation: z.array(z.string().min(1)),
  skills: z.array(z.string().min(1)),
  expense: z.array(z.string().min(1)),
  promptEngineering: z.array(z.string().min(1)),
});

export type KeywordTable = z.infer<typeof keywordTableSchema>;

let defaultTable: KeywordTable | undefined;

/** Keyword table from data/queryKeywords.json with config overrides applied. */
export function getKeywordTable(): KeywordTable {
  if (!defaultTable) {
    const base = readDataFile("queryKeywords.json", keywordTableSchema);
    const overrides = config.classification;
    defaultTable = {
      vacation: overrides.vacation ?? base.vacation,
      skills: overrides.skills ?? base.skills,
      expense: overrides.expense ?? base.expense,
      promptEngineering: overrides.promptEngineering ?? base.promptEngineering,
    };
  }
  return defaultTable;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Keywords match on word boundaries so that short terms like "ai"
 * do not fire inside "paid". Keywords that start or end with a
 * non-word character ("$") fall back to a substring test.
 */
function mentions(questionLower: string, keyword: string): boolean {
  const needle = keyword.toLowerCase();
  if (!/^\w/.test(needle) || !/\w$/.test(needle)) {
    return questionLower.includes(needle);
  }
  return new RegExp(`\\b${escapeRegExp(needle)}\\b`).test(questionLower);
}

const YEAR = /\b(?:19|20)\d{2}\b/g;

export function classifyQuery(question: string, table: KeywordTable = getKeywordTable()): QueryClassification {
  const lower = question.toLowerCase();
  const hit = (keywords: string[]) => keywords.some((k) => mentions(lower, k));

  return {
    isVacation: hit(table.vacation),
    isSkills: hit(table.skills),
    isExpense: hit(table.expense),
    isPromptEngineering: hit(table.promptEngineering),
    years: [...new Set(question.match(YEAR) ?? [])],
  };
}

/** Active topics in a fixed order: expense, skills, vacation, prompt engineering. */
export function activeTopics(classification: QueryClassification): QueryTopic[] {
  const topics: QueryTopic[] = [];
  if (classification.isExpense) topics.push("expense");
  if (classification.isSkills) topics.push("skills");
  if (classification.isVacation) topics.push("vacation");
  if (classification.isPromptEngineering) topics.push("prompt_engineering");
  return topics;
}
