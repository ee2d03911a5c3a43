// ============================================
// Source Resolver — requested scope + question -> SearchPlan
// ============================================

import { z } from "zod";
import type { OwnershipStore } from "../db/ownership.js";
import { isEmailType, type SearchPlan, type SearchScope } from "../types/index.js";

/**
 * Phrases that mean "look in my mailbox". Once one matches, documents are
 * excluded from the pass entirely.
 */
export const EMAIL_PRIORITY_PHRASES: readonly string[] = [
  "check emails",
  "search emails",
  "find emails",
  "look in emails",
  "email search",
  "inbox search",
  "check my emails",
  "search my inbox",
  "check email",
  "find email",
  "look in email",
  "in my emails",
  "from emails",
  "email about",
  "emails for",
  "check inbox",
  "search inbox",
  "look in inbox",
  "my gmail",
  "gmail search",
  "email messages",
  "did i get an email",
  "any emails about",
  "email from",
  "emails containing",
  "emails with",
];

export type RejectionCode = "INVALID_SOURCE" | "DOCUMENT_NOT_FOUND";

export type ScopeParseResult =
  | { ok: true; scope: SearchScope }
  | { ok: false; code: RejectionCode; reason: string };

export type SourceResolution =
  | { status: "resolved"; plan: SearchPlan }
  | { status: "rejected"; code: RejectionCode; reason: string };

/** Source selection as the API layer receives it */
export const sourceSelectionSchema = z.object({
  source_type: z.string().optional(),
  source_id: z.string().nullable().optional(),
  document_id: z.string().nullable().optional(),
});

export type SourceSelection = z.infer<typeof sourceSelectionSchema>;

/**
 * Turn a raw source selection into a SearchScope.
 *
 * `document_id` alone is the legacy single-document request. `all` takes no
 * id, `document` requires one, and `email_type` requires "all" or a known
 * email type.
 */
export function parseSourceSelection(selection: SourceSelection): ScopeParseResult {
  const { source_type: sourceType, source_id: sourceId, document_id: documentId } = selection;

  if (!sourceType) {
    return documentId
      ? { ok: true, scope: { type: "legacy_document", documentId } }
      : { ok: true, scope: { type: "all" } };
  }

  switch (sourceType) {
    case "all":
      if (sourceId) {
        return { ok: false, code: "INVALID_SOURCE", reason: "source_id must be empty when searching all sources" };
      }
      return { ok: true, scope: { type: "all" } };

    case "document":
      if (!sourceId) {
        return { ok: false, code: "INVALID_SOURCE", reason: "source_id is required for document sources" };
      }
      return { ok: true, scope: { type: "document", documentId: sourceId } };

    case "email_type":
      if (!sourceId) {
        return { ok: false, code: "INVALID_SOURCE", reason: "source_id is required for email sources" };
      }
      if (sourceId === "all") {
        return { ok: true, scope: { type: "email_type", emailType: "all" } };
      }
      if (!isEmailType(sourceId)) {
        return { ok: false, code: "INVALID_SOURCE", reason: `Unknown email type: ${sourceId}` };
      }
      return { ok: true, scope: { type: "email_type", emailType: sourceId } };

    default:
      return { ok: false, code: "INVALID_SOURCE", reason: `Unknown source type: ${sourceType}` };
  }
}

/** First email-priority phrase found in the question, if any */
export function findEmailPriorityPhrase(question: string): string | undefined {
  const lower = question.toLowerCase();
  return EMAIL_PRIORITY_PHRASES.find((phrase) => lower.includes(phrase));
}

/** Default plan for a scope, before any question cues are applied */
export function basePlan(scope: SearchScope): SearchPlan {
  switch (scope.type) {
    case "all":
      return { searchDocuments: true, searchEmails: true, prioritizeEmails: false };
    case "document":
    case "legacy_document":
      return { searchDocuments: true, searchEmails: false, documentId: scope.documentId, prioritizeEmails: false };
    case "email_type":
      return {
        searchDocuments: false,
        searchEmails: true,
        emailTypeFilter: scope.emailType === "all" ? undefined : scope.emailType,
        prioritizeEmails: false,
      };
  }
}

/**
 * Apply the email-priority override. Single-document plans are left alone:
 * a pinned document always wins over question wording.
 */
export function applyEmailPriority(plan: SearchPlan, question: string): SearchPlan {
  if (plan.documentId !== undefined || !findEmailPriorityPhrase(question)) {
    return plan;
  }
  return { ...plan, searchDocuments: false, searchEmails: true, prioritizeEmails: true };
}

/**
 * Validate the scope against what the user owns, then derive the plan.
 */
export async function resolveSearchPlan(
  scope: SearchScope,
  question: string,
  userId: string,
  store: OwnershipStore
): Promise<SourceResolution> {
  if (scope.type === "document" || scope.type === "legacy_document") {
    const owned = await store.documentBelongsTo(userId, scope.documentId);
    if (!owned) {
      return {
        status: "rejected",
        code: "DOCUMENT_NOT_FOUND",
        reason: `Document ${scope.documentId} not found for user`,
      };
    }
  }

  if (scope.type === "email_type" && scope.emailType !== "all") {
    const count = await store.countEmails(userId, scope.emailType);
    if (count === 0) {
      return {
        status: "rejected",
        code: "INVALID_SOURCE",
        reason: `No emails of type ${scope.emailType}`,
      };
    }
  }

  return { status: "resolved", plan: applyEmailPriority(basePlan(scope), question) };
}

/** Stable string form of a scope, used in cache keys and logs */
export function scopeKey(scope: SearchScope): string {
  switch (scope.type) {
    case "all":
      return "all";
    case "document":
    case "legacy_document":
      return `document:${scope.documentId}`;
    case "email_type":
      return `email_type:${scope.emailType}`;
  }
}
