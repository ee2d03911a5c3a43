// ============================================
// Available sources — what a user can pick as a search scope
// ============================================

import type { OwnershipStore } from "../db/ownership.js";
import { titleCase } from "../query/keyTerms.js";
import { EMAIL_TYPES, type EmailType } from "../types/index.js";

export type SourceCategory = "all" | "documents" | "emails";

export interface SourceItem {
  sourceType: "all" | "document" | "email_type";
  /** document id, email type, "all" for every email, null for everything */
  sourceId: string | null;
  displayName: string;
  description: string;
  count: number | null;
  category: SourceCategory;
}

const EMAIL_TYPE_LABELS: Record<EmailType, { name: string; description: string }> = {
  business: { name: "Business Emails", description: "Work communications, meetings, projects" },
  personal: { name: "Personal Emails", description: "Family and friends communications" },
  promotional: { name: "Promotional Emails", description: "Marketing, newsletters, deals" },
  transactional: { name: "Transactional Emails", description: "Receipts, confirmations, notifications" },
  support: { name: "Support Emails", description: "Customer service, technical support" },
  generic: { name: "Other Emails", description: "General and uncategorized emails" },
};

const DOCUMENT_TYPE_LABELS: Record<string, string> = {
  financial: "Financial",
  long_form: "Long-form",
  generic: "Generic",
};

function documentTypeLabel(documentType: string | null): string {
  if (!documentType) return DOCUMENT_TYPE_LABELS["generic"] ?? "Generic";
  return DOCUMENT_TYPE_LABELS[documentType] ?? titleCase(documentType.replace(/_/g, " "));
}

/**
 * "All Sources", then each owned document, then "All Emails" and one
 * entry per email type the user actually has.
 */
export async function listAvailableSources(userId: string, store: OwnershipStore): Promise<SourceItem[]> {
  const [documents, emailCounts] = await Promise.all([store.listDocuments(userId), store.emailTypeCounts(userId)]);

  const sources: SourceItem[] = [
    {
      sourceType: "all",
      sourceId: null,
      displayName: "All Sources",
      description: "Search across all documents and emails",
      count: null,
      category: "all",
    },
  ];

  for (const doc of documents) {
    sources.push({
      sourceType: "document",
      sourceId: doc.id,
      displayName: doc.title ?? `Document ${doc.id}`,
      description: `${documentTypeLabel(doc.documentType)} • ${doc.description ?? "No description"}`,
      count: null,
      category: "documents",
    });
  }

  const totalEmails = EMAIL_TYPES.reduce((sum, type) => sum + emailCounts[type], 0);
  if (totalEmails === 0) return sources;

  sources.push({
    sourceType: "email_type",
    sourceId: "all",
    displayName: "All Emails",
    description: `All email communications (${totalEmails} emails)`,
    count: totalEmails,
    category: "emails",
  });

  for (const type of EMAIL_TYPES) {
    const count = emailCounts[type];
    if (count === 0) continue;
    sources.push({
      sourceType: "email_type",
      sourceId: type,
      displayName: EMAIL_TYPE_LABELS[type].name,
      description: `${EMAIL_TYPE_LABELS[type].description} (${count} emails)`,
      count,
      category: "emails",
    });
  }

  return sources;
}
