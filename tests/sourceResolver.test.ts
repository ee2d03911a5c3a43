// ============================================
// Source Resolver Tests — scope parsing and plan resolution
// ============================================

import { describe, it, expect, beforeEach } from "vitest";
import {
  applyEmailPriority,
  basePlan,
  findEmailPriorityPhrase,
  parseSourceSelection,
  resolveSearchPlan,
  scopeKey,
} from "../src/query/sourceResolver.js";
import { FakeOwnershipStore, ownedDocument } from "./fakes.js";

// ============================================
// parseSourceSelection()
// ============================================

describe("parseSourceSelection", () => {
  it("defaults to all sources", () => {
    expect(parseSourceSelection({})).toEqual({ ok: true, scope: { type: "all" } });
  });

  it("treats a bare document_id as a legacy document request", () => {
    expect(parseSourceSelection({ document_id: "doc-1" })).toEqual({
      ok: true,
      scope: { type: "legacy_document", documentId: "doc-1" },
    });
  });

  it("rejects a document source without an id", () => {
    expect(parseSourceSelection({ source_type: "document" })).toEqual({
      ok: false,
      code: "INVALID_SOURCE",
      reason: "source_id is required for document sources",
    });
  });

  it("rejects an id on the all source", () => {
    const result = parseSourceSelection({ source_type: "all", source_id: "x" });
    expect(result.ok).toBe(false);
  });

  it("accepts email_type all and known types", () => {
    expect(parseSourceSelection({ source_type: "email_type", source_id: "all" })).toEqual({
      ok: true,
      scope: { type: "email_type", emailType: "all" },
    });
    expect(parseSourceSelection({ source_type: "email_type", source_id: "business" })).toEqual({
      ok: true,
      scope: { type: "email_type", emailType: "business" },
    });
  });

  it("rejects unknown email types and source types", () => {
    expect(parseSourceSelection({ source_type: "email_type", source_id: "spam" })).toEqual({
      ok: false,
      code: "INVALID_SOURCE",
      reason: "Unknown email type: spam",
    });
    expect(parseSourceSelection({ source_type: "folder", source_id: "x" })).toEqual({
      ok: false,
      code: "INVALID_SOURCE",
      reason: "Unknown source type: folder",
    });
  });
});

// ============================================
// Email priority
// ============================================

describe("email priority", () => {
  it("detects priority phrases case-insensitively", () => {
    expect(findEmailPriorityPhrase("Check Emails for my Apple invoice")).toBe("check emails");
    expect(findEmailPriorityPhrase("what did I pay for rent?")).toBeUndefined();
  });

  it("switches an all-sources plan to emails only", () => {
    expect(applyEmailPriority(basePlan({ type: "all" }), "check emails for my Apple invoice")).toEqual({
      searchDocuments: false,
      searchEmails: true,
      prioritizeEmails: true,
    });
  });

  it("leaves a pinned document alone", () => {
    const plan = basePlan({ type: "document", documentId: "doc-1" });
    expect(applyEmailPriority(plan, "check emails for rent")).toEqual(plan);
  });
});

// ============================================
// resolveSearchPlan()
// ============================================

describe("resolveSearchPlan", () => {
  let store: FakeOwnershipStore;

  beforeEach(() => {
    store = new FakeOwnershipStore();
    store.documents = [ownedDocument("doc-1")];
    store.emailCounts.business = 4;
  });

  it("resolves all sources to both channels", async () => {
    const result = await resolveSearchPlan({ type: "all" }, "what is my rent?", "user-1", store);
    expect(result).toEqual({
      status: "resolved",
      plan: { searchDocuments: true, searchEmails: true, prioritizeEmails: false },
    });
  });

  it("restricts an owned document to that document", async () => {
    const result = await resolveSearchPlan({ type: "document", documentId: "doc-1" }, "rent?", "user-1", store);
    expect(result).toEqual({
      status: "resolved",
      plan: { searchDocuments: true, searchEmails: false, documentId: "doc-1", prioritizeEmails: false },
    });
  });

  it("rejects a document the user does not own", async () => {
    const result = await resolveSearchPlan({ type: "legacy_document", documentId: "doc-9" }, "rent?", "user-1", store);
    expect(result).toEqual({
      status: "rejected",
      code: "DOCUMENT_NOT_FOUND",
      reason: "Document doc-9 not found for user",
    });
  });

  it("filters emails by type", async () => {
    const result = await resolveSearchPlan({ type: "email_type", emailType: "business" }, "meeting?", "user-1", store);
    expect(result).toEqual({
      status: "resolved",
      plan: { searchDocuments: false, searchEmails: true, emailTypeFilter: "business", prioritizeEmails: false },
    });
  });

  it("rejects an email type the user has none of", async () => {
    const result = await resolveSearchPlan({ type: "email_type", emailType: "support" }, "ticket?", "user-1", store);
    expect(result).toEqual({ status: "rejected", code: "INVALID_SOURCE", reason: "No emails of type support" });
  });

  it("never counts emails for the all type", async () => {
    const result = await resolveSearchPlan({ type: "email_type", emailType: "all" }, "anything", "user-1", store);
    expect(result.status).toBe("resolved");
    expect(store.countEmails).not.toHaveBeenCalled();
  });
});

describe("scopeKey", () => {
  it("renders each scope", () => {
    expect(scopeKey({ type: "all" })).toBe("all");
    expect(scopeKey({ type: "legacy_document", documentId: "d" })).toBe("document:d");
    expect(scopeKey({ type: "email_type", emailType: "personal" })).toBe("email_type:personal");
  });
});
