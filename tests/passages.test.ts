// ============================================
// Passage Mapping Tests — search rows to passages
// ============================================

import { describe, it, expect } from "vitest";
import {
  documentLabel,
  documentRowToPassage,
  emailRowToPassage,
  isEmailText,
  parseDocumentRow,
  parseEmailRow,
} from "../src/retrieval/passages.js";

describe("document rows", () => {
  it("falls back to the filename for identity and label", () => {
    const parsed = parseDocumentRow({
      id: 7,
      document_id: null,
      content: "Rent $1,500",
      similarity: 0.82,
      metadata: { filename: "Lease Agreement for Apartment 4B Downtown.pdf" },
    });

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(documentRowToPassage(parsed.row)).toEqual({
      text: "Rent $1,500",
      score: 0.82,
      sourceKind: "document",
      sourceIdentity: "Lease Agreement for Apartment 4B Downtown.pdf",
      displayLabel: "Document: Lease Agreement for Apartment ...",
    });
  });

  it("prefers the document id and title", () => {
    const parsed = parseDocumentRow({
      id: "c1",
      document_id: "doc-1",
      content: "text",
      similarity: 0.5,
      metadata: { title: "2023 Budget", filename: "budget.pdf" },
    });
    if (!parsed.ok) throw new Error(parsed.reason);
    const passage = documentRowToPassage(parsed.row);
    expect(passage.sourceIdentity).toBe("doc-1");
    expect(passage.displayLabel).toBe("2023 Budget");
  });

  it("rejects malformed rows", () => {
    expect(parseDocumentRow({ id: "x", content: 5 }).ok).toBe(false);
  });

  it("labels by id when nothing else is known", () => {
    expect(documentLabel("doc-9")).toBe("Document doc-9");
  });
});

describe("email rows", () => {
  it("prefixes the text with provenance", () => {
    const parsed = parseEmailRow({
      id: "c1",
      email_id: "m1",
      content: "Total $12.50",
      similarity: 0.7,
      metadata: { subject: "Your receipt", sender: "noreply@shop.example" },
    });
    if (!parsed.ok) throw new Error(parsed.reason);

    const passage = emailRowToPassage(parsed.row);
    expect(passage).toEqual({
      text: "[EMAIL from noreply@shop.example] Subject: Your receipt\nContent: Total $12.50",
      score: 0.7,
      sourceKind: "email",
      sourceIdentity: "m1",
      displayLabel: "Your receipt",
    });
    expect(isEmailText(passage.text)).toBe(true);
  });

  it("fills in missing sender and subject", () => {
    const parsed = parseEmailRow({ id: 1, email_id: 2, content: "hi", similarity: 0.1, metadata: null });
    if (!parsed.ok) throw new Error(parsed.reason);

    const passage = emailRowToPassage(parsed.row);
    expect(passage.text).toBe("[EMAIL from Unknown Sender] Subject: No Subject\nContent: hi");
    expect(passage.displayLabel).toBe("Email 2");
  });
});
