// ============================================
// Pipeline Tests — answerQuestion end to end with in-process fakes
// ============================================

import { describe, it, expect, beforeEach } from "vitest";
import { NO_DOCUMENTS_MESSAGE, NO_EMAIL_EVIDENCE_MESSAGE } from "../src/answer/fallbackMessages.js";
import { createQueryEngine, type QueryEngine } from "../src/app/pipeline.js";
import { retrievalError } from "../src/lib/errors.js";
import { DualChannelRetriever } from "../src/retrieval/retriever.js";
import {
  documentPassage,
  FakeDocumentIndex,
  FakeEmailIndex,
  FakeEmbedder,
  FakeGenerator,
  FakeOwnershipStore,
  ownedDocument,
} from "./fakes.js";

describe("QueryEngine.answerQuestion", () => {
  let documents: FakeDocumentIndex;
  let emails: FakeEmailIndex;
  let generator: FakeGenerator;
  let store: FakeOwnershipStore;
  let engine: QueryEngine;

  beforeEach(() => {
    documents = new FakeDocumentIndex();
    emails = new FakeEmailIndex();
    generator = new FakeGenerator();
    store = new FakeOwnershipStore();
    store.documents = [ownedDocument("d1", { filePath: "lease.pdf" })];

    engine = createQueryEngine({
      retriever: new DualChannelRetriever({ embedder: new FakeEmbedder(), documents, emails, topK: 10 }),
      generator,
      ownership: store,
      options: { maxContextChars: 6000, documentCacheTtlMs: 60_000, answerCacheTtlMs: 60_000 },
      random: () => 0,
      now: () => 1000,
    });
  });

  // ============================================
  // Deterministic answers
  // ============================================

  it("answers a payment question from the matching passage", async () => {
    documents.passages = [
      documentPassage("d1", "Netflix subscription $15.99"),
      documentPassage("d2", "Venmo payment to Netflix $9.99"),
    ];

    const response = await engine.answerQuestion("how much did I pay Netflix via venmo?", "user-1", { type: "all" });

    expect(response).toEqual({
      answer: "You paid $9.99 to Netflix via Venmo.",
      sources: [
        { kind: "document", id: "d1", label: "Doc d1" },
        { kind: "document", id: "d2", label: "Doc d2" },
      ],
      outcome: "synthesized",
      fromCache: false,
      elapsedMs: 0,
    });
    expect(generator.complete).not.toHaveBeenCalled();
  });

  it("does not fall back to documents when email was asked for", async () => {
    documents.passages = [documentPassage("d1", "Apple receipt $0.99")];

    const response = await engine.answerQuestion("check emails for my Apple invoice", "user-1", { type: "all" });

    expect(response.answer).toBe(NO_EMAIL_EVIDENCE_MESSAGE);
    expect(response.sources).toEqual([]);
    expect(response.outcome).toBe("no_email_evidence");
    expect(documents.search).not.toHaveBeenCalled();
  });

  // ============================================
  // Generation
  // ============================================

  it("returns a generated answer that passes validation", async () => {
    documents.passages = [documentPassage("d1", "Lease term: 12 months starting March 2023")];
    generator.reply = "The lease runs 12 months from March 2023.";

    const response = await engine.answerQuestion("What is the lease term?", "user-1", { type: "all" });

    expect(response.answer).toBe("The lease runs 12 months from March 2023.");
    expect(response.outcome).toBe("generated");
    expect(response.sources).toEqual([{ kind: "document", id: "d1", label: "Doc d1" }]);
    expect(generator.complete).toHaveBeenCalledWith(
      "What is the lease term?",
      ["Lease term: 12 months starting March 2023"],
      expect.objectContaining({ signal: undefined })
    );
  });

  it("replaces an answer with unsupported literals by a safe extraction", async () => {
    documents.passages = [documentPassage("d1", "Lease starts 2023-04-01.")];
    generator.reply = "The lease starts on 2024-01-01.";

    const response = await engine.answerQuestion("When does the lease start?", "user-1", { type: "all" });

    expect(response.answer).toBe("Based on the available information, I found these dates: 2023-04-01");
    expect(response.outcome).toBe("safe_extraction");
  });

  it("replaces an answer that names nothing from the context", async () => {
    documents.passages = [documentPassage("d1", "Lease starts 2023-04-01.")];
    generator.reply = "it starts soon.";

    const response = await engine.answerQuestion("When does the lease start?", "user-1", { type: "all" });

    expect(response.answer).toBe("Based on the available information, I found these dates: 2023-04-01");
    expect(response.outcome).toBe("safe_extraction");
  });

  it("answers from context literals when generation fails", async () => {
    documents.passages = [documentPassage("d1", "Lease starts 2023-04-01.")];
    generator.complete.mockRejectedValueOnce(new Error("timeout"));

    const response = await engine.answerQuestion("When does the lease start?", "user-1", { type: "all" });

    expect(response.answer).toBe("Based on the available information, I found these dates: 2023-04-01");
    expect(response.outcome).toBe("safe_extraction");
  });

  it("apologizes when generation fails and nothing can be extracted", async () => {
    documents.passages = [documentPassage("d1", "Lease starts soon.")];
    generator.complete.mockRejectedValue(new Error("model overloaded"));

    const response = await engine.answerQuestion("Summarize the lease", "user-1", { type: "all" });

    expect(response).toEqual({
      answer: "I'm experiencing technical difficulties right now. Please try your question again in a moment.",
      sources: [],
      outcome: "technical_difficulty",
      fromCache: false,
      elapsedMs: 0,
    });

    await engine.answerQuestion("Summarize the lease", "user-1", { type: "all" });
    expect(generator.complete).toHaveBeenCalledTimes(2);
  });

  // ============================================
  // Evidence-absent paths
  // ============================================

  it("tailors the message when nothing was found", async () => {
    store.documents = [];

    const response = await engine.answerQuestion("What is my favorite color?", "user-1", { type: "all" });

    expect(response.answer).toBe(
      "I don't have enough information to answer that question. Please upload relevant documents or try a more specific question."
    );
    expect(response.outcome).toBe("no_evidence");
  });

  it("short-circuits document-only searches for users without documents", async () => {
    store.documentBelongsTo.mockResolvedValue(true);
    store.documents = [];

    const response = await engine.answerQuestion("rent?", "user-1", { type: "document", documentId: "d1" });

    expect(response.answer).toBe(NO_DOCUMENTS_MESSAGE);
    expect(response.outcome).toBe("no_documents");
    expect(documents.search).not.toHaveBeenCalled();
  });

  // ============================================
  // Caching
  // ============================================

  it("serves a repeated question from the answer cache", async () => {
    documents.passages = [documentPassage("d2", "Venmo payment to Netflix $9.99")];

    await engine.answerQuestion("how much did I pay Netflix via venmo?", "user-1", { type: "all" });
    const second = await engine.answerQuestion("  How much did I pay Netflix via Venmo? ", "user-1", { type: "all" });

    expect(second.fromCache).toBe(true);
    expect(second.answer).toBe("You paid $9.99 to Netflix via Venmo.");
    expect(documents.search).toHaveBeenCalledTimes(1);
  });

  it("hands out cached citations that callers cannot change", async () => {
    documents.passages = [documentPassage("d2", "Venmo payment to Netflix $9.99")];

    const first = await engine.answerQuestion("how much did I pay Netflix via venmo?", "user-1", { type: "all" });
    first.sources.push({ kind: "document", id: "d2", label: "Doc d2" });
    const second = await engine.answerQuestion("how much did I pay Netflix via venmo?", "user-1", { type: "all" });
    second.sources.splice(0);
    const third = await engine.answerQuestion("how much did I pay Netflix via venmo?", "user-1", { type: "all" });

    expect(second.fromCache).toBe(true);
    expect(third.sources).toEqual([{ kind: "document", id: "d2", label: "Doc d2" }]);
  });

  it("keeps cached answers apart per user and scope", async () => {
    documents.passages = [documentPassage("d2", "Venmo payment to Netflix $9.99")];

    await engine.answerQuestion("how much did I pay Netflix via venmo?", "user-1", { type: "all" });
    const other = await engine.answerQuestion("how much did I pay Netflix via venmo?", "user-2", { type: "all" });

    expect(other.fromCache).toBe(false);
  });

  it("forgets a user's answers on invalidation", async () => {
    store.documents = [];

    await engine.answerQuestion("What is my favorite color?", "user-1", { type: "all" });
    engine.invalidateUser("user-1");
    const again = await engine.answerQuestion("What is my favorite color?", "user-1", { type: "all" });

    expect(again.fromCache).toBe(false);
    expect(documents.search).toHaveBeenCalledTimes(2);
  });

  // ============================================
  // Errors
  // ============================================

  it("rejects a document the user does not own", async () => {
    await expect(
      engine.answerQuestion("rent?", "user-1", { type: "document", documentId: "d9" })
    ).rejects.toMatchObject({ code: "DOCUMENT_NOT_FOUND" });
  });

  it("reports a storage failure during the ownership check as a retrieval failure", async () => {
    store.documentBelongsTo.mockRejectedValue(retrievalError("Document ownership check failed: connection refused"));

    await expect(
      engine.answerQuestion("rent?", "user-1", { type: "document", documentId: "d1" })
    ).rejects.toMatchObject({ code: "RETRIEVAL_FAILED" });
    expect(documents.search).not.toHaveBeenCalled();
  });

  it("rejects an already cancelled request", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      engine.answerQuestion("rent?", "user-1", { type: "all" }, { signal: controller.signal })
    ).rejects.toMatchObject({ code: "REQUEST_CANCELLED" });
  });

  it("fails when both channels fail", async () => {
    documents.search.mockRejectedValue(new Error("down"));
    emails.search.mockRejectedValue(new Error("down"));

    await expect(engine.answerQuestion("rent?", "user-1", { type: "all" })).rejects.toMatchObject({
      code: "RETRIEVAL_FAILED",
    });
  });
});
