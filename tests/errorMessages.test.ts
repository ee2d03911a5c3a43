// ============================================
// Technical-Difficulty Message Tests
// ============================================

import { describe, it, expect } from "vitest";
import { difficultyFamily, difficultyMessages, technicalDifficultyMessage } from "../src/answer/errorMessages.js";
import { getUserMessage, QueryEngineError, wrapError } from "../src/lib/errors.js";

describe("difficultyFamily", () => {
  it("classifies failures by their text", () => {
    expect(difficultyFamily("write EPIPE")).toBe("connection");
    expect(difficultyFamily("socket hang up ECONNRESET")).toBe("connection");
    expect(difficultyFamily("Vector search timed out")).toBe("search");
    expect(difficultyFamily("Generation failed")).toBe("generation");
    expect(difficultyFamily("quota exceeded")).toBe("generic");
    expect(difficultyFamily()).toBe("generic");
  });
});

describe("technicalDifficultyMessage", () => {
  it("picks a message from the matching family", () => {
    expect(technicalDifficultyMessage("socket hang up ECONNRESET", () => 0.5)).toBe(
      "I'm having connectivity issues. Please try again in a moment."
    );
  });

  it("stays within the family for values close to 1", () => {
    expect(technicalDifficultyMessage(undefined, () => 0.99)).toBe(
      "I encountered a technical problem while processing your request. Please try again."
    );
  });

  it("never repeats internal error text", () => {
    for (const message of difficultyMessages("generation")) {
      expect(message).not.toContain("Generation failed");
    }
  });
});

describe("errors", () => {
  it("keeps a QueryEngineError as is", () => {
    const error = new QueryEngineError({ code: "INVALID_SOURCE", message: "bad" });
    expect(wrapError(error)).toBe(error);
  });

  it("wraps unknown failures", () => {
    const wrapped = wrapError(new Error("boom"), "req-1");
    expect(wrapped.code).toBe("UNKNOWN_ERROR");
    expect(wrapped.requestId).toBe("req-1");
  });

  it("maps codes to user-facing text", () => {
    expect(getUserMessage({ code: "DOCUMENT_NOT_FOUND" })).toBe(
      "The requested document could not be found or you don't have access to it."
    );
    expect(getUserMessage({ code: "RETRIEVAL_FAILED" })).toBe(
      "Unable to search your documents and emails at this time. Please try again."
    );
  });
});
