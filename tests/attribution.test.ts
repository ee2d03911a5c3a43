// ============================================
// Relevance Attribution Tests
// ============================================

import { describe, it, expect } from "vitest";
import { attributeSources, toCitations } from "../src/grounding/attribution.js";
import { documentPassage, emailPassage } from "./fakes.js";

describe("attributeSources", () => {
  const passages = [
    documentPassage("d0", "Rent payment $1,500"),
    documentPassage("d1", "Spotify $10"),
    emailPassage("e2", "[EMAIL from billing] Netflix via Venmo $9.99", "Your Netflix receipt"),
    documentPassage("d3", "netflix line", "First"),
    documentPassage("d3", "venmo netflix line", "Second"),
    documentPassage("d5", "netflix again"),
  ];

  it("cites the leading passages plus the best term matches", () => {
    const { selected, citations } = attributeSources("how much did I pay Netflix via venmo?", passages);

    expect(selected).toEqual(passages.slice(0, 5));
    expect(citations).toEqual([
      { kind: "document", id: "d0", label: "Doc d0" },
      { kind: "document", id: "d1", label: "Doc d1" },
      { kind: "email", id: "e2", label: "Your Netflix receipt" },
      { kind: "document", id: "d3", label: "First" },
    ]);
  });

  it("cites only leading passages when no term matches", () => {
    const { citations } = attributeSources("zzzz qqqq", passages);
    expect(citations.map((c) => c.id)).toEqual(["d0", "d1"]);
  });

  it("returns nothing for no passages", () => {
    expect(attributeSources("netflix", [])).toEqual({ citations: [], selected: [] });
  });
});

describe("toCitations", () => {
  it("keeps a document and an email with the same id apart", () => {
    const citations = toCitations([documentPassage("42", "a"), emailPassage("42", "b")]);
    expect(citations).toEqual([
      { kind: "document", id: "42", label: "Doc 42" },
      { kind: "email", id: "42", label: "Email 42" },
    ]);
  });
});
