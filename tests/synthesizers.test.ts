// ============================================
// Deterministic Synthesizer Tests
// ============================================

import { describe, it, expect } from "vitest";
import { synthesizeAnswer } from "../src/answer/synthesize.js";
import { extractCompanyEntities, synthesizeEmail } from "../src/answer/synthesizers/email.js";
import { synthesizeFinancial } from "../src/answer/synthesizers/financial.js";
import { findTrip, joinNatural, requestedFields, synthesizeVacation } from "../src/answer/synthesizers/vacation.js";
import type { QueryClassification } from "../src/types/index.js";
import { documentPassage, emailPassage } from "./fakes.js";

const noTopics: QueryClassification = {
  isExpense: false,
  isSkills: false,
  isVacation: false,
  isPromptEngineering: false,
  years: [],
};

// ============================================
// Financial
// ============================================

describe("synthesizeFinancial", () => {
  const netflix = [
    documentPassage("d1", "Netflix subscription $15.99"),
    documentPassage("d2", "Venmo payment to Netflix $9.99"),
  ];

  it("filters passages by the named payment method", () => {
    const answer = synthesizeFinancial({
      question: "how much did I pay Netflix via venmo?",
      passages: netflix,
      classification: noTopics,
    });
    expect(answer).toBe("You paid $9.99 to Netflix via Venmo.");
  });

  it("takes the first matching amount without a payment method", () => {
    const answer = synthesizeFinancial({
      question: "how much did I pay Netflix?",
      passages: netflix,
      classification: noTopics,
    });
    expect(answer).toBe("You paid $15.99 to Netflix.");
  });

  it("names the party from the passage that carries the amount", () => {
    const answer = synthesizeFinancial({
      question: "how much did I pay for dinner with sarah",
      passages: [
        documentPassage("d1", "Dinner reservation confirmed for Friday"),
        documentPassage("d2", "Zelle transfer to Sarah $45.00"),
      ],
      classification: noTopics,
    });
    expect(answer).toBe("You paid $45.00 to Sarah.");
  });

  it("lists every distinct amount for a payment method", () => {
    const answer = synthesizeFinancial({
      question: "how much did I send Andy via zelle?",
      passages: [
        documentPassage("d1", "Zelle to Andy Eckman $200.00"),
        documentPassage("d2", "Zelle to Andy Eckman $150.00"),
        documentPassage("d3", "Venmo to Andy $5.00"),
      ],
      classification: noTopics,
    });
    expect(answer).toBe("You paid these amounts to Andy via Zelle: $200.00, $150.00.");
  });

  it("adds up charges related to a location", () => {
    const answer = synthesizeFinancial({
      question: "how much did I spend in Istanbul?",
      passages: [
        documentPassage("d1", "THY flight IST $850.00"),
        documentPassage("d2", "Foreign Exch Fee $12.50"),
        documentPassage("d3", "Grocery store $40.00"),
      ],
      classification: noTopics,
    });
    expect(answer).toBe("You spent these amounts related to Istanbul: $850.00, $12.50.");
  });

  it("does not answer questions about other things", () => {
    expect(
      synthesizeFinancial({ question: "what is my favorite color?", passages: netflix, classification: noTopics })
    ).toBeNull();
  });
});

// ============================================
// Email
// ============================================

describe("synthesizeEmail", () => {
  const appleReceipt = (amount: string) =>
    emailPassage(
      `e-${amount}`,
      `[EMAIL from no_reply@email.apple.com] Subject: Your receipt from Apple\nContent: iCloud+ 50GB ${amount} billed`
    );

  it("reads the amount near the company mention", () => {
    const answer = synthesizeEmail({
      question: "check emails for my Apple invoice",
      passages: [appleReceipt("$0.99")],
      classification: noTopics,
    });
    expect(answer).toBe("The Apple invoice was $0.99.");
  });

  it("lists several invoices", () => {
    const answer = synthesizeEmail({
      question: "what was my Apple invoice?",
      passages: [appleReceipt("$0.99"), appleReceipt("$2.99")],
      classification: noTopics,
    });
    expect(answer).toBe("The Apple invoices were: $0.99, $2.99.");
  });

  it("ignores document passages", () => {
    const answer = synthesizeEmail({
      question: "what was my Apple invoice?",
      passages: [documentPassage("d1", "Apple $0.99")],
      classification: noTopics,
    });
    expect(answer).toBeNull();
  });

  it("extracts known companies before capitalized words", () => {
    expect(extractCompanyEntities("Find my Stripe receipt from iCloud").map((e) => e.name)).toEqual([
      "apple",
      "stripe",
    ]);
  });
});

// ============================================
// Vacation
// ============================================

const TRIPS = [
  "Japan - Tokyo (2022)",
  "Airline: JAL",
  "Total Cost: $4,100",
  "Thailand – Bangkok & Phuket (2023)",
  "Airline: Thai Airways",
  "Hotel: Riverside Inn - $900",
  "Rental Car: Toyota Yaris - $250",
  "Total Cost: $3,200",
].join("\n");

describe("synthesizeVacation", () => {
  it("answers only the destination when asked where", () => {
    const answer = synthesizeVacation({
      question: "where did I go in 2023?",
      passages: [documentPassage("d1", TRIPS)],
      classification: noTopics,
    });
    expect(answer).toBe("Thailand (Bangkok & Phuket)");
  });

  it("picks the trip for the requested year", () => {
    const answer = synthesizeVacation({
      question: "where did I go in 2022?",
      passages: [documentPassage("d1", TRIPS)],
      classification: noTopics,
    });
    expect(answer).toBe("Japan (Tokyo)");
  });

  it("joins several requested fields", () => {
    const answer = synthesizeVacation({
      question: "which hotel and rental car on my 2023 trip?",
      passages: [documentPassage("d1", TRIPS)],
      classification: { ...noTopics, isVacation: true },
    });
    expect(answer).toBe("Toyota Yaris for $250 and Riverside Inn for $900");
  });

  it("uses the year the query classifier found", () => {
    const answer = synthesizeVacation({
      question: "where did we travel back then?",
      passages: [documentPassage("d1", `${TRIPS}\nNew Zealand – Auckland (1999)`)],
      classification: { ...noTopics, years: ["1999"] },
    });
    expect(answer).toBe("New Zealand (Auckland)");
  });

  it("stays out of non-travel questions", () => {
    const answer = synthesizeVacation({
      question: "what was the total?",
      passages: [documentPassage("d1", TRIPS)],
      classification: noTopics,
    });
    expect(answer).toBeNull();
  });
});

describe("vacation helpers", () => {
  it("reads fields up to the next trip header", () => {
    expect(findTrip([TRIPS], "2022")).toEqual({
      country: "Japan",
      cities: "Tokyo",
      year: "2022",
      totalCost: "$4,100",
      airline: "JAL",
    });
  });

  it("keeps multi-word countries and older years", () => {
    expect(findTrip(["New Zealand – Auckland & Queenstown (1999)\nAirline: Air New Zealand"], "1999")).toEqual({
      country: "New Zealand",
      cities: "Auckland & Queenstown",
      year: "1999",
      airline: "Air New Zealand",
    });
  });

  it("detects requested fields at word starts", () => {
    expect(requestedFields("where did i stay and what did it cost")).toEqual(["destination", "cost", "hotel"]);
  });

  it("joins parts naturally", () => {
    expect(joinNatural(["a"])).toBe("a");
    expect(joinNatural(["a", "b", "c"])).toBe("a, b, and c");
  });
});

// ============================================
// Dispatch
// ============================================

describe("synthesizeAnswer", () => {
  it("tries the financial extractor first", () => {
    const result = synthesizeAnswer({
      question: "how much did I pay Netflix via venmo?",
      passages: [documentPassage("d1", "Netflix $15.99"), documentPassage("d2", "Venmo payment to Netflix $9.99")],
      classification: { ...noTopics, isExpense: true },
    });
    expect(result).toEqual({ kind: "financial", answer: "You paid $9.99 to Netflix via Venmo." });
  });

  it("returns null with no passages", () => {
    expect(
      synthesizeAnswer({ question: "how much did I pay Netflix?", passages: [], classification: noTopics })
    ).toBeNull();
  });
});
