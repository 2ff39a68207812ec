import { describe, expect, it } from "vitest";
import { checkGameSpec, itemCount, MIN_ITEMS, NO_FEEDBACK, SummaryFieldsSchema, toReviewVerdict } from "../src/pipeline/schemas.js";
import { makeFlashcardsSpec, makeMatchingSpec, makeQuizSpec } from "./fixtures.js";

describe("pipeline/schemas", () => {
  it("accepts each game type at its minimum item count", () => {
    expect(checkGameSpec(makeMatchingSpec(MIN_ITEMS.matching), "matching").ok).toBe(true);
    expect(checkGameSpec(makeQuizSpec(MIN_ITEMS.quiz), "quiz").ok).toBe(true);
    expect(checkGameSpec(makeFlashcardsSpec(MIN_ITEMS.flashcards), "flashcards").ok).toBe(true);
  });

  it("rejects specs below the minimum item count", () => {
    const result = checkGameSpec(makeMatchingSpec(7), "matching");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toContain("pairs");
  });

  it("rejects a spec whose game_type differs from the expected type", () => {
    const result = checkGameSpec(makeQuizSpec(), "matching");
    expect(result).toEqual({ ok: false, reason: 'expected game_type "matching" but got "quiz"' });
  });

  it("rejects quiz questions whose correct index is outside the options", () => {
    const spec = makeQuizSpec();
    spec.questions[0] = { ...spec.questions[0], correct: 4 };
    const result = checkGameSpec(spec, "quiz");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("questions.0.correct: correct must index into options");
  });

  it("rejects missing required keys and the empty mapping", () => {
    const { title: _title, ...noTitle } = makeFlashcardsSpec();
    expect(checkGameSpec(noTitle, "flashcards").ok).toBe(false);
    expect(checkGameSpec({}, "flashcards").ok).toBe(false);
  });

  it("counts items per variant", () => {
    expect(itemCount(makeMatchingSpec(9))).toBe(9);
    expect(itemCount(makeQuizSpec(11))).toBe(11);
    expect(itemCount(makeFlashcardsSpec(13))).toBe(13);
  });

  it("toReviewVerdict fails closed", () => {
    expect(toReviewVerdict({})).toEqual({ approved: false, feedback: NO_FEEDBACK });
    expect(toReviewVerdict({ feedback: "Definitions 3 and 4 are swapped" })).toEqual({
      approved: false,
      feedback: "Definitions 3 and 4 are swapped"
    });
    expect(toReviewVerdict({ approved: "true", feedback: "ok" })).toEqual({ approved: false, feedback: "ok" });
    expect(toReviewVerdict({ approved: true, feedback: "  " })).toEqual({ approved: true, feedback: NO_FEEDBACK });
    expect(toReviewVerdict([true])).toEqual({ approved: false, feedback: NO_FEEDBACK });
  });

  it("summary schema fills defaults and accepts string objectives", () => {
    const parsed = SummaryFieldsSchema.parse({ topic: "Tides", learning_objectives: "Explain tides" });
    expect(parsed).toEqual({
      topic: "Tides",
      subject_area: "general",
      key_concepts: [],
      facts: [],
      learning_objectives: "Explain tides"
    });
    expect(SummaryFieldsSchema.safeParse({ subject_area: "physics" }).success).toBe(false);
  });
});
