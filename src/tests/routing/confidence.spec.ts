import { describe, expect, it } from "vitest";
import { MAX_CONFIDENCE, describeConfidence, scoreOutcome, selectBand } from "../../routing/confidence";
import type { ExecutionOutcome, QuestionType, RoutingDecision } from "../../routing/types";

function decision(confidence: number, questionType: QuestionType = "general"): RoutingDecision {
  return {
    primaryTool: "institutions",
    confidence,
    questionType,
    hasLocation: false,
    location: null,
    toolScores: { institutions: 1, hospitals: 0, restaurants: 0, web_search: 0 }
  };
}

function outcome(overrides: Partial<ExecutionOutcome> = {}): ExecutionOutcome {
  return { success: true, usedFallback: false, resultEmpty: false, rawResult: "Found 3 institutions.", ...overrides };
}

const QUESTION_TYPES: QuestionType[] = ["count", "list", "comparison", "filter", "general"];
const OUTCOMES: ExecutionOutcome[] = [
  outcome(),
  outcome({ usedFallback: true }),
  outcome({ resultEmpty: true }),
  outcome({ success: false, resultEmpty: true, rawResult: "Database error: timeout" }),
  outcome({ success: false, usedFallback: true })
];
const CONFIDENCES = Array.from({ length: 21 }, (_, index) => index / 20);

describe("selectBand", () => {
  it("puts failures and empty results in the failed band", () => {
    expect(selectBand(decision(0.9), outcome({ success: false }))).toBe("failed");
    expect(selectBand(decision(0.9), outcome({ resultEmpty: true }))).toBe("failed");
    expect(selectBand(decision(0.9), outcome({ success: false, usedFallback: true }))).toBe("failed");
  });

  it("puts fallback answers in the fallback band", () => {
    expect(selectBand(decision(0.9, "filter"), outcome({ usedFallback: true }))).toBe("fallback");
  });

  it("treats filter and comparison questions as complex", () => {
    expect(selectBand(decision(0.9, "filter"), outcome())).toBe("complex");
    expect(selectBand(decision(0.9, "comparison"), outcome())).toBe("complex");
    expect(selectBand(decision(0.9, "count"), outcome())).toBe("clean");
    expect(selectBand(decision(0.9, "list"), outcome())).toBe("clean");
  });
});

describe("scoreOutcome", () => {
  it("interpolates within the clean band", () => {
    expect(scoreOutcome(decision(0), outcome()).score).toBe(0.8);
    expect(scoreOutcome(decision(0.95, "count"), outcome()).score).toBe(0.94);
    expect(scoreOutcome(decision(1), outcome()).score).toBe(0.95);
  });

  it("interpolates within the complex band", () => {
    expect(scoreOutcome(decision(0, "filter"), outcome()).score).toBe(0.7);
    expect(scoreOutcome(decision(1, "comparison"), outcome()).score).toBe(0.89);
  });

  it("interpolates within the fallback band", () => {
    expect(scoreOutcome(decision(0), outcome({ usedFallback: true })).score).toBe(0.5);
    expect(scoreOutcome(decision(0.2), outcome({ usedFallback: true })).score).toBe(0.56);
    expect(scoreOutcome(decision(1), outcome({ usedFallback: true })).score).toBe(0.79);
  });

  it("keeps failures at or below 0.49", () => {
    expect(scoreOutcome(decision(0.95), outcome({ success: false })).score).toBe(0.47);
    expect(scoreOutcome(decision(1), outcome({ success: false })).score).toBe(0.49);
    expect(scoreOutcome(decision(0), outcome({ resultEmpty: true })).score).toBe(0);
  });

  it("reports the band and the inputs it used", () => {
    const computation = scoreOutcome(decision(0.5, "filter"), outcome());
    expect(computation.band).toBe("complex");
    expect(computation.factors).toEqual({
      routingConfidence: 0.5,
      bandFloor: 0.7,
      bandCeiling: 0.89,
      success: true,
      usedFallback: false,
      resultEmpty: false
    });
  });

  it("treats a non-finite routing confidence as zero", () => {
    expect(scoreOutcome(decision(Number.NaN), outcome()).score).toBe(0.8);
  });

  it("stays within [0, 0.95] for every combination", () => {
    for (const confidence of CONFIDENCES) {
      for (const questionType of QUESTION_TYPES) {
        for (const result of OUTCOMES) {
          const { score } = scoreOutcome(decision(confidence, questionType), result);
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(MAX_CONFIDENCE);
        }
      }
    }
  });

  it("never ranks a worse outcome above a better one", () => {
    for (const confidence of CONFIDENCES) {
      for (const questionType of QUESTION_TYPES) {
        const clean = scoreOutcome(decision(confidence, questionType), outcome()).score;
        const fallback = scoreOutcome(decision(confidence, questionType), outcome({ usedFallback: true })).score;
        const failed = scoreOutcome(decision(confidence, questionType), outcome({ success: false })).score;
        expect(clean).toBeGreaterThanOrEqual(fallback);
        expect(fallback).toBeGreaterThan(failed);
      }
    }
  });

  it("never decreases as routing confidence grows", () => {
    for (const result of OUTCOMES) {
      let previous = -1;
      for (const confidence of CONFIDENCES) {
        const { score } = scoreOutcome(decision(confidence, "general"), result);
        expect(score).toBeGreaterThanOrEqual(previous);
        previous = score;
      }
    }
  });
});

describe("describeConfidence", () => {
  it("labels each range", () => {
    expect(describeConfidence(0.94)).toBe("High confidence - simple deterministic query");
    expect(describeConfidence(0.85)).toBe("Good confidence - moderate database query");
    expect(describeConfidence(0.75)).toBe("Medium confidence - complex query or minor ambiguity");
    expect(describeConfidence(0.6)).toBe("Low confidence - fallback used or partial uncertainty");
    expect(describeConfidence(0.2)).toBe("Very low confidence - execution error or no usable result");
  });
});
