import { clamp, roundTo } from "../utils";
import {
  ConfidenceBand,
  ConfidenceComputation,
  ExecutionOutcome,
  RoutingDecision
} from "./types";

/** No answer is ever reported with full certainty. */
export const MAX_CONFIDENCE = 0.95;
export const MIN_CONFIDENCE = 0;

const BANDS: Record<ConfidenceBand, { floor: number; ceiling: number }> = {
  clean: { floor: 0.8, ceiling: 0.95 },
  complex: { floor: 0.7, ceiling: 0.89 },
  fallback: { floor: 0.5, ceiling: 0.79 },
  failed: { floor: 0, ceiling: 0.49 }
};

export function selectBand(decision: RoutingDecision, outcome: ExecutionOutcome): ConfidenceBand {
  if (!outcome.success || outcome.resultEmpty) {
    return "failed";
  }
  if (outcome.usedFallback) {
    return "fallback";
  }
  if (decision.questionType === "filter" || decision.questionType === "comparison") {
    return "complex";
  }
  return "clean";
}

export function scoreOutcome(decision: RoutingDecision, outcome: ExecutionOutcome): ConfidenceComputation {
  const band = selectBand(decision, outcome);
  const { floor, ceiling } = BANDS[band];
  const routingConfidence = clamp(Number.isFinite(decision.confidence) ? decision.confidence : 0, 0, 1);
  const interpolated = floor + (ceiling - floor) * routingConfidence;

  return {
    score: clamp(roundTo(interpolated, 2), MIN_CONFIDENCE, MAX_CONFIDENCE),
    band,
    factors: {
      routingConfidence,
      bandFloor: floor,
      bandCeiling: ceiling,
      success: outcome.success,
      usedFallback: outcome.usedFallback,
      resultEmpty: outcome.resultEmpty
    }
  } satisfies ConfidenceComputation;
}

export function describeConfidence(score: number): string {
  if (score >= 0.9) return "High confidence - simple deterministic query";
  if (score >= 0.8) return "Good confidence - moderate database query";
  if (score >= 0.7) return "Medium confidence - complex query or minor ambiguity";
  if (score >= 0.5) return "Low confidence - fallback used or partial uncertainty";
  return "Very low confidence - execution error or no usable result";
}
