// src/modules/requirements/lib/confidence.ts
//
// Tier bounds are a product policy, fixed here and nowhere else:
//   low    score < 1/3
//   medium 1/3 <= score < 2/3
//   high   score >= 2/3
// Stores translate tier filters through confidenceRange().

import type { ConfidenceTier } from "../types";

export const CONFIDENCE_TIERS = [
  "low",
  "medium",
  "high",
] as const satisfies readonly ConfidenceTier[];

const MEDIUM_FLOOR = 1 / 3;
const HIGH_FLOOR = 2 / 3;

export type ConfidenceRange = {
  /** inclusive */
  min: number;
  /** exclusive; null means no upper bound */
  max: number | null;
};

export function confidenceTier(score: number): ConfidenceTier {
  if (score >= HIGH_FLOOR) return "high";
  if (score >= MEDIUM_FLOOR) return "medium";
  return "low";
}

export function confidenceRange(tier: ConfidenceTier): ConfidenceRange {
  switch (tier) {
    case "low":
      return { min: 0, max: MEDIUM_FLOOR };
    case "medium":
      return { min: MEDIUM_FLOOR, max: HIGH_FLOOR };
    case "high":
      return { min: HIGH_FLOOR, max: null };
  }
}

export function inConfidenceRange(score: number, range: ConfidenceRange) {
  return score >= range.min && (range.max === null || score < range.max);
}
