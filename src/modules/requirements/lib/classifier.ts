// src/modules/requirements/lib/classifier.ts

import {
  CLASSIFICATION_RULES,
  type CategoryRules,
} from "../../../config/classificationRules";
import type { RequirementClassification } from "../types";

export type Classification = {
  classification: RequirementClassification | null;
  /** Fraction of the winning category's rules that matched, in [0, 1]. */
  confidence: number;
  matchedRules: string[];
};

/**
 * Score the text against every category's rule set and keep the category
 * with the strictly highest matched fraction. Equal scores keep the
 * category declared first in the table.
 */
export function classify(
  text: string,
  table: readonly CategoryRules[] = CLASSIFICATION_RULES
): Classification {
  let best: Classification = {
    classification: null,
    confidence: 0,
    matchedRules: [],
  };

  for (const { category, rules } of table) {
    if (rules.length === 0) continue;

    const matched = rules
      .filter((r) => r.pattern.test(text))
      .map((r) => r.description);
    if (matched.length === 0) continue;

    const score = matched.length / rules.length;
    if (best.classification === null || score > best.confidence) {
      best = { classification: category, confidence: score, matchedRules: matched };
    }
  }

  return best;
}
