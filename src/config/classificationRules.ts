// src/config/classificationRules.ts
//
// Category -> ordered rule list. Declaration order matters: when two
// categories score the same, the one declared first wins.
// Add rules here; the classifier has no per-category logic.

import type { RequirementClassification } from "../modules/requirements/types";

export type ClassificationRule = {
  readonly pattern: RegExp;
  readonly description: string;
};

export type CategoryRules = {
  readonly category: RequirementClassification;
  readonly rules: readonly ClassificationRule[];
};

function rule(source: string, description: string): ClassificationRule {
  return Object.freeze({ pattern: new RegExp(source, "i"), description });
}

function category(
  name: RequirementClassification,
  rules: ClassificationRule[]
): CategoryRules {
  return Object.freeze({ category: name, rules: Object.freeze(rules) });
}

export const CLASSIFICATION_RULES: readonly CategoryRules[] = Object.freeze([
  category("PERFORMANCE_REQUIREMENT", [
    rule(
      String.raw`shall\s+(?:maintain|achieve|ensure|provide|support)\s+.*?(?:\d+%|\d+\s+(?:seconds|minutes|hours|days))`,
      "obligation tied to a percentage or time bound"
    ),
    rule(String.raw`uptime.*?\d+%`, "uptime percentage"),
    rule(
      String.raw`response\s+time.*?\d+\s+(?:seconds|milliseconds)`,
      "response time bound"
    ),
    rule(String.raw`availability.*?\d+%`, "availability percentage"),
    rule(String.raw`processing.*?within\s+\d+`, "processing time bound"),
    rule(String.raw`latency.*?\d+`, "latency bound"),
  ]),
  category("COMPLIANCE_REQUIREMENT", [
    rule(String.raw`shall\s+comply\s+with`, "shall comply with"),
    rule(
      String.raw`must\s+(?:meet|satisfy|adhere\s+to)`,
      "must meet / satisfy / adhere to"
    ),
    rule(String.raw`in\s+accordance\s+with`, "in accordance with"),
    rule(
      String.raw`(?:FISMA|NIST|ISO|SOC|HIPAA|FedRAMP)`,
      "named regulatory or standards regime"
    ),
    rule(String.raw`encryption.*?(?:AES|TLS|SSL)`, "encryption standard"),
    rule(
      String.raw`security\s+(?:standards|requirements|controls)`,
      "security standards or controls"
    ),
    rule(String.raw`audit.*?requirements`, "audit requirements"),
    rule(
      String.raw`(?:authentication|authorization).*?(?:MFA|multi-factor)`,
      "multi-factor authentication"
    ),
  ]),
  category("DELIVERABLE_REQUIREMENT", [
    rule(
      String.raw`shall\s+(?:submit|provide|deliver|furnish)`,
      "shall submit / provide / deliver / furnish"
    ),
    rule(
      String.raw`(?:report|documentation|deliverable).*?(?:monthly|weekly|quarterly|annually)`,
      "periodic reporting cadence"
    ),
    rule(String.raw`contractor\s+shall\s+prepare`, "contractor shall prepare"),
    rule(
      String.raw`(?:plan|document|report).*?shall\s+be\s+(?:submitted|provided|delivered)`,
      "artifact shall be submitted"
    ),
    rule(
      String.raw`by\s+the\s+\d+(?:st|nd|rd|th)\s+(?:day|business\s+day)`,
      "due by day of month"
    ),
  ]),
]);
