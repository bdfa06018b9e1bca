// src/modules/requirements/lib/validation.ts
// Reviewer actions on an extracted requirement. Every transition appends
// exactly one snapshot of the pre-transition state; failures append nothing.

import type { ExtractionStore } from "../../../db/store";
import { InvalidActionError } from "../../../lib/errors";
import {
  VALIDATION_ACTIONS,
  type HistoryEntry,
  type Requirement,
  type RequirementClassification,
  type ValidationAction,
  type ValidationStatus,
} from "../types";

export type ValidationInput = {
  action: string;
  actor: string;
  cleanText?: string | null;
  classification?: RequirementClassification | null;
  notes?: string | null;
};

const TARGET_STATUS: Record<ValidationAction, ValidationStatus> = {
  approve: "human_validated",
  correct: "human_corrected",
  flag: "flagged_for_review",
};

export function isValidationAction(action: string): action is ValidationAction {
  return (VALIDATION_ACTIONS as readonly string[]).includes(action);
}

export function applyValidation(
  requirement: Requirement,
  input: ValidationInput,
  now: Date = new Date()
): Requirement {
  const { action } = input;
  if (!isValidationAction(action)) {
    throw new InvalidActionError(action);
  }

  const notes = input.notes ? input.notes : null;

  const entry: HistoryEntry = Object.freeze({
    timestamp: now.toISOString(),
    action,
    actor: input.actor,
    previousStatus: requirement.status,
    previousCleanText: requirement.cleanText,
    previousClassification: requirement.classification,
    notes,
  });

  const next: Requirement = {
    ...requirement,
    history: Object.freeze([...requirement.history, entry]),
    status: TARGET_STATUS[action],
    validatedBy: input.actor,
    validatedAt: now,
    updatedAt: now,
  };

  // flag records the reviewer's concern only
  if (action !== "flag") {
    if (input.cleanText) next.cleanText = input.cleanText;
    if (input.classification) next.classification = input.classification;
  }

  if (notes) next.validationNotes = notes;

  return next;
}

/**
 * Run a reviewer action through the store's single-record atomic update.
 */
export async function validateRequirement(
  store: ExtractionStore,
  requirementId: string,
  input: ValidationInput,
  now: () => Date = () => new Date()
): Promise<Requirement> {
  return store.updateRequirement(requirementId, (current) =>
    applyValidation(current, input, now())
  );
}
