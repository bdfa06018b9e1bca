// src/modules/requirements/types.ts

export const REQUIREMENT_CLASSIFICATIONS = [
  "PERFORMANCE_REQUIREMENT",
  "COMPLIANCE_REQUIREMENT",
  "DELIVERABLE_REQUIREMENT",
] as const;

export type RequirementClassification =
  (typeof REQUIREMENT_CLASSIFICATIONS)[number];

export const VALIDATION_STATUSES = [
  "ai_extracted",
  "human_validated",
  "human_corrected",
  "flagged_for_review",
] as const;

export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];

export const VALIDATION_ACTIONS = ["approve", "correct", "flag"] as const;

export type ValidationAction = (typeof VALIDATION_ACTIONS)[number];

export type ConfidenceTier = "low" | "medium" | "high";

/**
 * Snapshot of a requirement taken right before a reviewer action
 * overwrote it. Entries are frozen once appended.
 */
export type HistoryEntry = {
  readonly timestamp: string;
  readonly action: ValidationAction;
  readonly actor: string;
  readonly previousStatus: ValidationStatus;
  readonly previousCleanText: string;
  readonly previousClassification: RequirementClassification | null;
  readonly notes: string | null;
};

/**
 * What the assembler produces for one obligation-bearing chunk.
 */
export type RequirementDraft = {
  id: string;
  documentId: string;
  sourceChunkIndex: number;
  rawText: string;
  cleanText: string;
  classification: RequirementClassification | null;
  confidence: number;
  sourceSection: string;
  sourceSubsection: string;
  sourcePage: number;
  sourceParagraph: number;
  crossReferences: string[];
  status: ValidationStatus;
};

export type Requirement = RequirementDraft & {
  validatedBy: string | null;
  validatedAt: Date | null;
  validationNotes: string | null;
  history: readonly HistoryEntry[];
  createdAt: Date;
  updatedAt: Date;
};
