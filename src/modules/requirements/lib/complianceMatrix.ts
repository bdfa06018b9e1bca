// src/modules/requirements/lib/complianceMatrix.ts

import type { DocumentRecord } from "../../documents/types";
import type {
  ConfidenceTier,
  Requirement,
  RequirementClassification,
  ValidationStatus,
} from "../types";
import { confidenceTier } from "./confidence";
import { compareByPosition } from "./ordering";

export type ComplianceMatrixItem = {
  requirementId: string;
  requirementText: string;
  classification: RequirementClassification | null;
  confidence: number;
  confidenceTier: ConfidenceTier;
  sourceSection: string;
  sourceSubsection: string;
  sourcePage: number;
  sourceParagraph: number;
  crossReferences: string[];
  status: ValidationStatus;
};

export type ComplianceMatrix = {
  documentId: string;
  documentName: string;
  items: ComplianceMatrixItem[];
  totalRequirements: number;
  validatedRequirements: number;
  pendingRequirements: number;
  flaggedRequirements: number;
  generatedAt: Date;
};

/**
 * Per-document reviewer report: every requirement in page/paragraph order
 * with its cross references. Human-corrected items count as validated.
 */
export function buildComplianceMatrix(
  document: DocumentRecord,
  requirements: readonly Requirement[],
  generatedAt: Date = new Date()
): ComplianceMatrix {
  const items = [...requirements]
    .filter((r) => r.documentId === document.id)
    .sort(compareByPosition)
    .map(
      (r): ComplianceMatrixItem => ({
        requirementId: r.id,
        requirementText: r.cleanText || r.rawText,
        classification: r.classification,
        confidence: r.confidence,
        confidenceTier: confidenceTier(r.confidence),
        sourceSection: r.sourceSection || "Unknown",
        sourceSubsection: r.sourceSubsection,
        sourcePage: r.sourcePage,
        sourceParagraph: r.sourceParagraph,
        crossReferences: [...r.crossReferences],
        status: r.status,
      })
    );

  const count = (...statuses: ValidationStatus[]) =>
    items.filter((i) => statuses.includes(i.status)).length;

  return {
    documentId: document.id,
    documentName: document.originalFilename,
    items,
    totalRequirements: items.length,
    validatedRequirements: count("human_validated", "human_corrected"),
    pendingRequirements: count("ai_extracted"),
    flaggedRequirements: count("flagged_for_review"),
    generatedAt,
  };
}
