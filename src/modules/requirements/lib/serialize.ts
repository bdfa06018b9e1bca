import type { RequirementStats } from "../../../db/store";
import type { Requirement } from "../types";
import type { ComplianceMatrix } from "./complianceMatrix";
import { confidenceTier } from "./confidence";

export function requirementJson(r: Requirement) {
  return {
    id: r.id,
    document_id: r.documentId,
    source_chunk_index: r.sourceChunkIndex,
    raw_text: r.rawText,
    clean_text: r.cleanText,
    classification: r.classification,
    ai_confidence_score: r.confidence,
    confidence_tier: confidenceTier(r.confidence),
    source_section: r.sourceSection,
    source_subsection: r.sourceSubsection,
    source_page: r.sourcePage,
    source_paragraph: r.sourceParagraph,
    cross_references: r.crossReferences,
    status: r.status,
    validated_by: r.validatedBy,
    validated_at: r.validatedAt ? r.validatedAt.toISOString() : null,
    validation_notes: r.validationNotes,
    history: r.history.map((h) => ({
      timestamp: h.timestamp,
      action: h.action,
      user: h.actor,
      previous_status: h.previousStatus,
      previous_clean_text: h.previousCleanText,
      previous_classification: h.previousClassification,
      notes: h.notes,
    })),
    created_at: r.createdAt.toISOString(),
    updated_at: r.updatedAt.toISOString(),
  };
}

export function statsJson(s: RequirementStats) {
  return {
    total_requirements: s.total,
    requirements_by_classification: s.byClassification,
    validation_status_counts: s.byStatus,
    confidence_distribution: s.byConfidenceTier,
  };
}

export function complianceMatrixJson(m: ComplianceMatrix) {
  return {
    document_id: m.documentId,
    document_name: m.documentName,
    items: m.items.map((i) => ({
      requirement_id: i.requirementId,
      requirement_text: i.requirementText,
      classification: i.classification,
      ai_confidence_score: i.confidence,
      confidence_tier: i.confidenceTier,
      source_section: i.sourceSection,
      source_subsection: i.sourceSubsection,
      source_page: i.sourcePage,
      source_paragraph: i.sourceParagraph,
      cross_references: i.crossReferences,
      status: i.status,
    })),
    total_requirements: m.totalRequirements,
    validated_requirements: m.validatedRequirements,
    pending_requirements: m.pendingRequirements,
    flagged_requirements: m.flaggedRequirements,
    generated_at: m.generatedAt.toISOString(),
  };
}
