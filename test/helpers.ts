import type { DocumentRecord } from "../src/modules/documents/types";
import type { Requirement } from "../src/modules/requirements/types";

export const T0 = new Date("2026-01-05T09:00:00.000Z");

export function makeRequirement(overrides: Partial<Requirement> = {}): Requirement {
  return {
    id: "req-1",
    documentId: "doc-1",
    sourceChunkIndex: 0,
    rawText: "The contractor shall maintain 99.9% uptime availability.",
    cleanText: "The contractor shall maintain 99.9% uptime availability.",
    classification: "PERFORMANCE_REQUIREMENT",
    confidence: 1 / 6,
    sourceSection: "Section C",
    sourceSubsection: "1",
    sourcePage: 1,
    sourceParagraph: 1,
    crossReferences: [],
    status: "ai_extracted",
    validatedBy: null,
    validatedAt: null,
    validationNotes: null,
    history: Object.freeze([]),
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeDocument(overrides: Partial<DocumentRecord> = {}): DocumentRecord {
  return {
    id: "doc-1",
    originalFilename: "solicitation.txt",
    mimeType: "text/plain",
    fileSize: 120,
    fileSha256: "0".repeat(64),
    storagePath: null,
    status: "completed",
    errorMessage: null,
    uploadedBy: "user-1",
    uploadedAt: T0,
    processedAt: T0,
    ...overrides,
  };
}

/** Deterministic ids for assemble(). */
export function sequentialIds(prefix = "req") {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
