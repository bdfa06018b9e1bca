// src/db/rows.ts
// zod schemas for rows coming back from PostgreSQL, mapped to domain types.

import { z } from "zod";
import {
  DOCUMENT_STATUSES,
  type DocumentRecord,
  type StoredChunk,
} from "../modules/documents/types";
import {
  REQUIREMENT_CLASSIFICATIONS,
  VALIDATION_ACTIONS,
  VALIDATION_STATUSES,
  type HistoryEntry,
  type Requirement,
} from "../modules/requirements/types";

const classificationSchema = z.enum(REQUIREMENT_CLASSIFICATIONS).nullable();
const statusSchema = z.enum(VALIDATION_STATUSES);

export const historyEntrySchema = z.object({
  timestamp: z.string(),
  action: z.enum(VALIDATION_ACTIONS),
  actor: z.string(),
  previousStatus: statusSchema,
  previousCleanText: z.string(),
  previousClassification: classificationSchema,
  notes: z.string().nullable(),
});

export const documentRowSchema = z.object({
  id: z.string(),
  original_filename: z.string(),
  mime_type: z.string(),
  file_size: z.number().int(),
  file_sha256: z.string(),
  storage_path: z.string().nullable(),
  status: z.enum(DOCUMENT_STATUSES),
  error_message: z.string().nullable(),
  uploaded_by: z.string(),
  uploaded_at: z.date(),
  processed_at: z.date().nullable(),
});

export const chunkRowSchema = z.object({
  document_id: z.string(),
  chunk_index: z.number().int(),
  text: z.string(),
  section_identifier: z.string(),
  subsection_identifier: z.string(),
  source_page: z.number().int(),
  source_paragraph: z.number().int(),
  source_line: z.number().int(),
});

export const requirementRowSchema = z.object({
  id: z.string(),
  document_id: z.string(),
  source_chunk_index: z.number().int(),
  raw_text: z.string(),
  clean_text: z.string(),
  classification: classificationSchema,
  ai_confidence_score: z.number().min(0).max(1),
  source_section: z.string(),
  source_subsection: z.string(),
  source_page: z.number().int(),
  source_paragraph: z.number().int(),
  cross_references: z.array(z.string()),
  status: statusSchema,
  validation_notes: z.string().nullable(),
  validated_by: z.string().nullable(),
  validated_at: z.date().nullable(),
  history: z.array(historyEntrySchema),
  created_at: z.date(),
  updated_at: z.date(),
});

export function toDocument(row: unknown): DocumentRecord {
  const r = documentRowSchema.parse(row);
  return {
    id: r.id,
    originalFilename: r.original_filename,
    mimeType: r.mime_type,
    fileSize: r.file_size,
    fileSha256: r.file_sha256,
    storagePath: r.storage_path,
    status: r.status,
    errorMessage: r.error_message,
    uploadedBy: r.uploaded_by,
    uploadedAt: r.uploaded_at,
    processedAt: r.processed_at,
  };
}

export function toChunk(row: unknown): StoredChunk {
  const r = chunkRowSchema.parse(row);
  return {
    documentId: r.document_id,
    index: r.chunk_index,
    text: r.text,
    section: r.section_identifier,
    subsection: r.subsection_identifier,
    page: r.source_page,
    paragraph: r.source_paragraph,
    lineNumber: r.source_line,
  };
}

export function toRequirement(row: unknown): Requirement {
  const r = requirementRowSchema.parse(row);
  const history: HistoryEntry[] = r.history.map((h) => Object.freeze(h));
  return {
    id: r.id,
    documentId: r.document_id,
    sourceChunkIndex: r.source_chunk_index,
    rawText: r.raw_text,
    cleanText: r.clean_text,
    classification: r.classification,
    confidence: r.ai_confidence_score,
    sourceSection: r.source_section,
    sourceSubsection: r.source_subsection,
    sourcePage: r.source_page,
    sourceParagraph: r.source_paragraph,
    crossReferences: r.cross_references,
    status: r.status,
    validationNotes: r.validation_notes,
    validatedBy: r.validated_by,
    validatedAt: r.validated_at,
    history: Object.freeze(history),
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export const REQUIREMENT_COLUMNS = `
  id,
  document_id,
  source_chunk_index,
  raw_text,
  clean_text,
  classification,
  ai_confidence_score,
  source_section,
  source_subsection,
  source_page,
  source_paragraph,
  cross_references,
  status,
  validation_notes,
  validated_by,
  validated_at,
  history,
  created_at,
  updated_at
`;

export const DOCUMENT_COLUMNS = `
  id,
  original_filename,
  mime_type,
  file_size,
  file_sha256,
  storage_path,
  status,
  error_message,
  uploaded_by,
  uploaded_at,
  processed_at
`;
