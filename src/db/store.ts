// src/db/store.ts
// Persistence boundary for documents, chunks and requirements.

import type {
  Chunk,
  DocumentRecord,
  DocumentStatus,
  StoredChunk,
} from "../modules/documents/types";
import type {
  ConfidenceTier,
  Requirement,
  RequirementClassification,
  RequirementDraft,
  ValidationStatus,
} from "../modules/requirements/types";

export type NewDocument = {
  id: string;
  originalFilename: string;
  mimeType: string;
  fileSize: number;
  fileSha256: string;
  storagePath: string | null;
  uploadedBy: string;
};

export type DocumentStatusPatch = {
  status: DocumentStatus;
  processedAt?: Date | null;
  errorMessage?: string | null;
};

export type ListDocumentsQuery = {
  status?: DocumentStatus;
  limit: number;
  offset: number;
};

export type RequirementOrder = "created_at" | "confidence" | "position";

export type RequirementQuery = {
  documentId?: string;
  documentIds?: string[];
  statuses?: ValidationStatus[];
  classifications?: RequirementClassification[];
  confidenceTier?: ConfidenceTier;
  text?: string;
  orderBy?: RequirementOrder;
  direction?: "asc" | "desc";
  limit?: number;
  offset?: number;
};

export type RequirementPage = {
  items: Requirement[];
  total: number;
};

export type RequirementStats = {
  total: number;
  byClassification: Record<string, number>;
  byStatus: Record<string, number>;
  byConfidenceTier: Record<ConfidenceTier, number>;
};

export interface ExtractionStore {
  readonly kind: "postgres" | "memory";

  /** Throws DuplicateDocumentError when the sha256 is already stored. */
  createDocument(input: NewDocument): Promise<DocumentRecord>;
  getDocument(id: string): Promise<DocumentRecord | null>;
  findDocumentBySha256(sha256: string): Promise<DocumentRecord | null>;
  listDocuments(query: ListDocumentsQuery): Promise<DocumentRecord[]>;
  documentCounts(): Promise<Record<DocumentStatus, number>>;
  /** Throws NotFoundError for an unknown id. */
  updateDocumentStatus(
    id: string,
    patch: DocumentStatusPatch
  ): Promise<DocumentRecord>;

  /** Bulk insert of one document's chunks and requirement drafts. */
  saveExtraction(
    documentId: string,
    chunks: readonly Chunk[],
    drafts: readonly RequirementDraft[]
  ): Promise<void>;
  listChunks(documentId: string): Promise<StoredChunk[]>;
  countChunks(documentId?: string): Promise<number>;

  getRequirement(id: string): Promise<Requirement | null>;
  listRequirements(query: RequirementQuery): Promise<RequirementPage>;
  /**
   * Atomic read-modify-write of one requirement. Concurrent calls on the
   * same id are serialized; if `mutate` throws nothing is written.
   * Throws NotFoundError for an unknown id.
   */
  updateRequirement(
    id: string,
    mutate: (current: Requirement) => Requirement
  ): Promise<Requirement>;
  requirementStats(documentId?: string): Promise<RequirementStats>;

  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
