// src/db/memoryStore.ts
// In-process store for local runs without PostgreSQL and for tests.
// Mutating methods never await between reading and writing a record, so
// each call is atomic on the single JS thread.

import type {
  Chunk,
  DocumentRecord,
  DocumentStatus,
  StoredChunk,
} from "../modules/documents/types";
import {
  confidenceRange,
  inConfidenceRange,
} from "../modules/requirements/lib/confidence";
import { compareByPosition } from "../modules/requirements/lib/ordering";
import { summarizeRequirements } from "../modules/requirements/lib/stats";
import type {
  Requirement,
  RequirementDraft,
} from "../modules/requirements/types";
import { DuplicateDocumentError, NotFoundError } from "../lib/errors";
import type {
  DocumentStatusPatch,
  ExtractionStore,
  ListDocumentsQuery,
  NewDocument,
  RequirementPage,
  RequirementQuery,
  RequirementStats,
} from "./store";

export class MemoryExtractionStore implements ExtractionStore {
  readonly kind = "memory" as const;

  private readonly documents = new Map<string, DocumentRecord>();
  private readonly chunks = new Map<string, StoredChunk[]>();
  private readonly requirements = new Map<string, Requirement>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async createDocument(input: NewDocument): Promise<DocumentRecord> {
    for (const existing of this.documents.values()) {
      if (existing.fileSha256 === input.fileSha256) {
        throw new DuplicateDocumentError(existing.id, input.fileSha256);
      }
    }

    const doc: DocumentRecord = {
      ...input,
      status: "uploaded",
      errorMessage: null,
      uploadedAt: this.clock(),
      processedAt: null,
    };
    this.documents.set(doc.id, doc);
    return { ...doc };
  }

  async getDocument(id: string): Promise<DocumentRecord | null> {
    const doc = this.documents.get(id);
    return doc ? { ...doc } : null;
  }

  async findDocumentBySha256(sha256: string): Promise<DocumentRecord | null> {
    for (const doc of this.documents.values()) {
      if (doc.fileSha256 === sha256) return { ...doc };
    }
    return null;
  }

  async listDocuments(query: ListDocumentsQuery): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter((d) => !query.status || d.status === query.status)
      .sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime())
      .slice(query.offset, query.offset + query.limit)
      .map((d) => ({ ...d }));
  }

  async documentCounts(): Promise<Record<DocumentStatus, number>> {
    const counts = { uploaded: 0, processing: 0, completed: 0, failed: 0 };
    for (const doc of this.documents.values()) counts[doc.status] += 1;
    return counts;
  }

  async updateDocumentStatus(
    id: string,
    patch: DocumentStatusPatch
  ): Promise<DocumentRecord> {
    const current = this.documents.get(id);
    if (!current) throw new NotFoundError("Document", id);

    const next: DocumentRecord = {
      ...current,
      status: patch.status,
      processedAt:
        patch.processedAt === undefined ? current.processedAt : patch.processedAt,
      errorMessage:
        patch.errorMessage === undefined
          ? current.errorMessage
          : patch.errorMessage,
    };
    this.documents.set(id, next);
    return { ...next };
  }

  async saveExtraction(
    documentId: string,
    chunks: readonly Chunk[],
    drafts: readonly RequirementDraft[]
  ): Promise<void> {
    if (!this.documents.has(documentId)) {
      throw new NotFoundError("Document", documentId);
    }

    const now = this.clock();
    this.chunks.set(
      documentId,
      chunks.map((c) => ({ ...c, documentId }))
    );
    for (const d of drafts) {
      this.requirements.set(d.id, {
        ...d,
        crossReferences: [...d.crossReferences],
        validatedBy: null,
        validatedAt: null,
        validationNotes: null,
        history: Object.freeze([]),
        createdAt: now,
        updatedAt: now,
      });
    }
  }

  async listChunks(documentId: string): Promise<StoredChunk[]> {
    return (this.chunks.get(documentId) ?? []).map((c) => ({ ...c }));
  }

  async countChunks(documentId?: string): Promise<number> {
    if (documentId) return this.chunks.get(documentId)?.length ?? 0;
    let total = 0;
    for (const list of this.chunks.values()) total += list.length;
    return total;
  }

  async getRequirement(id: string): Promise<Requirement | null> {
    const r = this.requirements.get(id);
    return r ? { ...r } : null;
  }

  async listRequirements(query: RequirementQuery): Promise<RequirementPage> {
    const range = query.confidenceTier
      ? confidenceRange(query.confidenceTier)
      : null;
    const needle = query.text?.toLowerCase();
    const anyOf = <T>(values: readonly T[] | undefined, value: T | null) =>
      !values ||
      values.length === 0 ||
      (value !== null && values.includes(value));

    const matching = [...this.requirements.values()].filter((r) => {
      if (query.documentId && r.documentId !== query.documentId) return false;
      if (!anyOf(query.documentIds, r.documentId)) return false;
      if (!anyOf(query.statuses, r.status)) return false;
      if (!anyOf(query.classifications, r.classification)) return false;
      if (range && !inConfidenceRange(r.confidence, range)) return false;
      if (
        needle &&
        !r.rawText.toLowerCase().includes(needle) &&
        !r.cleanText.toLowerCase().includes(needle)
      ) {
        return false;
      }
      return true;
    });

    const sign = query.direction === "desc" ? -1 : 1;
    const orderBy = query.orderBy ?? "created_at";
    matching.sort((a, b) => {
      if (orderBy === "position") return sign * compareByPosition(a, b);
      const primary =
        orderBy === "confidence"
          ? a.confidence - b.confidence
          : a.createdAt.getTime() - b.createdAt.getTime();
      return sign * primary || compareByPosition(a, b);
    });

    const offset = query.offset ?? 0;
    const end = query.limit === undefined ? undefined : offset + query.limit;

    return {
      items: matching.slice(offset, end).map((r) => ({ ...r })),
      total: matching.length,
    };
  }

  async updateRequirement(
    id: string,
    mutate: (current: Requirement) => Requirement
  ): Promise<Requirement> {
    const current = this.requirements.get(id);
    if (!current) throw new NotFoundError("Requirement", id);

    const next = mutate({ ...current });
    this.requirements.set(id, next);
    return { ...next };
  }

  async requirementStats(documentId?: string): Promise<RequirementStats> {
    const all = [...this.requirements.values()].filter(
      (r) => !documentId || r.documentId === documentId
    );
    return summarizeRequirements(all);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
