// src/db/pgStore.ts
// PostgreSQL-backed store. Raw parameterized SQL over a pg Pool.

import type { QueryResult } from "pg";
import {
  DOCUMENT_STATUSES,
  type Chunk,
  type DocumentRecord,
  type DocumentStatus,
  type StoredChunk,
} from "../modules/documents/types";
import { confidenceRange } from "../modules/requirements/lib/confidence";
import { emptyStats } from "../modules/requirements/lib/stats";
import type {
  ConfidenceTier,
  Requirement,
  RequirementDraft,
} from "../modules/requirements/types";
import {
  DuplicateDocumentError,
  NotFoundError,
  errorMessage,
} from "../lib/errors";
import { logger } from "../lib/logger";
import {
  DOCUMENT_COLUMNS,
  REQUIREMENT_COLUMNS,
  toChunk,
  toDocument,
  toRequirement,
} from "./rows";
import type {
  DocumentStatusPatch,
  ExtractionStore,
  ListDocumentsQuery,
  NewDocument,
  RequirementPage,
  RequirementQuery,
  RequirementStats,
} from "./store";

/** The part of pg's Pool (and its clients) the store relies on. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

export interface PgPool extends PgQueryable {
  connect(): Promise<PgQueryable & { release(): void }>;
  end(): Promise<void>;
}

const SHA256_INDEX = "idx_documents_file_sha256";

function isUniqueViolation(err: unknown, constraint: string): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "23505" &&
    "constraint" in err &&
    err.constraint === constraint
  );
}

// Ids are UUID columns; anything else cannot exist and would be a cast error
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const ORDER_COLUMNS = {
  created_at: "created_at",
  confidence: "ai_confidence_score",
} as const;

const POSITION = "source_page, source_paragraph, source_chunk_index";

function buildRequirementFilter(query: RequirementQuery) {
  const where: string[] = [];
  const params: unknown[] = [];
  let idx = 1;

  if (query.documentId) {
    where.push(`document_id = $${idx++}`);
    params.push(query.documentId);
  }

  if (query.documentIds && query.documentIds.length > 0) {
    where.push(`document_id = ANY($${idx++}::uuid[])`);
    params.push(query.documentIds);
  }

  if (query.statuses && query.statuses.length > 0) {
    where.push(`status = ANY($${idx++}::text[])`);
    params.push(query.statuses);
  }

  if (query.classifications && query.classifications.length > 0) {
    where.push(`classification = ANY($${idx++}::text[])`);
    params.push(query.classifications);
  }

  if (query.confidenceTier) {
    const range = confidenceRange(query.confidenceTier);
    where.push(`ai_confidence_score >= $${idx++}`);
    params.push(range.min);
    if (range.max !== null) {
      where.push(`ai_confidence_score < $${idx++}`);
      params.push(range.max);
    }
  }

  if (query.text) {
    where.push(`(raw_text ILIKE $${idx} OR clean_text ILIKE $${idx})`);
    params.push(`%${query.text.replace(/[\\%_]/g, "\\$&")}%`);
    idx++;
  }

  const whereClause = where.length ? `WHERE ` + where.join(" AND ") : "";
  return { whereClause, params, nextIdx: idx };
}

function orderClause(query: RequirementQuery): string {
  const dir = query.direction === "desc" ? "DESC" : "ASC";
  const orderBy = query.orderBy ?? "created_at";
  if (orderBy === "position") {
    return `source_page ${dir}, source_paragraph ${dir}, source_chunk_index ${dir}`;
  }
  return `${ORDER_COLUMNS[orderBy]} ${dir}, ${POSITION}`;
}

function isTier(value: unknown): value is ConfidenceTier {
  return value === "low" || value === "medium" || value === "high";
}

export class PgExtractionStore implements ExtractionStore {
  readonly kind = "postgres" as const;

  constructor(private readonly pool: PgPool) {}

  private async inTransaction<T>(
    fn: (client: PgQueryable) => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (e) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        logger.warn(
          { error: errorMessage(rollbackErr) },
          "ROLLBACK failed after transaction error"
        );
      }
      throw e;
    } finally {
      client.release();
    }
  }

  async createDocument(input: NewDocument): Promise<DocumentRecord> {
    try {
      return await this.insertDocument(input);
    } catch (e) {
      if (!isUniqueViolation(e, SHA256_INDEX)) throw e;
      const existing = await this.findDocumentBySha256(input.fileSha256);
      if (!existing) throw e;
      throw new DuplicateDocumentError(existing.id, input.fileSha256);
    }
  }

  private async insertDocument(input: NewDocument): Promise<DocumentRecord> {
    const { rows } = await this.pool.query(
      `
      INSERT INTO documents (
        id,
        original_filename,
        mime_type,
        file_size,
        file_sha256,
        storage_path,
        status,
        uploaded_by
      )
      VALUES ($1, $2, $3, $4, $5, $6, 'uploaded', $7)
      RETURNING ${DOCUMENT_COLUMNS}
      `,
      [
        input.id,
        input.originalFilename,
        input.mimeType,
        input.fileSize,
        input.fileSha256,
        input.storagePath,
        input.uploadedBy,
      ]
    );
    return toDocument(rows[0]);
  }

  async getDocument(id: string): Promise<DocumentRecord | null> {
    if (!UUID.test(id)) return null;
    const { rows } = await this.pool.query(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1 LIMIT 1`,
      [id]
    );
    return rows.length ? toDocument(rows[0]) : null;
  }

  async findDocumentBySha256(sha256: string): Promise<DocumentRecord | null> {
    const { rows } = await this.pool.query(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE file_sha256 = $1 LIMIT 1`,
      [sha256]
    );
    return rows.length ? toDocument(rows[0]) : null;
  }

  async listDocuments(query: ListDocumentsQuery): Promise<DocumentRecord[]> {
    const params: unknown[] = [];
    let whereClause = "";
    if (query.status) {
      params.push(query.status);
      whereClause = `WHERE status = $1`;
    }
    params.push(query.limit, query.offset);

    const { rows } = await this.pool.query(
      `
      SELECT ${DOCUMENT_COLUMNS}
      FROM documents
      ${whereClause}
      ORDER BY uploaded_at DESC
      LIMIT $${params.length - 1}
      OFFSET $${params.length}
      `,
      params
    );
    return rows.map(toDocument);
  }

  async documentCounts(): Promise<Record<DocumentStatus, number>> {
    const { rows } = await this.pool.query(
      `SELECT status, COUNT(*)::int AS n FROM documents GROUP BY status`
    );
    const counts = { uploaded: 0, processing: 0, completed: 0, failed: 0 };
    for (const row of rows) {
      const status = DOCUMENT_STATUSES.find((s) => s === row.status);
      const n: unknown = row.n;
      if (status && typeof n === "number") counts[status] += n;
    }
    return counts;
  }

  async updateDocumentStatus(
    id: string,
    patch: DocumentStatusPatch
  ): Promise<DocumentRecord> {
    if (!UUID.test(id)) throw new NotFoundError("Document", id);

    // undefined keeps the column, null clears it
    const { rows } = await this.pool.query(
      `
      UPDATE documents
      SET
        status = $2,
        processed_at = CASE WHEN $3::boolean THEN $4::timestamptz ELSE processed_at END,
        error_message = CASE WHEN $5::boolean THEN $6::text ELSE error_message END
      WHERE id = $1
      RETURNING ${DOCUMENT_COLUMNS}
      `,
      [
        id,
        patch.status,
        patch.processedAt !== undefined,
        patch.processedAt ?? null,
        patch.errorMessage !== undefined,
        patch.errorMessage ?? null,
      ]
    );

    if (rows.length === 0) throw new NotFoundError("Document", id);
    return toDocument(rows[0]);
  }

  async saveExtraction(
    documentId: string,
    chunks: readonly Chunk[],
    drafts: readonly RequirementDraft[]
  ): Promise<void> {
    await this.inTransaction(async (client) => {
      const doc = await client.query(
        `SELECT id FROM documents WHERE id = $1 FOR UPDATE`,
        [documentId]
      );
      if (doc.rowCount === 0) throw new NotFoundError("Document", documentId);

      if (chunks.length > 0) {
        await client.query(
          `
          INSERT INTO text_chunks (
            document_id,
            chunk_index,
            text,
            section_identifier,
            subsection_identifier,
            source_page,
            source_paragraph,
            source_line
          )
          SELECT $1::uuid, *
          FROM unnest(
            $2::int[], $3::text[], $4::text[], $5::text[],
            $6::int[], $7::int[], $8::int[]
          )
          `,
          [
            documentId,
            chunks.map((c) => c.index),
            chunks.map((c) => c.text),
            chunks.map((c) => c.section),
            chunks.map((c) => c.subsection),
            chunks.map((c) => c.page),
            chunks.map((c) => c.paragraph),
            chunks.map((c) => c.lineNumber),
          ]
        );
      }

      if (drafts.length > 0) {
        await client.query(
          `
          INSERT INTO requirements (
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
            status
          )
          SELECT
            d.id, $1::uuid, d.chunk_index, d.raw_text, d.clean_text, d.classification,
            d.confidence, d.section, d.subsection, d.page, d.paragraph,
            d.refs, d.status
          FROM jsonb_to_recordset($2::jsonb) AS d(
            id uuid,
            chunk_index int,
            raw_text text,
            clean_text text,
            classification text,
            confidence double precision,
            section text,
            subsection text,
            page int,
            paragraph int,
            refs jsonb,
            status text
          )
          `,
          [
            documentId,
            JSON.stringify(
              drafts.map((d) => ({
                id: d.id,
                chunk_index: d.sourceChunkIndex,
                raw_text: d.rawText,
                clean_text: d.cleanText,
                classification: d.classification,
                confidence: d.confidence,
                section: d.sourceSection,
                subsection: d.sourceSubsection,
                page: d.sourcePage,
                paragraph: d.sourceParagraph,
                refs: d.crossReferences,
                status: d.status,
              }))
            ),
          ]
        );
      }
    });
  }

  async listChunks(documentId: string): Promise<StoredChunk[]> {
    const { rows } = await this.pool.query(
      `
      SELECT
        document_id,
        chunk_index,
        text,
        section_identifier,
        subsection_identifier,
        source_page,
        source_paragraph,
        source_line
      FROM text_chunks
      WHERE document_id = $1
      ORDER BY chunk_index ASC
      `,
      [documentId]
    );
    return rows.map(toChunk);
  }

  async countChunks(documentId?: string): Promise<number> {
    const { rows } = documentId
      ? await this.pool.query(
          `SELECT COUNT(*)::int AS total FROM text_chunks WHERE document_id = $1`,
          [documentId]
        )
      : await this.pool.query(
          `SELECT COUNT(*)::int AS total FROM text_chunks`
        );
    const total: unknown = rows[0]?.total;
    return typeof total === "number" ? total : 0;
  }

  async getRequirement(id: string): Promise<Requirement | null> {
    if (!UUID.test(id)) return null;
    const { rows } = await this.pool.query(
      `SELECT ${REQUIREMENT_COLUMNS} FROM requirements WHERE id = $1 LIMIT 1`,
      [id]
    );
    return rows.length ? toRequirement(rows[0]) : null;
  }

  async listRequirements(query: RequirementQuery): Promise<RequirementPage> {
    const { whereClause, params, nextIdx } = buildRequirementFilter(query);

    let paging = "";
    const pageParams: unknown[] = [];
    let idx = nextIdx;
    if (query.limit !== undefined) {
      paging += ` LIMIT $${idx++}`;
      pageParams.push(query.limit);
    }
    if (query.offset) {
      paging += ` OFFSET $${idx++}`;
      pageParams.push(query.offset);
    }

    const itemsRes = await this.pool.query(
      `
      SELECT ${REQUIREMENT_COLUMNS}
      FROM requirements
      ${whereClause}
      ORDER BY ${orderClause(query)}
      ${paging}
      `,
      [...params, ...pageParams]
    );
    const totalRes = await this.pool.query(
      `SELECT COUNT(*)::int AS total FROM requirements ${whereClause}`,
      params
    );

    const total: unknown = totalRes.rows[0]?.total;
    return {
      items: itemsRes.rows.map(toRequirement),
      total: typeof total === "number" ? total : itemsRes.rows.length,
    };
  }

  async updateRequirement(
    id: string,
    mutate: (current: Requirement) => Requirement
  ): Promise<Requirement> {
    if (!UUID.test(id)) throw new NotFoundError("Requirement", id);

    return this.inTransaction(async (client) => {
      // Row lock serializes concurrent transitions on the same requirement
      const { rows } = await client.query(
        `SELECT ${REQUIREMENT_COLUMNS} FROM requirements WHERE id = $1 FOR UPDATE`,
        [id]
      );
      if (rows.length === 0) throw new NotFoundError("Requirement", id);

      const next = mutate(toRequirement(rows[0]));

      const updated = await client.query(
        `
        UPDATE requirements
        SET
          clean_text = $2,
          classification = $3,
          status = $4,
          validation_notes = $5,
          validated_by = $6,
          validated_at = $7,
          history = $8::jsonb,
          updated_at = $9
        WHERE id = $1
        RETURNING ${REQUIREMENT_COLUMNS}
        `,
        [
          id,
          next.cleanText,
          next.classification,
          next.status,
          next.validationNotes,
          next.validatedBy,
          next.validatedAt,
          JSON.stringify(next.history),
          next.updatedAt,
        ]
      );
      return toRequirement(updated.rows[0]);
    });
  }

  async requirementStats(documentId?: string): Promise<RequirementStats> {
    const params = documentId ? [documentId] : [];
    const whereClause = documentId ? `WHERE document_id = $1` : "";
    const low = confidenceRange("low");
    const high = confidenceRange("high");

    const { rows } = await this.pool.query(
      `
      SELECT
        COALESCE(classification, 'UNCLASSIFIED') AS classification,
        status,
        CASE
          WHEN ai_confidence_score >= ${high.min} THEN 'high'
          WHEN ai_confidence_score < ${low.max ?? high.min} THEN 'low'
          ELSE 'medium'
        END AS tier,
        COUNT(*)::int AS n
      FROM requirements
      ${whereClause}
      GROUP BY 1, 2, 3
      `,
      params
    );

    const stats = emptyStats();
    for (const row of rows) {
      const n: unknown = row.n;
      const cls: unknown = row.classification;
      const status: unknown = row.status;
      const tier: unknown = row.tier;
      if (typeof n !== "number" || typeof cls !== "string") continue;
      if (typeof status !== "string" || !isTier(tier)) continue;

      stats.total += n;
      stats.byClassification[cls] = (stats.byClassification[cls] ?? 0) + n;
      stats.byStatus[status] = (stats.byStatus[status] ?? 0) + n;
      stats.byConfidenceTier[tier] += n;
    }
    return stats;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (e) {
      logger.error({ error: errorMessage(e) }, "Database health check failed");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
