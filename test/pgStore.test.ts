import type { QueryResult } from "pg";
import { describe, expect, it } from "vitest";
import { PgExtractionStore, type PgPool } from "../src/db/pgStore";
import { DuplicateDocumentError, NotFoundError } from "../src/lib/errors";
import type { Chunk } from "../src/modules/documents/types";
import { validateRequirement } from "../src/modules/requirements/lib/validation";
import type { RequirementDraft } from "../src/modules/requirements/types";
import { T0 } from "./helpers";

const DOC_ID = "3f2b8c1e-0d4a-4e6b-9a7c-1b2d3e4f5a6b";
const REQ_ID = "9c1d2e3f-4a5b-4c6d-8e7f-0a1b2c3d4e5f";
const REVIEWED_AT = new Date("2026-02-01T10:00:00.000Z");

type Row = Record<string, unknown>;
type LoggedQuery = { text: string; values: unknown[] };
type Responder = (text: string, values: unknown[]) => Row[];

function result(rows: Row[]): QueryResult {
  return { command: "", rowCount: rows.length, oid: 0, fields: [], rows };
}

/** Records every statement; pool and clients share one log. */
class FakePool implements PgPool {
  readonly log: LoggedQuery[] = [];
  released = 0;

  constructor(private readonly respond: Responder = () => []) {}

  async query(text: string, values: unknown[] = []): Promise<QueryResult> {
    this.log.push({ text: text.replace(/\s+/g, " ").trim(), values });
    return result(this.respond(text, values));
  }

  async connect() {
    return {
      query: (text: string, values?: unknown[]) => this.query(text, values),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {}

  statements(): string[] {
    return this.log.map((q) => q.text);
  }
}

function requirementRow(overrides: Row = {}): Row {
  return {
    id: REQ_ID,
    document_id: DOC_ID,
    source_chunk_index: 0,
    raw_text: "The contractor shall maintain 99.9% uptime availability.",
    clean_text: "The contractor shall maintain 99.9% uptime availability.",
    classification: "PERFORMANCE_REQUIREMENT",
    ai_confidence_score: 1 / 6,
    source_section: "Section C",
    source_subsection: "1",
    source_page: 1,
    source_paragraph: 1,
    cross_references: [],
    status: "ai_extracted",
    validation_notes: null,
    validated_by: null,
    validated_at: null,
    history: [],
    created_at: T0,
    updated_at: T0,
    ...overrides,
  };
}

const CHUNKS: Chunk[] = [
  {
    index: 0,
    text: "The contractor shall maintain 99.9% uptime availability.",
    section: "Section C",
    subsection: "1",
    page: 1,
    paragraph: 1,
    lineNumber: 2,
  },
  {
    index: 1,
    text: "The contractor shall deliver monthly status reports per Attachment J-2.",
    section: "Section F",
    subsection: "2",
    page: 1,
    paragraph: 2,
    lineNumber: 5,
  },
];

const DRAFT: RequirementDraft = {
  id: REQ_ID,
  documentId: DOC_ID,
  sourceChunkIndex: 1,
  rawText: CHUNKS[1].text,
  cleanText: CHUNKS[1].text,
  classification: "DELIVERABLE_REQUIREMENT",
  confidence: 0.2,
  sourceSection: "Section F",
  sourceSubsection: "2",
  sourcePage: 1,
  sourceParagraph: 2,
  crossReferences: ["Attachment J-2"],
  status: "ai_extracted",
};

describe("PgExtractionStore", () => {
  describe("saveExtraction", () => {
    it("locks the document and bulk-inserts chunks and requirements", async () => {
      const pool = new FakePool((text) =>
        text.includes("FOR UPDATE") ? [{ id: DOC_ID }] : []
      );
      await new PgExtractionStore(pool).saveExtraction(DOC_ID, CHUNKS, [DRAFT]);

      const statements = pool.statements();
      expect(statements).toHaveLength(5);
      expect(statements[0]).toBe("BEGIN");
      expect(statements[1]).toBe(
        "SELECT id FROM documents WHERE id = $1 FOR UPDATE"
      );
      expect(statements[2]).toMatch(/^INSERT INTO text_chunks .* FROM unnest\(/);
      expect(statements[3]).toMatch(
        /^INSERT INTO requirements .* FROM jsonb_to_recordset\(\$2::jsonb\)/
      );
      expect(statements[4]).toBe("COMMIT");
      expect(pool.released).toBe(1);

      expect(pool.log[1].values).toEqual([DOC_ID]);
      expect(pool.log[2].values).toEqual([
        DOC_ID,
        [0, 1],
        [CHUNKS[0].text, CHUNKS[1].text],
        ["Section C", "Section F"],
        ["1", "2"],
        [1, 1],
        [1, 2],
        [2, 5],
      ]);

      const [docParam, records] = pool.log[3].values;
      expect(docParam).toBe(DOC_ID);
      expect(JSON.parse(String(records))).toEqual([
        {
          id: REQ_ID,
          chunk_index: 1,
          raw_text: CHUNKS[1].text,
          clean_text: CHUNKS[1].text,
          classification: "DELIVERABLE_REQUIREMENT",
          confidence: 0.2,
          section: "Section F",
          subsection: "2",
          page: 1,
          paragraph: 2,
          refs: ["Attachment J-2"],
          status: "ai_extracted",
        },
      ]);
    });

    it("skips the inserts when there is nothing to store", async () => {
      const pool = new FakePool(() => [{ id: DOC_ID }]);
      await new PgExtractionStore(pool).saveExtraction(DOC_ID, [], []);
      expect(pool.statements()).toEqual([
        "BEGIN",
        "SELECT id FROM documents WHERE id = $1 FOR UPDATE",
        "COMMIT",
      ]);
    });

    it("rolls back when the document is gone", async () => {
      const pool = new FakePool();
      await expect(
        new PgExtractionStore(pool).saveExtraction(DOC_ID, CHUNKS, [DRAFT])
      ).rejects.toThrow(NotFoundError);

      expect(pool.statements()).toEqual([
        "BEGIN",
        "SELECT id FROM documents WHERE id = $1 FOR UPDATE",
        "ROLLBACK",
      ]);
      expect(pool.released).toBe(1);
    });
  });

  describe("updateRequirement", () => {
    it("applies the change under a row lock", async () => {
      const pool = new FakePool((text, values) => {
        if (text.includes("FOR UPDATE")) return [requirementRow()];
        if (text.includes("UPDATE requirements")) {
          return [
            requirementRow({
              clean_text: values[1],
              classification: values[2],
              status: values[3],
              validation_notes: values[4],
              validated_by: values[5],
              validated_at: values[6],
              history: JSON.parse(String(values[7])),
              updated_at: values[8],
            }),
          ];
        }
        return [];
      });
      const store = new PgExtractionStore(pool);

      const updated = await validateRequirement(
        store,
        REQ_ID,
        { action: "approve", actor: "reviewer-1", notes: "looks right" },
        () => REVIEWED_AT
      );

      const statements = pool.statements();
      expect(statements[0]).toBe("BEGIN");
      expect(statements[1]).toMatch(
        /^SELECT .* FROM requirements WHERE id = \$1 FOR UPDATE$/
      );
      expect(statements[2]).toMatch(/^UPDATE requirements SET .* RETURNING /);
      expect(statements[3]).toBe("COMMIT");

      const history = [
        {
          timestamp: "2026-02-01T10:00:00.000Z",
          action: "approve",
          actor: "reviewer-1",
          previousStatus: "ai_extracted",
          previousCleanText:
            "The contractor shall maintain 99.9% uptime availability.",
          previousClassification: "PERFORMANCE_REQUIREMENT",
          notes: "looks right",
        },
      ];
      expect(pool.log[2].values).toEqual([
        REQ_ID,
        "The contractor shall maintain 99.9% uptime availability.",
        "PERFORMANCE_REQUIREMENT",
        "human_validated",
        "looks right",
        "reviewer-1",
        REVIEWED_AT,
        JSON.stringify(history),
        REVIEWED_AT,
      ]);

      expect(updated).toMatchObject({
        id: REQ_ID,
        status: "human_validated",
        validatedBy: "reviewer-1",
        validatedAt: REVIEWED_AT,
        validationNotes: "looks right",
        history,
      });
    });

    it("rejects ids that are not UUIDs without querying", async () => {
      const pool = new FakePool();
      await expect(
        new PgExtractionStore(pool).updateRequirement("req-1", (r) => r)
      ).rejects.toThrow(NotFoundError);
      expect(pool.log).toEqual([]);
    });

    it("rolls back when the requirement is missing", async () => {
      const pool = new FakePool();
      await expect(
        new PgExtractionStore(pool).updateRequirement(REQ_ID, (r) => r)
      ).rejects.toThrow("Requirement 9c1d2e3f-4a5b-4c6d-8e7f-0a1b2c3d4e5f not found");
      expect(pool.statements().at(-1)).toBe("ROLLBACK");
    });
  });

  describe("requirementStats", () => {
    const rows: Row[] = [
      { classification: "PERFORMANCE_REQUIREMENT", status: "ai_extracted", tier: "low", n: 2 },
      { classification: "UNCLASSIFIED", status: "human_validated", tier: "high", n: 1 },
      { classification: "PERFORMANCE_REQUIREMENT", status: "human_validated", tier: "medium", n: 3 },
    ];

    it("buckets confidence with the tier bounds", async () => {
      const pool = new FakePool(() => rows);
      const stats = await new PgExtractionStore(pool).requirementStats(DOC_ID);

      const [{ text, values }] = pool.log;
      expect(text).toContain(
        "WHEN ai_confidence_score >= 0.6666666666666666 THEN 'high'"
      );
      expect(text).toContain(
        "WHEN ai_confidence_score < 0.3333333333333333 THEN 'low'"
      );
      expect(text).toContain("WHERE document_id = $1");
      expect(values).toEqual([DOC_ID]);

      expect(stats).toEqual({
        total: 6,
        byClassification: { PERFORMANCE_REQUIREMENT: 5, UNCLASSIFIED: 1 },
        byStatus: { ai_extracted: 2, human_validated: 4 },
        byConfidenceTier: { low: 2, medium: 3, high: 1 },
      });
    });

    it("covers every document without a filter", async () => {
      const pool = new FakePool(() => []);
      const stats = await new PgExtractionStore(pool).requirementStats();

      expect(pool.log[0].text).not.toContain("WHERE");
      expect(pool.log[0].values).toEqual([]);
      expect(stats.total).toBe(0);
    });
  });

  describe("createDocument", () => {
    const input = {
      id: DOC_ID,
      originalFilename: "rfp.txt",
      mimeType: "text/plain",
      fileSize: 10,
      fileSha256: "a".repeat(64),
      storagePath: null,
      uploadedBy: "user-1",
    };

    it("turns a hash collision into DuplicateDocumentError", async () => {
      const existingId = "0b1c2d3e-4f5a-4b6c-8d7e-9f0a1b2c3d4e";
      const pool = new FakePool((text) => {
        if (text.includes("INSERT INTO documents")) {
          throw Object.assign(new Error("duplicate key value"), {
            code: "23505",
            constraint: "idx_documents_file_sha256",
          });
        }
        return [
          {
            id: existingId,
            original_filename: "first.txt",
            mime_type: "text/plain",
            file_size: 10,
            file_sha256: "a".repeat(64),
            storage_path: null,
            status: "completed",
            error_message: null,
            uploaded_by: "user-2",
            uploaded_at: T0,
            processed_at: T0,
          },
        ];
      });

      const err = await new PgExtractionStore(pool)
        .createDocument(input)
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(DuplicateDocumentError);
      if (!(err instanceof DuplicateDocumentError)) return;
      expect(err.existingDocumentId).toBe(existingId);
      expect(pool.log[1].values).toEqual(["a".repeat(64)]);
    });

    it("passes other database errors through", async () => {
      const failure = Object.assign(new Error("connection reset"), {
        code: "08006",
      });
      const pool = new FakePool(() => {
        throw failure;
      });

      await expect(new PgExtractionStore(pool).createDocument(input)).rejects.toBe(
        failure
      );
    });
  });
});
