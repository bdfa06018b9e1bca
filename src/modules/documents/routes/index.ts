import { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../../../app";
import type { ExtractionStore } from "../../../db/store";
import { asyncHandler } from "../../../lib/asyncHandler";
import { NotFoundError } from "../../../lib/errors";
import { buildComplianceMatrix } from "../../requirements/lib/complianceMatrix";
import {
  complianceMatrixJson,
  requirementJson,
  statsJson,
} from "../../requirements/lib/serialize";
import { processingSeconds } from "../../requirements/lib/stats";
import { DOCUMENT_STATUSES, type DocumentRecord } from "../types";
import { chunkJson, documentJson } from "../lib/serialize";
import { uploadRouter } from "./upload";

const listQuerySchema = z.object({
  status: z.enum(DOCUMENT_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

async function requireDocument(
  store: ExtractionStore,
  id: string
): Promise<DocumentRecord> {
  const doc = await store.getDocument(id);
  if (!doc) throw new NotFoundError("Document", id);
  return doc;
}

export function documentsRouter(deps: AppDeps): Router {
  const { store } = deps;
  const router = Router();

  // Upload routes: POST /documents/upload
  router.use("/upload", uploadRouter(deps));

  // GET /documents -> newest first
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const query = listQuerySchema.parse(req.query);
      const items = await store.listDocuments(query);
      res.json({
        ok: true,
        items: items.map(documentJson),
        limit: query.limit,
        offset: query.offset,
      });
    })
  );

  // GET /documents/:id -> document + its requirements in reading order
  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const doc = await requireDocument(store, req.params.id);
      const { items } = await store.listRequirements({
        documentId: doc.id,
        orderBy: "position",
      });
      res.json({
        ok: true,
        document: documentJson(doc),
        requirements: items.map(requirementJson),
      });
    })
  );

  router.get(
    "/:id/chunks",
    asyncHandler(async (req, res) => {
      const doc = await requireDocument(store, req.params.id);
      const chunks = await store.listChunks(doc.id);
      res.json({
        ok: true,
        document_id: doc.id,
        items: chunks.map(chunkJson),
      });
    })
  );

  router.get(
    "/:id/stats",
    asyncHandler(async (req, res) => {
      const doc = await requireDocument(store, req.params.id);
      const [chunkCount, stats] = await Promise.all([
        store.countChunks(doc.id),
        store.requirementStats(doc.id),
      ]);
      res.json({
        ok: true,
        document_id: doc.id,
        status: doc.status,
        total_chunks: chunkCount,
        ...statsJson(stats),
        processing_time_seconds: processingSeconds(
          doc.uploadedAt,
          doc.processedAt
        ),
      });
    })
  );

  router.get(
    "/:id/compliance-matrix",
    asyncHandler(async (req, res) => {
      const doc = await requireDocument(store, req.params.id);
      const { items } = await store.listRequirements({
        documentId: doc.id,
        orderBy: "position",
      });
      res.json({
        ok: true,
        ...complianceMatrixJson(buildComplianceMatrix(doc, items)),
      });
    })
  );

  return router;
}
