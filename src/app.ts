import express from "express";
import cors from "cors";
import type { AppConfig } from "./config/env";
import type { ExtractionStore } from "./db/store";
import { asyncHandler } from "./lib/asyncHandler";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { documentsRouter } from "./modules/documents/routes";
import { requirementsRouter } from "./modules/requirements/routes";
import { statsJson } from "./modules/requirements/lib/serialize";
import { searchRequirementsRouter } from "./routes/search/requirements";

export type AppDeps = {
  store: ExtractionStore;
  config: AppConfig;
};

export function createApp(deps: AppDeps) {
  const { store } = deps;

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use("/documents", documentsRouter(deps));
  app.use("/requirements", requirementsRouter(deps));
  app.use("/search", searchRequirementsRouter(deps));

  // Health
  app.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const healthy = await store.healthCheck();
      res.status(healthy ? 200 : 503).json({ ok: healthy, store: store.kind });
    })
  );

  // System-wide statistics
  app.get(
    "/stats",
    asyncHandler(async (_req, res) => {
      const [documents, chunks, stats] = await Promise.all([
        store.documentCounts(),
        store.countChunks(),
        store.requirementStats(),
      ]);
      const totalDocuments = Object.values(documents).reduce(
        (sum, n) => sum + n,
        0
      );

      res.json({
        ok: true,
        total_documents: totalDocuments,
        documents_by_status: documents,
        total_chunks: chunks,
        ...statsJson(stats),
      });
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
