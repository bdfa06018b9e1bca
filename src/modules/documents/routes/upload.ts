import { Router } from "express";
import multer from "multer";
import type { AppDeps } from "../../../app";
import { actorFrom, asyncHandler } from "../../../lib/asyncHandler";
import { ingestDocument } from "../lib/ingestDocument";
import { documentJson } from "../lib/serialize";

export function uploadRouter({ store, config }: AppDeps): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: config.maxUploadBytes,
    },
  });

  // POST /documents/upload
  router.post(
    "/",
    upload.single("file"),
    asyncHandler(async (req, res) => {
      if (!req.file) {
        return res.status(400).json({
          ok: false,
          error: "Missing file (field name must be 'file')",
          code: "INVALID_REQUEST",
        });
      }

      const uploadedBy = actorFrom(req);
      if (!uploadedBy) {
        return res.status(400).json({
          ok: false,
          error: "Missing x-user-id header",
          code: "INVALID_REQUEST",
        });
      }

      const result = await ingestDocument(
        store,
        {
          originalFilename: req.file.originalname,
          mimeType: req.file.mimetype,
          bytes: req.file.buffer,
          uploadedBy,
        },
        { storageDir: config.storageDir }
      );

      return res.status(201).json({
        ok: true,
        document: documentJson(result.document),
        chunk_count: result.chunkCount,
        requirements_extracted: result.requirementCount,
      });
    })
  );

  return router;
}
