import { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../../app";
import { asyncHandler } from "../../lib/asyncHandler";
import { requirementJson } from "../../modules/requirements/lib/serialize";
import {
  REQUIREMENT_CLASSIFICATIONS,
  VALIDATION_STATUSES,
} from "../../modules/requirements/types";

const searchBodySchema = z.object({
  query: z.string().trim().min(1),
  document_ids: z.array(z.string().uuid()).optional(),
  classifications: z.array(z.enum(REQUIREMENT_CLASSIFICATIONS)).optional(),
  statuses: z.array(z.enum(VALIDATION_STATUSES)).optional(),
  limit: z.number().int().min(1).max(100).default(20),
  offset: z.number().int().min(0).default(0),
});

export function searchRequirementsRouter({ store }: AppDeps): Router {
  const router = Router();

  // POST /search/requirements -> case-insensitive text match
  router.post(
    "/requirements",
    asyncHandler(async (req, res) => {
      const body = searchBodySchema.parse(req.body);
      const page = await store.listRequirements({
        text: body.query,
        documentIds: body.document_ids,
        classifications: body.classifications,
        statuses: body.statuses,
        orderBy: "confidence",
        direction: "desc",
        limit: body.limit,
        offset: body.offset,
      });

      res.json({
        ok: true,
        query: body.query,
        results: page.items.map(requirementJson),
        total_count: page.total,
      });
    })
  );

  return router;
}
