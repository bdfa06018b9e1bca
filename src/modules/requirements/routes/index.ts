import { Router } from "express";
import { z } from "zod";
import type { AppDeps } from "../../../app";
import { actorFrom, asyncHandler } from "../../../lib/asyncHandler";
import { NotFoundError } from "../../../lib/errors";
import { CONFIDENCE_TIERS } from "../lib/confidence";
import { requirementJson } from "../lib/serialize";
import { validateRequirement } from "../lib/validation";
import { REQUIREMENT_CLASSIFICATIONS } from "../types";

const reviewQueueQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
  confidence: z.enum(CONFIDENCE_TIERS).optional(),
  classification: z.enum(REQUIREMENT_CLASSIFICATIONS).optional(),
  orderBy: z.enum(["created_at", "confidence"]).default("confidence"),
  direction: z.enum(["asc", "desc"]).default("asc"),
});

// action stays a free string so unknown actions surface as INVALID_ACTION
const validateBodySchema = z.object({
  action: z.string(),
  clean_text: z.string().nullish(),
  // "" means "keep the current classification"
  classification: z
    .enum(REQUIREMENT_CLASSIFICATIONS)
    .or(z.literal("").transform(() => null))
    .nullish(),
  validation_notes: z.string().nullish(),
});

export function requirementsRouter({ store }: AppDeps): Router {
  const router = Router();

  // GET /requirements/review-queue -> unreviewed, least certain first
  router.get(
    "/review-queue",
    asyncHandler(async (req, res) => {
      const q = reviewQueueQuerySchema.parse(req.query);
      const page = await store.listRequirements({
        statuses: ["ai_extracted"],
        confidenceTier: q.confidence,
        classifications: q.classification ? [q.classification] : undefined,
        orderBy: q.orderBy,
        direction: q.direction,
        limit: q.limit,
        offset: q.offset,
      });

      res.json({
        ok: true,
        items: page.items.map(requirementJson),
        total_count: page.total,
        limit: q.limit,
        offset: q.offset,
        has_more: q.offset + page.items.length < page.total,
      });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const requirement = await store.getRequirement(req.params.id);
      if (!requirement) throw new NotFoundError("Requirement", req.params.id);
      res.json({ ok: true, requirement: requirementJson(requirement) });
    })
  );

  // PUT /requirements/:id -> approve | correct | flag
  router.put(
    "/:id",
    asyncHandler(async (req, res) => {
      const actor = actorFrom(req);
      if (!actor) {
        return res.status(400).json({
          ok: false,
          error: "Missing x-user-id header",
          code: "INVALID_REQUEST",
        });
      }

      const body = validateBodySchema.parse(req.body);
      const updated = await validateRequirement(store, req.params.id, {
        action: body.action,
        actor,
        cleanText: body.clean_text,
        classification: body.classification,
        notes: body.validation_notes,
      });

      return res.json({ ok: true, requirement: requirementJson(updated) });
    })
  );

  return router;
}
