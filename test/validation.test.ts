import { describe, expect, it } from "vitest";
import { MemoryExtractionStore } from "../src/db/memoryStore";
import { InvalidActionError, NotFoundError } from "../src/lib/errors";
import { chunk } from "../src/modules/documents/lib/chunker";
import { assemble } from "../src/modules/requirements/lib/assembler";
import {
  applyValidation,
  validateRequirement,
} from "../src/modules/requirements/lib/validation";
import { makeRequirement, sequentialIds } from "./helpers";

const NOW = new Date("2026-02-01T12:00:00.000Z");
const LATER = new Date("2026-02-01T12:05:00.000Z");

describe("applyValidation", () => {
  it("approves with overrides and snapshots the prior state", () => {
    const req = makeRequirement();
    const next = applyValidation(
      req,
      {
        action: "approve",
        actor: "reviewer-1",
        cleanText: "Maintain 99.9% uptime.",
        classification: "COMPLIANCE_REQUIREMENT",
        notes: "tightened wording",
      },
      NOW
    );

    expect(next.status).toBe("human_validated");
    expect(next.cleanText).toBe("Maintain 99.9% uptime.");
    expect(next.classification).toBe("COMPLIANCE_REQUIREMENT");
    expect(next.validatedBy).toBe("reviewer-1");
    expect(next.validatedAt).toEqual(NOW);
    expect(next.updatedAt).toEqual(NOW);
    expect(next.validationNotes).toBe("tightened wording");
    expect(next.history).toEqual([
      {
        timestamp: "2026-02-01T12:00:00.000Z",
        action: "approve",
        actor: "reviewer-1",
        previousStatus: "ai_extracted",
        previousCleanText:
          "The contractor shall maintain 99.9% uptime availability.",
        previousClassification: "PERFORMANCE_REQUIREMENT",
        notes: "tightened wording",
      },
    ]);
  });

  it("leaves the input object untouched", () => {
    const req = makeRequirement();
    applyValidation(req, { action: "correct", actor: "r", cleanText: "x" }, NOW);
    expect(req.status).toBe("ai_extracted");
    expect(req.cleanText).toBe(
      "The contractor shall maintain 99.9% uptime availability."
    );
    expect(req.history).toHaveLength(0);
  });

  it("flag never overwrites text or classification", () => {
    const req = makeRequirement();
    const next = applyValidation(
      req,
      {
        action: "flag",
        actor: "reviewer-2",
        cleanText: "ignored",
        classification: "DELIVERABLE_REQUIREMENT",
        notes: "unclear scope",
      },
      NOW
    );

    expect(next.status).toBe("flagged_for_review");
    expect(next.cleanText).toBe(req.cleanText);
    expect(next.classification).toBe("PERFORMANCE_REQUIREMENT");
    expect(next.history).toHaveLength(1);
    expect(next.validatedAt).toEqual(NOW);
    expect(next.validationNotes).toBe("unclear scope");
  });

  it("treats empty overrides as absent", () => {
    const next = applyValidation(
      makeRequirement({ validationNotes: "earlier note" }),
      { action: "correct", actor: "r", cleanText: "", notes: "" },
      NOW
    );
    expect(next.cleanText).toBe(
      "The contractor shall maintain 99.9% uptime availability."
    );
    expect(next.validationNotes).toBe("earlier note");
    expect(next.history[0].notes).toBeNull();
  });

  it("rejects unknown actions without touching the requirement", () => {
    const req = makeRequirement();
    const before = JSON.stringify(req);

    expect(() =>
      applyValidation(req, { action: "reject", actor: "r" }, NOW)
    ).toThrow(InvalidActionError);
    expect(() =>
      applyValidation(req, { action: "reject", actor: "r" }, NOW)
    ).toThrow("Invalid action: reject");
    expect(JSON.stringify(req)).toBe(before);
  });

  it("snapshots each step of consecutive corrections", () => {
    const first = applyValidation(
      makeRequirement(),
      { action: "correct", actor: "a", cleanText: "First fix." },
      NOW
    );
    const second = applyValidation(
      first,
      { action: "correct", actor: "b", cleanText: "Second fix." },
      LATER
    );

    expect(second.cleanText).toBe("Second fix.");
    expect(second.history).toHaveLength(2);
    expect(second.history[0].previousStatus).toBe("ai_extracted");
    expect(second.history[0].previousCleanText).toBe(
      "The contractor shall maintain 99.9% uptime availability."
    );
    expect(second.history[1].previousStatus).toBe("human_corrected");
    expect(second.history[1].previousCleanText).toBe("First fix.");
    expect(second.history[1].actor).toBe("b");
  });

  it("freezes history", () => {
    const next = applyValidation(
      makeRequirement(),
      { action: "approve", actor: "r" },
      NOW
    );
    expect(Object.isFrozen(next.history)).toBe(true);
    expect(Object.isFrozen(next.history[0])).toBe(true);
  });

  it("allows acting again on a validated requirement", () => {
    const approved = applyValidation(
      makeRequirement(),
      { action: "approve", actor: "r" },
      NOW
    );
    const flagged = applyValidation(approved, { action: "flag", actor: "s" }, LATER);
    expect(flagged.status).toBe("flagged_for_review");
    expect(flagged.history[1].previousStatus).toBe("human_validated");
  });
});

describe("validateRequirement", () => {
  async function seededStore() {
    const store = new MemoryExtractionStore(() => NOW);
    await store.createDocument({
      id: "doc-1",
      originalFilename: "rfp.txt",
      mimeType: "text/plain",
      fileSize: 10,
      fileSha256: "a".repeat(64),
      storagePath: null,
      uploadedBy: "user-1",
    });
    const chunks = chunk("The contractor shall maintain 99.9% uptime availability.");
    await store.saveExtraction(
      "doc-1",
      chunks,
      assemble(chunks, "doc-1", { generateId: sequentialIds() })
    );
    return store;
  }

  it("serializes concurrent actions on one requirement", async () => {
    const store = await seededStore();

    await Promise.all([
      validateRequirement(store, "req-1", {
        action: "correct",
        actor: "a",
        cleanText: "First fix.",
      }),
      validateRequirement(store, "req-1", {
        action: "correct",
        actor: "b",
        cleanText: "Second fix.",
      }),
    ]);

    const stored = await store.getRequirement("req-1");
    expect(stored?.history.map((h) => [h.actor, h.previousCleanText])).toEqual([
      ["a", "The contractor shall maintain 99.9% uptime availability."],
      ["b", "First fix."],
    ]);
    expect(stored?.cleanText).toBe("Second fix.");
  });

  it("writes nothing when the action is invalid", async () => {
    const store = await seededStore();

    await expect(
      validateRequirement(store, "req-1", { action: "delete", actor: "a" })
    ).rejects.toThrow(InvalidActionError);

    const stored = await store.getRequirement("req-1");
    expect(stored?.status).toBe("ai_extracted");
    expect(stored?.history).toHaveLength(0);
  });

  it("fails with NotFound for an unknown id", async () => {
    const store = await seededStore();
    await expect(
      validateRequirement(store, "missing", { action: "approve", actor: "a" })
    ).rejects.toThrow(NotFoundError);
  });
});
