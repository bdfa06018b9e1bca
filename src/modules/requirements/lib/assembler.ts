// src/modules/requirements/lib/assembler.ts

import { randomUUID } from "crypto";
import type { Chunk } from "../../documents/types";
import type { RequirementDraft } from "../types";
import { classify } from "./classifier";
import { findCrossReferences } from "./crossReferences";
import { isObligation } from "./obligation";

export type AssembleOptions = {
  generateId?: () => string;
};

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Turn ordered chunks into requirement drafts. A chunk needs both
 * obligation language and a rule-table match to become a requirement.
 */
export function assemble(
  chunks: readonly Chunk[],
  documentId: string,
  options: AssembleOptions = {}
): RequirementDraft[] {
  const generateId = options.generateId ?? randomUUID;
  const drafts: RequirementDraft[] = [];

  for (const c of chunks) {
    if (!isObligation(c.text)) continue;

    const { classification, confidence } = classify(c.text);
    if (!classification) continue;

    drafts.push({
      id: generateId(),
      documentId,
      sourceChunkIndex: c.index,
      rawText: c.text,
      cleanText: cleanText(c.text),
      classification,
      confidence,
      sourceSection: c.section,
      sourceSubsection: c.subsection,
      sourcePage: c.page,
      sourceParagraph: c.paragraph,
      crossReferences: findCrossReferences(c.text),
      status: "ai_extracted",
    });
  }

  return drafts;
}
