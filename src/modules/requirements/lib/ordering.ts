import type { Requirement } from "../types";

/**
 * Document position: page, then paragraph, then chunk sequence.
 */
export function compareByPosition(a: Requirement, b: Requirement): number {
  return (
    a.sourcePage - b.sourcePage ||
    a.sourceParagraph - b.sourceParagraph ||
    a.sourceChunkIndex - b.sourceChunkIndex
  );
}
