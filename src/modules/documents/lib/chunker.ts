// src/modules/documents/lib/chunker.ts
// Line-oriented chunking with section tracking. One surviving line = one
// chunk; obligations wrapped across lines are not stitched back together.

import type { Chunk } from "../types";

export const DEFAULT_SECTION = "Unknown";
export const DEFAULT_SUBSECTION = "0";

const SECTION_HEADER = /^(Section\s+[\w.]+)[\s:]+(.+)/i;
const FORM_FEED = "\f";

export type SectionHeader = {
  section: string;
  label: string;
};

/**
 * "Section C: Performance" -> { section: "Section C", label: "Performance" }.
 * Expects a trimmed line.
 */
export function matchSectionHeader(line: string): SectionHeader | null {
  const m = SECTION_HEADER.exec(line);
  if (!m) return null;
  return { section: m[1], label: m[2] };
}

export function chunk(text: string): Chunk[] {
  const chunks: Chunk[] = [];
  const lines = text.split("\n");

  let currentSection = DEFAULT_SECTION;
  let currentSubsection = DEFAULT_SUBSECTION;
  let page = 1;
  let paragraph = 0;
  let inParagraph = false;

  lines.forEach((rawLine, i) => {
    const lineNumber = i + 1;

    const pageBreaks = rawLine.split(FORM_FEED).length - 1;
    if (pageBreaks > 0) {
      page += pageBreaks;
      paragraph = 0;
      inParagraph = false;
    }

    const line = rawLine.split(FORM_FEED).join("").trim();
    if (!line) {
      inParagraph = false;
      return;
    }

    if (!inParagraph) {
      paragraph += 1;
      inParagraph = true;
    }

    const header = matchSectionHeader(line);
    if (header) {
      currentSection = header.section;
      currentSubsection = String(lineNumber);
      return;
    }

    chunks.push({
      index: chunks.length,
      text: line,
      section: currentSection,
      subsection: currentSubsection,
      page,
      paragraph,
      lineNumber,
    });
  });

  return chunks;
}
