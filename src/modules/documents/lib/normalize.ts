// src/modules/documents/lib/normalize.ts
// Raw upload bytes -> plain text, dispatched on the declared MIME type.

import path from "path";
import mammoth from "mammoth";
import { ParseFailureError, UnsupportedTypeError } from "../../../lib/errors";

export const MIME_TEXT = "text/plain";
export const MIME_PDF = "application/pdf";
export const MIME_DOCX =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";
export const MIME_DOC = "application/msword";

export type SupportedMimeType =
  | typeof MIME_TEXT
  | typeof MIME_PDF
  | typeof MIME_DOCX
  | typeof MIME_DOC;

const SUPPORTED_TYPES: ReadonlySet<string> = new Set<SupportedMimeType>([
  MIME_TEXT,
  MIME_PDF,
  MIME_DOCX,
  MIME_DOC,
]);

const EXTENSION_TYPES: Record<string, SupportedMimeType> = {
  ".txt": MIME_TEXT,
  ".pdf": MIME_PDF,
  ".docx": MIME_DOCX,
  ".doc": MIME_DOC,
};

export function isSupportedType(
  declaredType: string
): declaredType is SupportedMimeType {
  return SUPPORTED_TYPES.has(declaredType);
}

// Content types that say nothing about the format
const GENERIC_TYPES: ReadonlySet<string> = new Set([
  "",
  "application/octet-stream",
]);

/**
 * Pick the declared type for an upload. Browsers often send
 * application/octet-stream (or nothing) for .docx, so only then is the
 * extension consulted. Any other type comes back as given for normalize()
 * to accept or reject.
 */
export function declaredTypeFor(mimeType: string, filename: string): string {
  const mime = mimeType.split(";")[0].trim().toLowerCase();
  if (!GENERIC_TYPES.has(mime)) return mime;

  const ext = path.extname(filename).toLowerCase();
  return EXTENSION_TYPES[ext] ?? mime;
}

function decodeText(bytes: Buffer): string {
  try {
    // fatal: invalid UTF-8 throws instead of yielding U+FFFD
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (e) {
    throw new ParseFailureError(MIME_TEXT, e);
  }
}

async function extractPdfText(bytes: Buffer): Promise<string> {
  // Loaded on demand: pdf-parse runs a self-test on import when it has no
  // parent module, which only the PDF path should ever pay for.
  const { default: pdfParse } = await import("pdf-parse");
  try {
    const parsed = await pdfParse(bytes);
    // pdf-parse prefixes every page (the first included) with a blank line
    return (parsed.text ?? "").replace(/^\n+/, "");
  } catch (e) {
    throw new ParseFailureError(MIME_PDF, e);
  }
}

async function extractWordText(
  bytes: Buffer,
  declaredType: SupportedMimeType
): Promise<string> {
  let raw: string;
  try {
    const result = await mammoth.extractRawText({ buffer: bytes });
    raw = result.value ?? "";
  } catch (e) {
    throw new ParseFailureError(declaredType, e);
  }

  // mammoth terminates every paragraph with a blank line
  const paragraphs = raw.split("\n\n");
  if (paragraphs.length > 0 && paragraphs[paragraphs.length - 1] === "") {
    paragraphs.pop();
  }
  return paragraphs.join("\n");
}

/**
 * Convert raw document bytes into plain text. Empty output is a valid
 * result here; callers decide whether to reject it.
 */
export async function normalize(
  bytes: Buffer,
  declaredType: string
): Promise<string> {
  if (!isSupportedType(declaredType)) {
    throw new UnsupportedTypeError(declaredType);
  }

  switch (declaredType) {
    case MIME_TEXT:
      return decodeText(bytes);
    case MIME_PDF:
      return extractPdfText(bytes);
    case MIME_DOCX:
    case MIME_DOC:
      return extractWordText(bytes, declaredType);
  }
}
