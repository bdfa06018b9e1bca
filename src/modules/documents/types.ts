// src/modules/documents/types.ts

export const DOCUMENT_STATUSES = [
  "uploaded",
  "processing",
  "completed",
  "failed",
] as const;

export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

export type DocumentRecord = {
  id: string;
  originalFilename: string;
  mimeType: string;
  fileSize: number;
  fileSha256: string;
  storagePath: string | null;
  status: DocumentStatus;
  errorMessage: string | null;
  uploadedBy: string;
  uploadedAt: Date;
  processedAt: Date | null;
};

/**
 * One surviving source line, in document order.
 */
export type Chunk = {
  index: number;
  text: string;
  section: string;
  subsection: string;
  page: number;
  paragraph: number;
  lineNumber: number;
};

export type StoredChunk = Chunk & { documentId: string };
