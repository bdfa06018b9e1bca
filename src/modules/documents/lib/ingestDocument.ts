// src/modules/documents/lib/ingestDocument.ts

import crypto, { randomUUID } from "crypto";
import fs from "fs/promises";
import path from "path";
import type { ExtractionStore } from "../../../db/store";
import {
  DuplicateDocumentError,
  NotFoundError,
  UnsupportedTypeError,
  isExtractionError,
} from "../../../lib/errors";
import type { DocumentRecord } from "../types";
import { declaredTypeFor, isSupportedType } from "./normalize";
import { processDocument, type ProcessResult } from "./processDocument";

export type Upload = {
  originalFilename: string;
  mimeType: string;
  bytes: Buffer;
  uploadedBy: string;
};

export type IngestOptions = {
  /** When set, the raw upload is kept at <storageDir>/<documentId>/<name>. */
  storageDir?: string;
};

export type IngestResult = ProcessResult & {
  document: DocumentRecord;
};

export function sha256(bytes: Buffer): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

export function safeFilename(name: string): string {
  return name.replace(/[^\w.\-() ]+/g, "_");
}

export type Registration = {
  document: DocumentRecord;
  declaredType: string;
};

/**
 * Store an upload as a document in status "uploaded". Unsupported types and
 * duplicates are rejected before anything is stored.
 */
export async function registerUpload(
  store: ExtractionStore,
  upload: Upload,
  options: IngestOptions = {}
): Promise<Registration> {
  const declaredType = declaredTypeFor(upload.mimeType, upload.originalFilename);
  if (!isSupportedType(declaredType)) {
    throw new UnsupportedTypeError(declaredType || upload.originalFilename);
  }

  const fileSha256 = sha256(upload.bytes);
  // fast path; createDocument stays the authority under concurrent uploads
  const existing = await store.findDocumentBySha256(fileSha256);
  if (existing) throw new DuplicateDocumentError(existing.id, fileSha256);

  const documentId = randomUUID();

  let storagePath: string | null = null;
  let destDir: string | null = null;
  if (options.storageDir) {
    destDir = path.resolve(options.storageDir, documentId);
    await fs.mkdir(destDir, { recursive: true });
    const destPath = path.join(destDir, safeFilename(upload.originalFilename));
    await fs.writeFile(destPath, upload.bytes);
    storagePath = path.relative(process.cwd(), destPath);
  }

  let document: DocumentRecord;
  try {
    document = await store.createDocument({
      id: documentId,
      originalFilename: upload.originalFilename,
      mimeType: declaredType,
      fileSize: upload.bytes.length,
      fileSha256,
      storagePath,
      uploadedBy: upload.uploadedBy,
    });
  } catch (e) {
    if (destDir) await fs.rm(destDir, { recursive: true, force: true });
    throw e;
  }

  return { document, declaredType };
}

/**
 * Register an upload and run extraction on it.
 */
export async function ingestDocument(
  store: ExtractionStore,
  upload: Upload,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const { document: created, declaredType } = await registerUpload(
    store,
    upload,
    options
  );
  const documentId = created.id;

  let result: ProcessResult;
  try {
    result = await processDocument(store, {
      documentId,
      bytes: upload.bytes,
      declaredType,
    });
  } catch (e) {
    if (isExtractionError(e)) e.details.document_id = documentId;
    throw e;
  }

  const document = await store.getDocument(documentId);
  if (!document) throw new NotFoundError("Document", documentId);

  return { ...result, document };
}
