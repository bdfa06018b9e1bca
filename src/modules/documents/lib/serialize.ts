import type { DocumentRecord, StoredChunk } from "../types";

export function documentJson(d: DocumentRecord) {
  return {
    id: d.id,
    original_filename: d.originalFilename,
    mime_type: d.mimeType,
    file_size: d.fileSize,
    file_sha256: d.fileSha256,
    storage_path: d.storagePath,
    status: d.status,
    error_message: d.errorMessage,
    uploaded_by: d.uploadedBy,
    uploaded_at: d.uploadedAt.toISOString(),
    processed_at: d.processedAt ? d.processedAt.toISOString() : null,
  };
}

export function chunkJson(c: StoredChunk) {
  return {
    document_id: c.documentId,
    chunk_index: c.index,
    text: c.text,
    section: c.section,
    subsection: c.subsection,
    page: c.page,
    paragraph: c.paragraph,
    line_number: c.lineNumber,
  };
}
