// src/modules/documents/lib/processDocument.ts
// Drives one document through normalize -> chunk -> detect/classify ->
// assemble -> persist, and keeps documents.status in step:
//   uploaded -> processing -> completed | failed

import type { ExtractionStore } from "../../../db/store";
import { EmptyContentError, errorMessage } from "../../../lib/errors";
import { createChildLogger } from "../../../lib/logger";
import { pLimit } from "../../../lib/pLimit";
import { assemble } from "../../requirements/lib/assembler";
import { chunk } from "./chunker";
import { normalize } from "./normalize";

export type ProcessJob = {
  documentId: string;
  bytes: Buffer;
  declaredType: string;
};

export type ProcessResult = {
  documentId: string;
  chunkCount: number;
  requirementCount: number;
};

export type ProcessOutcome =
  | { ok: true; result: ProcessResult }
  | { ok: false; documentId: string; error: Error };

export async function processDocument(
  store: ExtractionStore,
  job: ProcessJob,
  now: () => Date = () => new Date()
): Promise<ProcessResult> {
  const { documentId } = job;
  const log = createChildLogger({ documentId });

  await store.updateDocumentStatus(documentId, { status: "processing" });

  try {
    const text = await normalize(job.bytes, job.declaredType);
    if (!text.trim()) throw new EmptyContentError();

    const chunks = chunk(text);
    const drafts = assemble(chunks, documentId);
    await store.saveExtraction(documentId, chunks, drafts);

    await store.updateDocumentStatus(documentId, {
      status: "completed",
      processedAt: now(),
      errorMessage: null,
    });

    log.info(
      { chunks: chunks.length, requirements: drafts.length },
      "Document processed"
    );

    return {
      documentId,
      chunkCount: chunks.length,
      requirementCount: drafts.length,
    };
  } catch (e) {
    log.warn({ error: errorMessage(e) }, "Document processing failed");
    try {
      await store.updateDocumentStatus(documentId, {
        status: "failed",
        errorMessage: errorMessage(e),
      });
    } catch (statusErr) {
      // the caller needs the processing error, not this one
      log.error(
        { error: errorMessage(statusErr) },
        "Could not mark document as failed"
      );
    }
    throw e;
  }
}

/**
 * Process independent documents concurrently. One document failing never
 * stops the others; outcomes come back in job order.
 */
export async function processDocuments(
  store: ExtractionStore,
  jobs: readonly ProcessJob[],
  options: { concurrency?: number } = {}
): Promise<ProcessOutcome[]> {
  const limit = pLimit(options.concurrency ?? 4);

  return Promise.all(
    jobs.map((job) =>
      limit(async (): Promise<ProcessOutcome> => {
        try {
          return { ok: true, result: await processDocument(store, job) };
        } catch (e) {
          return {
            ok: false,
            documentId: job.documentId,
            error: e instanceof Error ? e : new Error(String(e)),
          };
        }
      })
    )
  );
}
