#!/usr/bin/env node

/**
 * Extract requirements from local files in one batch:
 *
 *   rfp-ingest [--user <id>] <file> [<file> ...]
 *
 * Files are registered first (unsupported types and duplicates are reported
 * and skipped), then processed concurrently. Uses DATABASE_URL when set,
 * otherwise an in-memory store that is discarded on exit.
 */

import fs from "fs/promises";
import path from "path";
import { getConfig } from "../config/env";
import { createPool, ensureSchema } from "../db/index";
import { MemoryExtractionStore } from "../db/memoryStore";
import { PgExtractionStore } from "../db/pgStore";
import type { ExtractionStore } from "../db/store";
import { errorMessage } from "../lib/errors";
import { registerUpload } from "../modules/documents/lib/ingestDocument";
import {
  processDocuments,
  type ProcessJob,
} from "../modules/documents/lib/processDocument";

function parseArgs(argv: string[]) {
  const files: string[] = [];
  let user = "cli";
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--user") {
      const next = argv[i + 1];
      if (!next) throw new Error("--user needs a value");
      user = next;
      i++;
    } else {
      files.push(arg);
    }
  }
  return { files, user };
}

async function ingestFiles() {
  const { files, user } = parseArgs(process.argv.slice(2));
  if (files.length === 0) {
    console.error("Usage: rfp-ingest [--user <id>] <file> [<file> ...]");
    process.exitCode = 2;
    return;
  }

  const config = getConfig();
  let store: ExtractionStore;
  if (config.databaseUrl) {
    const pool = createPool(config.databaseUrl);
    await ensureSchema(pool);
    store = new PgExtractionStore(pool);
  } else {
    store = new MemoryExtractionStore();
  }

  const jobs: ProcessJob[] = [];
  const names = new Map<string, string>();
  let skipped = 0;

  try {
    for (const file of files) {
      try {
        const bytes = await fs.readFile(file);
        const { document, declaredType } = await registerUpload(
          store,
          {
            originalFilename: path.basename(file),
            mimeType: "application/octet-stream",
            bytes,
            uploadedBy: user,
          },
          { storageDir: config.storageDir }
        );
        jobs.push({ documentId: document.id, bytes, declaredType });
        names.set(document.id, file);
      } catch (e) {
        skipped++;
        console.error(`✗ ${file}: ${errorMessage(e)}`);
      }
    }

    const outcomes = await processDocuments(store, jobs, {
      concurrency: config.processingConcurrency,
    });

    let failed = 0;
    let requirements = 0;
    for (const outcome of outcomes) {
      if (outcome.ok) {
        const { documentId, chunkCount, requirementCount } = outcome.result;
        requirements += requirementCount;
        console.log(
          `✓ ${names.get(documentId)}: ${chunkCount} chunks, ${requirementCount} requirements (${documentId})`
        );
      } else {
        failed++;
        console.error(
          `✗ ${names.get(outcome.documentId)}: ${outcome.error.message}`
        );
      }
    }

    console.log(
      `\nProcessed ${outcomes.length - failed}/${files.length} files, ` +
        `${requirements} requirements extracted, ${failed} failed, ${skipped} skipped`
    );
    if (failed > 0 || skipped > 0) process.exitCode = 1;
  } finally {
    await store.close();
  }
}

ingestFiles().catch((e: unknown) => {
  console.error(`Ingest failed: ${errorMessage(e)}`);
  process.exitCode = 1;
});
