import { createApp } from "./app";
import { getConfig } from "./config/env";
import { createPool, ensureSchema } from "./db/index";
import { MemoryExtractionStore } from "./db/memoryStore";
import { PgExtractionStore } from "./db/pgStore";
import type { ExtractionStore } from "./db/store";
import { errorMessage } from "./lib/errors";
import { logger } from "./lib/logger";

async function openStore(databaseUrl?: string): Promise<ExtractionStore> {
  if (!databaseUrl) {
    logger.warn("DATABASE_URL not set; using the in-memory store");
    return new MemoryExtractionStore();
  }

  const pool = createPool(databaseUrl);
  await ensureSchema(pool);
  return new PgExtractionStore(pool);
}

async function main() {
  const config = getConfig();
  const store = await openStore(config.databaseUrl);
  const app = createApp({ store, config });

  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, store: store.kind },
      `API listening on http://localhost:${config.port}`
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (e: unknown) => {
          logger.error({ error: errorMessage(e) }, "Store close failed");
          process.exit(1);
        }
      );
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e: unknown) => {
  logger.fatal({ error: errorMessage(e) }, "Startup failed");
  process.exit(1);
});
