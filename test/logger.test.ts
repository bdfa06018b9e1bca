import { describe, expect, it } from "vitest";
import { getConfig } from "../src/config/env";
import { createLogger, logger } from "../src/lib/logger";

describe("logger", () => {
  it("takes its level from the settings", () => {
    expect(createLogger({ logLevel: "error", nodeEnv: "test" }).level).toBe(
      "error"
    );
    expect(createLogger({ logLevel: "debug", nodeEnv: "production" }).level).toBe(
      "debug"
    );
  });

  it("builds the shared logger from the loaded configuration", () => {
    expect(logger.level).toBe(getConfig().logLevel);
  });
});
