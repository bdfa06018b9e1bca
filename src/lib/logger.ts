import pino from "pino";
import type { Logger } from "pino";
import { getConfig, type AppConfig } from "../config/env";

export type LoggerSettings = Pick<AppConfig, "logLevel" | "nodeEnv">;

export function createLogger({ logLevel, nodeEnv }: LoggerSettings): Logger {
  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: "rfp-requirements-api",
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(nodeEnv === "development" && {
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    }),
  });
}

// getConfig() loads .env first, so LOG_LEVEL from the file applies here too
export const logger = createLogger(getConfig());

/**
 * Child logger bound to extra context (document id, requirement id, ...).
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
