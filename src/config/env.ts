// src/config/env.ts
// Reads .env (if present) and validates the settings the service reads.

import { existsSync, readFileSync } from "fs";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z
    .string()
    .trim()
    .min(1)
    .optional()
    .or(z.literal("").transform(() => undefined)),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(100 * 1024 * 1024),
  STORAGE_DIR: z
    .string()
    .trim()
    .min(1)
    .optional()
    .or(z.literal("").transform(() => undefined)),
  PROCESSING_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
});

export type AppConfig = {
  nodeEnv: "development" | "production" | "test";
  port: number;
  databaseUrl?: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  maxUploadBytes: number;
  storageDir?: string;
  processingConcurrency: number;
};

/**
 * Parse settings from an env-like record. Throws with every offending key
 * listed when validation fails.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${detail}`);
  }

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    logLevel: e.LOG_LEVEL,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    storageDir: e.STORAGE_DIR,
    processingConcurrency: e.PROCESSING_CONCURRENCY,
  };
}

/**
 * Settings from a .env file overlaid by the process environment, which wins
 * for keys set in both. A missing file is not an error.
 */
export function readConfig(
  envFile: string = path.resolve(process.cwd(), ".env"),
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const fromFile = existsSync(envFile)
    ? dotenv.parse(readFileSync(envFile))
    : {};
  const overrides = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined)
  );
  return loadConfig({ ...fromFile, ...overrides });
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = readConfig();
  return cached;
}
