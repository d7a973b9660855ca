/**
 * @shipledger/engine — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { join } from "node:path";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  // Storage
  SHIPLEDGER_DATA_DIR: z.string().min(1).default("data/logs"),
  EVENT_LOG_FILE: z.string().min(1).default("shipments.jsonl"),
  COUNTER_LOG_FILE: z.string().min(1).default("shipment_counter.jsonl"),
  STRICT_READS: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("false"),

  // Identifiers
  ID_PREFIX: z
    .string()
    .regex(/^[A-Z][A-Z0-9]*$/, "ID_PREFIX must be uppercase alphanumeric")
    .default("SHP"),
  ID_WIDTH: z.coerce.number().int().min(1).max(15).default(10),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function eventLogPath(config: AppConfig): string {
  return join(config.SHIPLEDGER_DATA_DIR, config.EVENT_LOG_FILE);
}

export function counterLogPath(config: AppConfig): string {
  return join(config.SHIPLEDGER_DATA_DIR, config.COUNTER_LOG_FILE);
}
