/**
 * @tally/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Role } from "./types/auth.js";
import { isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage
  DATA_DIR: z.string().min(1).default("./data"),

  // Money
  CURRENCY: z.string().trim().min(1).default("BRL"),
  CURRENCY_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),

  // Auth
  API_KEYS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  /** Recorded as the actor on every record this key touches */
  readonly username: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:user1,key2:role2:user2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, username] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || username === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:username`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (username === "") {
      throw new Error("Username cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS for user "${username}"`);
    }
    seen.add(key);

    keys.push({ key, role, username });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
