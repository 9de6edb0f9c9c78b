// ---------------------------------------------------------------------------
// clanker-guard configuration
// Loads and validates environment variables
// ---------------------------------------------------------------------------

import { LOG_LEVELS } from "./logger";
import type { LogLevel, ServiceConfig } from "./types";

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment variables.
 * Throws descriptive errors for malformed values.
 */
export function loadConfig(env: Env = process.env): ServiceConfig {
  return {
    port: readInt(env, "PORT", 8000),
    data_dir: env.DATA_DIR || "./data",
    accept_query_param: readBool(env, "ALLOW_QUERY_CREDENTIALS", true),
    log_level: readLogLevel(env),
    argon2_memory_cost: readInt(env, "ARGON2_MEMORY_COST", 65536),
    argon2_time_cost: readInt(env, "ARGON2_TIME_COST", 3),
    ollama_url: env.OLLAMA_URL || "http://localhost:11434",
    ollama_model: env.OLLAMA_MODEL || "deepseek-r1:14b",
    groupme_access_token: env.GROUPME_ACCESS_TOKEN || null,
    groupme_bot_id: env.GROUPME_BOT_ID || null,
    groupme_group_id: env.GROUPME_GROUP_ID || null,
    ignored_users: (env.IGNORED_USERS || "")
      .split(",")
      .map((u) => u.trim().toLowerCase())
      .filter(Boolean),
  };
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  const lowered = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(lowered)) return true;
  if (["0", "false", "no", "off"].includes(lowered)) return false;
  throw new Error(`${name} must be true or false, got "${raw}"`);
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL;
  if (!raw) return "info";
  const level = LOG_LEVELS.find((l) => l === raw.toLowerCase());
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
  }
  return level;
}

/**
 * Detect whether Vercel KV is configured; otherwise credentials live on disk.
 */
export function isKVAvailable(env: Env = process.env): boolean {
  return Boolean(env.KV_REST_API_URL && env.KV_REST_API_TOKEN);
}
