// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

export const VERSION = "1.0.0";

export const DEFAULT_API_BASE_URL = "https://thunder.api.overdrive.com/v2/libraries";

export const DEFAULT_DATA_DIR = path.join(os.homedir(), ".libby-book-monitor");

const ENV_PREFIX = "LIBBY_BOOK_MONITOR_";

/** Largest delay `setTimeout` accepts without overflowing. */
export const MAX_TIMER_MS = 2_147_483_647;

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = env[ENV_PREFIX + name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(
      `${ENV_PREFIX + name} must be an integer from ${min} to ${max}, got "${raw}"`,
    );
  }
  return value;
}

const LOG_LEVELS = [...Object.keys(pino.levels.values), "silent"];

function readLogLevel(env: NodeJS.ProcessEnv): string {
  const raw = env[`${ENV_PREFIX}LOG_LEVEL`]?.trim();
  if (!raw) return "warn";

  const level = raw.toLowerCase();
  if (!LOG_LEVELS.includes(level)) {
    throw new ConfigurationError(
      `${ENV_PREFIX}LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`,
    );
  }
  return level;
}

function readBool(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = env[ENV_PREFIX + name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a hard-coded default so the tool runs with zero
 * configuration. `--data-dir` is applied later by the CLI and takes
 * precedence over `LIBBY_BOOK_MONITOR_DATA`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env[`${ENV_PREFIX}DATA`]?.trim() || DEFAULT_DATA_DIR;
  const apiBaseUrl = (env[`${ENV_PREFIX}API_BASE`]?.trim() || DEFAULT_API_BASE_URL)
    .replace(/\/+$/, "");

  return {
    dataDir,

    logging: {
      level: readLogLevel(env),
      prettyPrint: readBool(env, "LOG_PRETTY"),
    },

    catalog: {
      apiBaseUrl,
      requestTimeoutMs: readInt(env, "TIMEOUT_MS", 10_000, 1, MAX_TIMER_MS),
      userAgent: `libby-book-monitor/${VERSION}`,
    },

    check: {
      delayMs: readInt(env, "DELAY_MS", 1_000, 0, MAX_TIMER_MS),
      maxRetries: readInt(env, "MAX_RETRIES", 2, 0, 10),
      retryBaseDelayMs: 500,
    },
  };
}
