// ---------------------------------------------------------------------------
// Library configuration file (`config.yaml` in the data directory).
// Holds the default library code and a code -> display-name mapping.
// Created with defaults on first use, validated with Zod on every load.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { parse, stringify } from "yaml";
import type { LibraryConfig } from "../core/types.js";
import { ConfigurationError, StorageError } from "../core/errors.js";

export const LIBRARY_CONFIG_FILE = "config.yaml";

// ── Zod schema ──────────────────────────────────────────────────────────────

export const LibraryConfigSchema = z.object({
  default_library: z.string().trim().min(1),
  libraries: z.record(z.string()).default({}),
});

export const DEFAULT_LIBRARY_CONFIG: LibraryConfig = {
  defaultLibrary: "telaviv",
  libraries: {
    telaviv: "Israel Digital",
  },
};

function toFileShape(config: LibraryConfig): z.input<typeof LibraryConfigSchema> {
  return {
    default_library: config.defaultLibrary,
    libraries: config.libraries,
  };
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Read `config.yaml` from `dataDir`, creating the directory and a default
 * file when they do not exist yet.
 *
 * I/O failures raise {@link StorageError}; a file that parses but does not
 * match the schema raises {@link ConfigurationError}.
 */
export async function loadLibraryConfig(dataDir: string): Promise<LibraryConfig> {
  const filePath = path.join(dataDir, LIBRARY_CONFIG_FILE);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) !== "ENOENT") {
      throw new StorageError(`Cannot read ${filePath}`, filePath, { cause: err });
    }
    await writeLibraryConfig(dataDir, DEFAULT_LIBRARY_CONFIG);
    return { ...DEFAULT_LIBRARY_CONFIG, libraries: { ...DEFAULT_LIBRARY_CONFIG.libraries } };
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${filePath} is not valid YAML`, { cause: err });
  }

  const result = LibraryConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "root";
    throw new ConfigurationError(
      `${filePath} is invalid at ${where}: ${issue?.message ?? "unknown error"}`,
    );
  }

  return {
    defaultLibrary: result.data.default_library,
    libraries: result.data.libraries,
  };
}

/** Write `config` to `dataDir/config.yaml`, creating the directory if needed. */
export async function writeLibraryConfig(
  dataDir: string,
  config: LibraryConfig,
): Promise<void> {
  const filePath = path.join(dataDir, LIBRARY_CONFIG_FILE);
  try {
    await fs.mkdir(dataDir, { recursive: true });
    await fs.writeFile(filePath, stringify(toFileShape(config)), "utf-8");
  } catch (err) {
    throw new StorageError(`Cannot write ${filePath}`, filePath, { cause: err });
  }
}

/** Display name for a library code, falling back to the code itself. */
export function libraryDisplayName(config: LibraryConfig, code: string): string {
  return config.libraries[code] ?? code;
}
