// ---------------------------------------------------------------------------
// Watchlist persistence.
//
// A repository loads and saves one profile's whole watchlist as a unit. The
// JSON-file backend keeps one human-readable file per profile and replaces
// it with write-to-temp-then-rename, so a crash mid-write leaves the last
// committed file in place.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { z } from "zod";

import type { BookId, ProfileName, WatchedBook } from "../core/types.js";
import { StorageError } from "../core/errors.js";
import { DEFAULT_PROFILE } from "../config/profile.js";

// ── Contract ────────────────────────────────────────────────────────────────

export interface WatchlistRepository {
  /** All books of `profile` in insertion order; empty for a new profile. */
  load(profile: ProfileName): Promise<WatchedBook[]>;
  /** Replace the stored watchlist of `profile` atomically. */
  save(profile: ProfileName, books: readonly WatchedBook[]): Promise<void>;
}

/** The file system calls the JSON backend makes. Injectable for tests. */
export interface FileOps {
  readFile(file: string, encoding: "utf-8"): Promise<string>;
  writeFile(file: string, data: string, encoding: "utf-8"): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(dir: string, options: { recursive: true }): Promise<unknown>;
  rm(file: string, options: { force: true }): Promise<void>;
}

export const nodeFileOps: FileOps = {
  readFile: (file, encoding) => fs.readFile(file, encoding),
  writeFile: (file, data, encoding) => fs.writeFile(file, data, encoding),
  rename: (from, to) => fs.rename(from, to),
  mkdir: (dir, options) => fs.mkdir(dir, options),
  rm: (file, options) => fs.rm(file, options),
};

// ── On-disk format ──────────────────────────────────────────────────────────

const FILE_FORMAT_VERSION = 1;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const WatchedBookSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  author: z.string().default(""),
  libraryCode: z.string().min(1),
  status: z.enum(["not_found", "found"]),
  addedOn: isoDate,
  lastChecked: z.string().nullable().default(null),
  foundOn: isoDate.nullable().default(null),
});

const WatchlistFileSchema = z.object({
  version: z.literal(FILE_FORMAT_VERSION),
  profile: z.string(),
  books: z.array(WatchedBookSchema),
});

type WatchlistFile = z.input<typeof WatchlistFileSchema>;

/** `watchlist.json` for the default profile, `watchlist-<name>.json` otherwise. */
export function watchlistFileName(profile: ProfileName): string {
  return profile === DEFAULT_PROFILE ? "watchlist.json" : `watchlist-${profile}.json`;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// ── JSON file backend ───────────────────────────────────────────────────────

export class JsonFileWatchlistRepository implements WatchlistRepository {
  private readonly dataDir: string;
  private readonly logger: Logger;
  private readonly fileOps: FileOps;

  constructor(dataDir: string, logger: Logger, fileOps: FileOps = nodeFileOps) {
    this.dataDir = dataDir;
    this.logger = logger.child({ component: "JsonFileWatchlistRepository" });
    this.fileOps = fileOps;
  }

  pathFor(profile: ProfileName): string {
    return path.join(this.dataDir, watchlistFileName(profile));
  }

  async load(profile: ProfileName): Promise<WatchedBook[]> {
    const file = this.pathFor(profile);

    let raw: string;
    try {
      raw = await this.fileOps.readFile(file, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        this.logger.debug({ profile, file }, "No watchlist file yet");
        return [];
      }
      throw new StorageError(`Cannot read watchlist ${file}`, file, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StorageError(`Watchlist ${file} is not valid JSON`, file, { cause: err });
    }

    const result = WatchlistFileSchema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join(".") : "root";
      throw new StorageError(
        `Watchlist ${file} is corrupt at ${where}: ${issue?.message ?? "unknown error"}`,
        file,
        { cause: result.error },
      );
    }

    return result.data.books.map((b) => ({ ...b, id: b.id as BookId }));
  }

  async save(profile: ProfileName, books: readonly WatchedBook[]): Promise<void> {
    const file = this.pathFor(profile);
    const tmp = `${file}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;

    const contents: WatchlistFile = {
      version: FILE_FORMAT_VERSION,
      profile,
      books: books.map((b) => ({ ...b })),
    };

    try {
      await this.fileOps.mkdir(this.dataDir, { recursive: true });
      await this.fileOps.writeFile(tmp, `${JSON.stringify(contents, null, 2)}\n`, "utf-8");
      await this.fileOps.rename(tmp, file);
    } catch (err) {
      await this.discardTemp(tmp);
      throw new StorageError(`Cannot write watchlist ${file}`, file, { cause: err });
    }

    this.logger.debug({ profile, file, books: books.length }, "Watchlist saved");
  }

  private async discardTemp(tmp: string): Promise<void> {
    try {
      await this.fileOps.rm(tmp, { force: true });
    } catch (err) {
      this.logger.warn({ tmp, err }, "Could not remove temporary watchlist file");
    }
  }
}
