// ---------------------------------------------------------------------------
// Core types for the book monitor.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** Name of a watchlist partition. See `parseProfileName`. */
export type ProfileName = string & { readonly __brand: "ProfileName" };

/** Identifier of a watched book within its profile. */
export type BookId = string & { readonly __brand: "BookId" };

// ── Enums ───────────────────────────────────────────────────────────────────

export const WatchStatus = {
  NOT_FOUND: "not_found",
  FOUND: "found",
} as const;
export type WatchStatus = (typeof WatchStatus)[keyof typeof WatchStatus];

// ── Watchlist ───────────────────────────────────────────────────────────────

export interface WatchedBook {
  id: BookId;
  title: string;
  /** Empty string when no author was given. */
  author: string;
  /** Catalog routing code, e.g. `nypl`. */
  libraryCode: string;
  status: WatchStatus;
  /** YYYY-MM-DD */
  addedOn: string;
  /** ISO-8601 timestamp of the last successful check. */
  lastChecked: string | null;
  /** YYYY-MM-DD of the first check that saw the book in the collection. */
  foundOn: string | null;
}

export interface NewWatchedBook {
  title: string;
  author?: string;
  libraryCode: string;
}

export interface StatusUpdate {
  status: WatchStatus;
  checkedAt: string;
  foundOn?: string;
}

// ── Catalog ─────────────────────────────────────────────────────────────────

export interface CatalogEntry {
  id: string;
  title: string;
  author: string;
  format: string;
  copiesOwned: number;
  copiesAvailable: number;
  /** The item is part of the lendable collection, not merely indexed. */
  isOwned: boolean;
  isAvailable: boolean;
}

export interface CatalogSearchResult {
  totalItems: number;
  entries: CatalogEntry[];
}

/**
 * Every catalog backend implements this. The reconciler only depends on the
 * interface so tests can substitute an in-process fake.
 */
export interface CatalogClient {
  search(libraryCode: string, query: string): Promise<CatalogSearchResult>;
}

// ── Reconciliation ──────────────────────────────────────────────────────────

export interface CheckResult {
  book: WatchedBook;
  previousStatus: WatchStatus;
  newStatus: WatchStatus;
  /** The owned entry that satisfied the match, if any. */
  matchedEntry: CatalogEntry | null;
  /** Set when the catalog lookup for this book failed. */
  error: Error | null;
}

export interface CheckOptions {
  notifyOnly: boolean;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  /** Data directory from the environment, before any `--data-dir` override. */
  dataDir: string;
  logging: LoggingConfig;
  catalog: CatalogConfig;
  check: CheckConfig;
}

export interface CatalogConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  userAgent: string;
}

export interface CheckConfig {
  /** Pause between successive catalog calls. */
  delayMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
}

/** Contents of `config.yaml` in the data directory. */
export interface LibraryConfig {
  defaultLibrary: string;
  /** Library code to display name. */
  libraries: Record<string, string>;
}

/** Where a command reads and writes its state. Passed explicitly everywhere. */
export interface MonitorContext {
  dataDir: string;
  profile: ProfileName;
}
