// ---------------------------------------------------------------------------
// Reconciler – checks every watched book of a profile against the catalog.
//
// Flow for each book, in watchlist order:
//   1. Search the book's library for its title (retrying transient errors).
//   2. Look for an owned entry matching title/author.
//   3. Persist the new status and check time.
//   4. Pause before the next catalog call.
//
// A catalog failure is recorded on that book's CheckResult and the batch
// moves on. A storage failure aborts the run with CheckAbortedError, which
// carries the results of the books already saved.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  CatalogClient,
  CatalogEntry,
  CheckConfig,
  CheckOptions,
  CheckResult,
  ProfileName,
  WatchedBook,
} from "../core/types.js";
import { WatchStatus } from "../core/types.js";
import { BookMonitorError } from "../core/errors.js";
import { findOwnedMatch } from "../matching/matcher.js";
import { toIsoDate, type WatchlistStore } from "../store/watchlist-store.js";
import { sleep, withRetry } from "./retry.js";

export interface ReconcilerDeps {
  catalog: CatalogClient;
  store: WatchlistStore;
  config: CheckConfig;
  logger: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * A status could not be persisted, so the run stopped part-way. `results`
 * holds what was already checked and saved, filtered as `check` would
 * have returned it, so the caller can still report those books.
 */
export class CheckAbortedError extends BookMonitorError {
  public readonly results: CheckResult[];

  constructor(message: string, results: CheckResult[], options?: ErrorOptions) {
    super(message, options);
    this.name = "CheckAbortedError";
    this.results = results;
  }
}

export class Reconciler {
  private readonly catalog: CatalogClient;
  private readonly store: WatchlistStore;
  private readonly config: CheckConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: ReconcilerDeps) {
    this.catalog = deps.catalog;
    this.store = deps.store;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: "Reconciler" });
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? sleep;
  }

  /**
   * Check every book in `profile`. With `notifyOnly`, only the books that
   * turned up in the collection during this run are returned.
   *
   * @throws CheckAbortedError when a status update cannot be saved.
   */
  async check(profile: ProfileName, options: CheckOptions): Promise<CheckResult[]> {
    const books = await this.store.list(profile);
    const log = this.logger.child({ profile });
    log.info({ books: books.length }, "Starting watchlist check");

    const results: CheckResult[] = [];
    for (let i = 0; i < books.length; i++) {
      try {
        results.push(await this.checkBook(profile, books[i], log));
      } catch (error: unknown) {
        log.error({ err: error, checked: i, total: books.length }, "Watchlist check aborted");
        const reason = error instanceof Error ? error.message : String(error);
        throw new CheckAbortedError(
          `Check stopped after ${i} of ${books.length} book(s): ${reason}`,
          options.notifyOnly ? results.filter(isNewlyFound) : results,
          { cause: error },
        );
      }

      if (i < books.length - 1 && this.config.delayMs > 0) {
        await this.sleep(this.config.delayMs);
      }
    }

    const newlyFound = results.filter(isNewlyFound);
    log.info(
      {
        checked: results.length,
        newlyFound: newlyFound.length,
        failed: results.filter((r) => r.error !== null).length,
      },
      "Watchlist check completed",
    );

    return options.notifyOnly ? newlyFound : results;
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private async checkBook(
    profile: ProfileName,
    book: WatchedBook,
    log: Logger,
  ): Promise<CheckResult> {
    let matchedEntry: CatalogEntry | null;
    try {
      const result = await withRetry(
        () => this.catalog.search(book.libraryCode, book.title),
        {
          maxRetries: this.config.maxRetries,
          baseDelayMs: this.config.retryBaseDelayMs,
          sleep: this.sleep,
        },
      );
      matchedEntry = findOwnedMatch(book, result.entries);
    } catch (error: unknown) {
      log.warn({ bookId: book.id, title: book.title, err: error }, "Book check failed");
      return {
        book,
        previousStatus: book.status,
        newStatus: book.status,
        matchedEntry: null,
        error: toError(error),
      };
    }

    const checkedAt = this.now();
    const updated = await this.store.updateStatus(profile, book.id, {
      status: matchedEntry ? WatchStatus.FOUND : WatchStatus.NOT_FOUND,
      checkedAt: checkedAt.toISOString(),
      foundOn: toIsoDate(checkedAt),
    });

    log.debug(
      { bookId: book.id, title: book.title, status: updated.status },
      "Book checked",
    );

    return {
      book: updated,
      previousStatus: book.status,
      newStatus: updated.status,
      matchedEntry,
      error: null,
    };
  }
}

/** The book moved from not found to found during this run. */
export function isNewlyFound(result: CheckResult): boolean {
  return (
    result.previousStatus === WatchStatus.NOT_FOUND &&
    result.newStatus === WatchStatus.FOUND
  );
}

function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new BookMonitorError(String(error));
}
