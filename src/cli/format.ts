// ---------------------------------------------------------------------------
// Plain-text rendering of command output. Each function returns lines; the
// caller decides which stream they go to.
// ---------------------------------------------------------------------------

import type {
  CatalogSearchResult,
  CheckResult,
  LibraryConfig,
  ProfileName,
  WatchedBook,
} from "../core/types.js";
import { WatchStatus } from "../core/types.js";
import { libraryDisplayName } from "../config/library-config.js";
import { DEFAULT_PROFILE } from "../config/profile.js";

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** `Israel Digital (telaviv)` when the code has a configured name, else the code. */
export function formatLibrary(config: LibraryConfig, code: string): string {
  const name = libraryDisplayName(config, code);
  return name === code ? code : `${name} (${code})`;
}

export function formatSearchResults(
  libraryLabel: string,
  query: string,
  result: CatalogSearchResult,
): string[] {
  const lines = [`Searching "${query}" in ${libraryLabel}...`, ""];

  if (result.entries.length === 0) {
    lines.push("No results found.");
    return lines;
  }

  result.entries.forEach((entry, idx) => {
    const status = entry.isOwned ? "In catalogue" : "Not owned";
    const avail = entry.isAvailable ? `Yes (${entry.copiesAvailable})` : "No";
    const format = entry.format ? ` | ${entry.format}` : "";

    lines.push(`  ${idx + 1}. ${entry.title || "Unknown"} - ${entry.author || "Unknown"}`);
    lines.push(`     ${status} | Copies: ${entry.copiesOwned} | Available: ${avail}${format}`);
    lines.push("");
  });

  lines.push(`${result.totalItems} result(s) total`);
  return lines;
}

export function formatAdded(config: LibraryConfig, book: WatchedBook): string[] {
  const lines = [`Added to watchlist: ${book.title}`];
  if (book.author) lines.push(`  Author: ${book.author}`);
  lines.push(`  Library: ${formatLibrary(config, book.libraryCode)}`);
  return lines;
}

export function formatWatchlist(
  config: LibraryConfig,
  profile: ProfileName,
  books: readonly WatchedBook[],
): string[] {
  if (books.length === 0) return ["Watchlist is empty."];

  const tag = profile === DEFAULT_PROFILE ? "" : ` [${profile}]`;
  const lines = [`Watchlist${tag} (${plural(books.length, "book")}):`, ""];

  books.forEach((book, idx) => {
    const marker = book.status === WatchStatus.FOUND ? "*" : " ";
    lines.push(`  ${marker} ${idx + 1}. ${book.title}`);
    if (book.author) lines.push(`       Author: ${book.author}`);
    lines.push(
      `       Library: ${formatLibrary(config, book.libraryCode)}` +
        ` | Status: ${book.status} | Checked: ${book.lastChecked ?? "never"}`,
    );
    if (book.foundOn) lines.push(`       Found on: ${book.foundOn}`);
    lines.push("");
  });

  return lines;
}

/** The `--notify` digest. Empty when nothing new turned up. */
export function formatNewArrivals(
  config: LibraryConfig,
  results: readonly CheckResult[],
): string[] {
  if (results.length === 0) return [];

  const lines = ["New on Libby:", ""];
  for (const { book, matchedEntry } of results) {
    const title = matchedEntry?.title || book.title;
    const author = matchedEntry?.author || book.author;
    const copies = matchedEntry ? String(matchedEntry.copiesOwned) : "?";
    const avail = matchedEntry?.isAvailable ? "Yes" : "No";

    lines.push(author ? `  ${title} - ${author}` : `  ${title}`);
    lines.push(
      `    Library: ${formatLibrary(config, book.libraryCode)} | Copies: ${copies} | Available: ${avail}`,
    );
    lines.push("");
  }
  return lines;
}

/** Full `check` report: summary, new arrivals, then books already found. */
export function formatCheckSummary(
  config: LibraryConfig,
  results: readonly CheckResult[],
  newlyFound: readonly CheckResult[],
): string[] {
  const lines = [`Checked ${plural(results.length, "book")}.`];

  const failed = results.filter((r) => r.error !== null).length;
  if (failed > 0) lines.push(`${failed} check(s) failed.`);

  if (newlyFound.length > 0) {
    lines.push(`${newlyFound.length} new addition(s) found!`, "");
    lines.push(...formatNewArrivals(config, newlyFound));
  }

  const found = results.filter((r) => r.newStatus === WatchStatus.FOUND);
  if (found.length > 0) {
    if (lines[lines.length - 1] !== "") lines.push("");
    lines.push(`${found.length} book(s) already in catalogue:`);
    for (const r of found) lines.push(`  - ${r.book.title}`);
    lines.push("Consider removing them with 'unwatch'.");
  }

  return lines;
}

export function formatCheckError(result: CheckResult): string {
  return `Error checking "${result.book.title}": ${result.error?.message ?? "unknown error"}`;
}
