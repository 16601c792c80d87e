// ---------------------------------------------------------------------------
// Title / author matching between watchlist entries and catalog results.
// ---------------------------------------------------------------------------

import type { CatalogEntry, WatchedBook } from "../core/types.js";

/** The fields of a watched book the matcher looks at. */
export type MatchTarget = Pick<WatchedBook, "title"> & { author?: string };

/** The fields of a catalog entry the matcher looks at. */
export type MatchCandidate = Pick<CatalogEntry, "title"> & { author?: string };

/**
 * Fold a string for comparison: compatibility-normalize, trim, lower-case.
 * Works on code points, so non-Latin titles compare correctly.
 */
export function foldForMatch(value: string): string {
  return value.normalize("NFKC").trim().toLowerCase();
}

/**
 * Does `entry` correspond to the watched book?
 *
 * The watched title must occur inside the entry title (not the other way
 * round), and when the watched book names an author, that author must occur
 * inside the entry's author. A blank watched title never matches.
 */
export function matches(watched: MatchTarget, entry: MatchCandidate): boolean {
  const title = foldForMatch(watched.title);
  if (title === "") return false;

  if (!foldForMatch(entry.title).includes(title)) return false;

  const author = foldForMatch(watched.author ?? "");
  if (author === "") return true;

  return foldForMatch(entry.author ?? "").includes(author);
}

/**
 * First entry that both matches `watched` and is part of the lendable
 * collection, or `null`. Entries that match but are not owned are skipped.
 */
export function findOwnedMatch<E extends CatalogEntry>(
  watched: MatchTarget,
  entries: readonly E[],
): E | null {
  for (const entry of entries) {
    if (entry.isOwned && matches(watched, entry)) {
      return entry;
    }
  }
  return null;
}
