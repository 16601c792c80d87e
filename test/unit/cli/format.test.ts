import { describe, it, expect } from "vitest";

import {
  formatAdded,
  formatCheckError,
  formatCheckSummary,
  formatLibrary,
  formatNewArrivals,
  formatSearchResults,
  formatWatchlist,
} from "../../../src/cli/format.js";
import { NetworkError } from "../../../src/core/errors.js";
import type {
  BookId,
  CatalogEntry,
  CheckResult,
  LibraryConfig,
  ProfileName,
  WatchedBook,
} from "../../../src/core/types.js";

const CONFIG: LibraryConfig = {
  defaultLibrary: "nypl",
  libraries: { nypl: "New York Public Library" },
};

function book(overrides: Partial<WatchedBook> = {}): WatchedBook {
  return {
    id: "b1" as BookId,
    title: "Dune",
    author: "",
    libraryCode: "nypl",
    status: "not_found",
    addedOn: "2026-01-02",
    lastChecked: null,
    foundOn: null,
    ...overrides,
  };
}

function entry(overrides: Partial<CatalogEntry> = {}): CatalogEntry {
  return {
    id: "e1",
    title: "Dune",
    author: "Frank Herbert",
    format: "eBook",
    copiesOwned: 3,
    copiesAvailable: 1,
    isOwned: true,
    isAvailable: true,
    ...overrides,
  };
}

function result(overrides: Partial<CheckResult> = {}): CheckResult {
  return {
    book: book(),
    previousStatus: "not_found",
    newStatus: "not_found",
    matchedEntry: null,
    error: null,
    ...overrides,
  };
}

describe("formatLibrary", () => {
  it("shows the configured name with the code", () => {
    expect(formatLibrary(CONFIG, "nypl")).toBe("New York Public Library (nypl)");
  });

  it("falls back to the bare code", () => {
    expect(formatLibrary(CONFIG, "lapl")).toBe("lapl");
  });
});

describe("formatSearchResults", () => {
  it("renders each entry with ownership and availability", () => {
    const lines = formatSearchResults("nypl", "dune", {
      totalItems: 7,
      entries: [
        entry(),
        entry({
          title: "Dune Messiah",
          author: "",
          format: "",
          copiesOwned: 0,
          copiesAvailable: 0,
          isOwned: false,
          isAvailable: false,
        }),
      ],
    });

    expect(lines).toEqual([
      'Searching "dune" in nypl...',
      "",
      "  1. Dune - Frank Herbert",
      "     In catalogue | Copies: 3 | Available: Yes (1) | eBook",
      "",
      "  2. Dune Messiah - Unknown",
      "     Not owned | Copies: 0 | Available: No",
      "",
      "7 result(s) total",
    ]);
  });

  it("reports an empty result", () => {
    expect(formatSearchResults("nypl", "zzz", { totalItems: 0, entries: [] })).toEqual([
      'Searching "zzz" in nypl...',
      "",
      "No results found.",
    ]);
  });
});

describe("formatAdded", () => {
  it("includes the author only when set", () => {
    expect(formatAdded(CONFIG, book({ author: "Frank Herbert" }))).toEqual([
      "Added to watchlist: Dune",
      "  Author: Frank Herbert",
      "  Library: New York Public Library (nypl)",
    ]);
    expect(formatAdded(CONFIG, book({ libraryCode: "lapl" }))).toEqual([
      "Added to watchlist: Dune",
      "  Library: lapl",
    ]);
  });
});

describe("formatWatchlist", () => {
  it("reports an empty watchlist", () => {
    expect(formatWatchlist(CONFIG, "default" as ProfileName, [])).toEqual([
      "Watchlist is empty.",
    ]);
  });

  it("marks found books and tags non-default profiles", () => {
    const lines = formatWatchlist(CONFIG, "alice" as ProfileName, [
      book({
        status: "found",
        author: "Frank Herbert",
        lastChecked: "2026-02-01T08:00:00.000Z",
        foundOn: "2026-02-01",
      }),
    ]);

    expect(lines).toEqual([
      "Watchlist [alice] (1 book):",
      "",
      "  * 1. Dune",
      "       Author: Frank Herbert",
      "       Library: New York Public Library (nypl) | Status: found | Checked: 2026-02-01T08:00:00.000Z",
      "       Found on: 2026-02-01",
      "",
    ]);
  });

  it("shows never-checked books for the default profile", () => {
    const lines = formatWatchlist(CONFIG, "default" as ProfileName, [
      book(),
      book({ id: "b2" as BookId, title: "Emma" }),
    ]);

    expect(lines[0]).toBe("Watchlist (2 books):");
    expect(lines[2]).toBe("    1. Dune");
    expect(lines[3]).toBe(
      "       Library: New York Public Library (nypl) | Status: not_found | Checked: never",
    );
  });
});

describe("formatNewArrivals", () => {
  it("is empty when nothing new turned up", () => {
    expect(formatNewArrivals(CONFIG, [])).toEqual([]);
  });

  it("prefers the catalog's title and author", () => {
    const lines = formatNewArrivals(CONFIG, [
      result({
        newStatus: "found",
        matchedEntry: entry({ title: "Dune (Deluxe Edition)", isAvailable: false }),
      }),
    ]);

    expect(lines).toEqual([
      "New on Libby:",
      "",
      "  Dune (Deluxe Edition) - Frank Herbert",
      "    Library: New York Public Library (nypl) | Copies: 3 | Available: No",
      "",
    ]);
  });
});

describe("formatCheckSummary", () => {
  it("summarises a run with failures, arrivals and found books", () => {
    const arrived = result({
      book: book({ title: "Dune", status: "found" }),
      newStatus: "found",
      matchedEntry: entry(),
    });
    const alreadyFound = result({
      book: book({ id: "b2" as BookId, title: "Emma", status: "found" }),
      previousStatus: "found",
      newStatus: "found",
    });
    const failed = result({
      book: book({ id: "b3" as BookId, title: "Beloved" }),
      error: new NetworkError("Catalog returned HTTP 500", 500),
    });

    const lines = formatCheckSummary(CONFIG, [arrived, alreadyFound, failed], [arrived]);

    expect(lines).toEqual([
      "Checked 3 books.",
      "1 check(s) failed.",
      "1 new addition(s) found!",
      "",
      "New on Libby:",
      "",
      "  Dune - Frank Herbert",
      "    Library: New York Public Library (nypl) | Copies: 3 | Available: Yes",
      "",
      "2 book(s) already in catalogue:",
      "  - Dune",
      "  - Emma",
      "Consider removing them with 'unwatch'.",
    ]);
  });

  it("is a single line when nothing is found", () => {
    expect(formatCheckSummary(CONFIG, [result()], [])).toEqual(["Checked 1 book."]);
  });
});

describe("formatCheckError", () => {
  it("names the book and the error", () => {
    const r = result({ error: new NetworkError("Cannot reach catalog: reset") });
    expect(formatCheckError(r)).toBe('Error checking "Dune": Cannot reach catalog: reset');
  });
});
