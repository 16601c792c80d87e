// ---------------------------------------------------------------------------
// Integration tests for ThunderCatalogClient.
//
// Mocks global fetch to return realistic JSON responses from the Thunder
// media search endpoint.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import pino from "pino";

import { ThunderCatalogClient } from "../../../src/catalog/thunder-client.js";
import { NetworkError, ParseError } from "../../../src/core/errors.js";
import type { CatalogConfig } from "../../../src/core/types.js";

// ── Fixtures ─────────────────────────────────────────────────────────────

const TEST_CONFIG: CatalogConfig = {
  apiBaseUrl: "https://thunder.test.example.org/v2/libraries",
  requestTimeoutMs: 5_000,
  userAgent: "libby-book-monitor/test",
};

function createSilentLogger() {
  return pino({ level: "silent" });
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createSearchResponse() {
  return {
    totalItems: 2,
    items: [
      {
        id: "111",
        title: "Project Hail Mary",
        firstCreatorName: "Andy Weir",
        type: { id: "ebook", name: "eBook" },
        ownedCopies: 3,
        availableCopies: 0,
        isOwned: true,
        isAvailable: false,
      },
      {
        id: "222",
        title: "Project Hail Mary",
        firstCreatorName: "Andy Weir",
        type: { id: "audiobook", name: "Audiobook" },
        ownedCopies: 0,
        availableCopies: 0,
        isOwned: false,
        isAvailable: false,
      },
    ],
  };
}

// ── Tests ─────────────────────────────────────────────────────────────────

describe("ThunderCatalogClient", () => {
  const originalFetch = globalThis.fetch;
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    globalThis.fetch = mockFetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it("parses search results into catalog entries", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(createSearchResponse()));

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());
    const result = await client.search("nypl", "Project Hail Mary");

    expect(result.totalItems).toBe(2);
    expect(result.entries).toHaveLength(2);
    expect(result.entries[0]).toEqual({
      id: "111",
      title: "Project Hail Mary",
      author: "Andy Weir",
      format: "eBook",
      copiesOwned: 3,
      copiesAvailable: 0,
      isOwned: true,
      isAvailable: false,
    });
    expect(result.entries[1].isOwned).toBe(false);
  });

  it("calls the media endpoint with an encoded library code and query", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ totalItems: 0, items: [] }));

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());
    await client.search("tel aviv", "War & Peace");

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [calledUrl, init] = mockFetch.mock.calls[0];
    expect(calledUrl).toBe(
      "https://thunder.test.example.org/v2/libraries/tel%20aviv/media?query=War%20%26%20Peace",
    );
    expect(init.headers).toEqual({
      Accept: "application/json",
      "User-Agent": "libby-book-monitor/test",
    });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("encodes non-Latin queries", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ items: [] }));

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());
    await client.search("telaviv", "דיונה");

    expect(mockFetch.mock.calls[0][0]).toBe(
      "https://thunder.test.example.org/v2/libraries/telaviv/media?query=%D7%93%D7%99%D7%95%D7%A0%D7%94",
    );
  });

  it("throws NetworkError with the status on a non-2xx response", async () => {
    mockFetch.mockResolvedValueOnce(new Response("nope", { status: 404, statusText: "Not Found" }));

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());
    const err = await client.search("nolib", "Dune").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect((err as NetworkError).status).toBe(404);
    expect((err as NetworkError).message).toBe("Catalog returned HTTP 404 Not Found");
  });

  it("throws NetworkError without a status when the connection fails", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());
    const err = await client.search("nypl", "Dune").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect((err as NetworkError).status).toBeNull();
    expect((err as NetworkError).message).toBe("Cannot reach catalog: fetch failed");
  });

  it("throws NetworkError when the request times out", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    mockFetch.mockRejectedValueOnce(timeout);

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());
    const err = await client.search("nypl", "Dune").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect((err as NetworkError).message).toBe("Catalog request timed out after 5000ms");
  });

  it("throws ParseError for a non-JSON body", async () => {
    mockFetch.mockResolvedValueOnce(new Response("<html>maintenance</html>", { status: 200 }));

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());

    await expect(client.search("nypl", "Dune")).rejects.toBeInstanceOf(ParseError);
  });

  it("throws ParseError when the items list is missing", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ totalItems: 0 }));

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());

    await expect(client.search("nypl", "Dune")).rejects.toBeInstanceOf(ParseError);
  });

  it("does not retry on its own", async () => {
    mockFetch.mockResolvedValue(new Response("busy", { status: 503 }));

    const client = new ThunderCatalogClient(TEST_CONFIG, createSilentLogger());
    await expect(client.search("nypl", "Dune")).rejects.toBeInstanceOf(NetworkError);

    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
