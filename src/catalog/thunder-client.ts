// ---------------------------------------------------------------------------
// ThunderCatalogClient – anonymous search against the OverDrive Thunder API.
//
//   GET {apiBase}/{libraryCode}/media?query={text}
//
// One request per search, no pagination, no retry. Retry policy belongs to
// the caller.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  CatalogClient,
  CatalogConfig,
  CatalogSearchResult,
} from "../core/types.js";
import { BookMonitorError, NetworkError } from "../core/errors.js";
import { parseSearchResponse } from "./thunder-response-parser.js";

export class ThunderCatalogClient implements CatalogClient {
  private readonly config: CatalogConfig;
  private readonly logger: Logger;

  constructor(config: CatalogConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: "ThunderCatalogClient" });
  }

  // ── Public interface ────────────────────────────────────────────────────

  /**
   * Search one library's catalog for free text.
   *
   * @throws NetworkError on connection failure, timeout or non-2xx status.
   * @throws ParseError when the body is not the expected JSON.
   */
  async search(libraryCode: string, query: string): Promise<CatalogSearchResult> {
    const url = this.buildSearchUrl(libraryCode, query);
    const start = performance.now();

    this.logger.debug({ libraryCode, query, url }, "Searching catalog");

    try {
      const body = await this.fetchText(url);
      const result = parseSearchResponse(body);

      this.logger.info(
        {
          libraryCode,
          query,
          entries: result.entries.length,
          responseTimeMs: Math.round(performance.now() - start),
        },
        "Catalog search completed",
      );
      return result;
    } catch (error: unknown) {
      this.logger.warn(
        { libraryCode, query, responseTimeMs: Math.round(performance.now() - start), err: error },
        "Catalog search failed",
      );
      throw error;
    }
  }

  buildSearchUrl(libraryCode: string, query: string): string {
    return (
      `${this.config.apiBaseUrl}/${encodeURIComponent(libraryCode)}` +
      `/media?query=${encodeURIComponent(query)}`
    );
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private async fetchText(url: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
        headers: {
          Accept: "application/json",
          "User-Agent": this.config.userAgent,
        },
      });
    } catch (error: unknown) {
      throw this.wrapFetchError(error);
    }

    if (!response.ok) {
      throw new NetworkError(
        `Catalog returned HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
        response.status,
      );
    }

    try {
      return await response.text();
    } catch (error: unknown) {
      throw this.wrapFetchError(error);
    }
  }

  private wrapFetchError(error: unknown): BookMonitorError {
    if (error instanceof BookMonitorError) return error;

    if (
      error instanceof Error &&
      (error.name === "TimeoutError" || error.name === "AbortError")
    ) {
      return new NetworkError(
        `Catalog request timed out after ${this.config.requestTimeoutMs}ms`,
        null,
        { cause: error },
      );
    }

    const msg = error instanceof Error ? error.message : String(error);
    return new NetworkError(`Cannot reach catalog: ${msg}`, null, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}
