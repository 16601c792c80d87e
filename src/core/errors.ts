// ---------------------------------------------------------------------------
// Error hierarchy for the book monitor.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all book monitor domain errors. The CLI reports these as plain
 * messages; anything else is treated as a bug.
 */
export class BookMonitorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BookMonitorError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Catalog errors ──────────────────────────────────────────────────────────

/**
 * The catalog could not be reached, timed out, or answered with a non-2xx
 * status. `status` is null when no HTTP response was received.
 */
export class NetworkError extends BookMonitorError {
  public readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = "NetworkError";
    this.status = status;
  }
}

/** The catalog answered, but not with the JSON shape we expect. */
export class ParseError extends BookMonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ParseError";
  }
}

// ── Watchlist errors ────────────────────────────────────────────────────────

/** The profile already watches a book with the same title and author. */
export class DuplicateError extends BookMonitorError {
  public readonly title: string;

  constructor(title: string, options?: ErrorOptions) {
    super(`Already watching: ${title}`, options);
    this.name = "DuplicateError";
    this.title = title;
  }
}

/** A lookup by title or id found nothing. */
export class NotFoundError extends BookMonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/** User input was rejected before touching storage or the network. */
export class ValidationError extends BookMonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A watchlist or config file could not be read, written, or understood. */
export class StorageError extends BookMonitorError {
  public readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StorageError";
    this.path = path;
  }
}

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends BookMonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
