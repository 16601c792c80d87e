// ---------------------------------------------------------------------------
// WatchlistStore – CRUD over watched books, scoped by profile.
//
// Every operation loads the profile's full list from the repository and,
// when it mutates, writes the full list back. Nothing is cached between
// calls; the repository is the only source of truth.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

import type {
  BookId,
  NewWatchedBook,
  ProfileName,
  StatusUpdate,
  WatchedBook,
} from "../core/types.js";
import { WatchStatus } from "../core/types.js";
import { DuplicateError, NotFoundError, ValidationError } from "../core/errors.js";
import { foldForMatch } from "../matching/matcher.js";
import type { WatchlistRepository } from "./watchlist-repository.js";

export interface WatchlistStoreOptions {
  now?: () => Date;
  newId?: () => string;
}

/** YYYY-MM-DD of `date` in UTC. */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function sameTitle(a: string, b: string): boolean {
  return foldForMatch(a) === foldForMatch(b);
}

export class WatchlistStore {
  private readonly repository: WatchlistRepository;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    repository: WatchlistRepository,
    logger: Logger,
    options: WatchlistStoreOptions = {},
  ) {
    this.repository = repository;
    this.logger = logger.child({ component: "WatchlistStore" });
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  /**
   * Start watching a book.
   *
   * @throws ValidationError for a blank title or library code.
   * @throws DuplicateError when the profile already watches the same
   *   title and author (compared case-insensitively).
   */
  async add(profile: ProfileName, input: NewWatchedBook): Promise<WatchedBook> {
    const title = input.title.trim();
    const author = (input.author ?? "").trim();
    const libraryCode = input.libraryCode.trim();

    if (title === "") throw new ValidationError("Title must not be empty");
    if (libraryCode === "") throw new ValidationError("Library code must not be empty");

    const books = await this.repository.load(profile);
    const duplicate = books.some(
      (b) => sameTitle(b.title, title) && sameTitle(b.author, author),
    );
    if (duplicate) {
      throw new DuplicateError(title);
    }

    const book: WatchedBook = {
      id: this.newId() as BookId,
      title,
      author,
      libraryCode,
      status: WatchStatus.NOT_FOUND,
      addedOn: toIsoDate(this.now()),
      lastChecked: null,
      foundOn: null,
    };

    await this.repository.save(profile, [...books, book]);
    this.logger.info({ profile, bookId: book.id, title }, "Book added to watchlist");
    return book;
  }

  /**
   * Stop watching every book whose title equals `title` case-insensitively.
   * Returns whether anything was removed; removing an absent title is a no-op.
   */
  async remove(profile: ProfileName, title: string): Promise<boolean> {
    const books = await this.repository.load(profile);
    const kept = books.filter((b) => !sameTitle(b.title, title));

    if (kept.length === books.length) {
      return false;
    }

    await this.repository.save(profile, kept);
    this.logger.info(
      { profile, title, removed: books.length - kept.length },
      "Book removed from watchlist",
    );
    return true;
  }

  async list(profile: ProfileName): Promise<WatchedBook[]> {
    return this.repository.load(profile);
  }

  /** @throws NotFoundError when `id` is not in the profile's watchlist. */
  async get(profile: ProfileName, id: BookId): Promise<WatchedBook> {
    const books = await this.repository.load(profile);
    const book = books.find((b) => b.id === id);
    if (!book) {
      throw new NotFoundError(`No watched book with id ${id} in profile "${profile}"`);
    }
    return book;
  }

  /**
   * Record the outcome of a check.
   *
   * A found book stays found whatever `update.status` says, and `foundOn`
   * is written only on the first transition to found (defaulting to the
   * date of `checkedAt`).
   *
   * @throws NotFoundError when `id` is not in the profile's watchlist.
   */
  async updateStatus(
    profile: ProfileName,
    id: BookId,
    update: StatusUpdate,
  ): Promise<WatchedBook> {
    const books = await this.repository.load(profile);
    const index = books.findIndex((b) => b.id === id);
    if (index === -1) {
      throw new NotFoundError(`No watched book with id ${id} in profile "${profile}"`);
    }

    const current = books[index];
    const status =
      current.status === WatchStatus.FOUND ? WatchStatus.FOUND : update.status;
    const foundOn =
      current.foundOn ??
      (status === WatchStatus.FOUND
        ? (update.foundOn ?? update.checkedAt.slice(0, 10))
        : null);

    const updated: WatchedBook = {
      ...current,
      status,
      lastChecked: update.checkedAt,
      foundOn,
    };

    const next = [...books];
    next[index] = updated;
    await this.repository.save(profile, next);

    if (current.status !== updated.status) {
      this.logger.info({ profile, bookId: id, foundOn }, "Book status changed to found");
    }
    return updated;
  }
}
