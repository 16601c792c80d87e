// ---------------------------------------------------------------------------
// Command handlers. Each takes the parsed command plus the wired services
// and returns an exit code; domain errors propagate to `runCli`.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  AppConfig,
  CatalogClient,
  CheckResult,
  LibraryConfig,
  MonitorContext,
} from "../core/types.js";
import { NotFoundError } from "../core/errors.js";
import { ThunderCatalogClient } from "../catalog/thunder-client.js";
import { loadLibraryConfig } from "../config/library-config.js";
import { DEFAULT_PROFILE } from "../config/profile.js";
import {
  JsonFileWatchlistRepository,
  type WatchlistRepository,
} from "../store/watchlist-repository.js";
import { WatchlistStore } from "../store/watchlist-store.js";
import {
  CheckAbortedError,
  isNewlyFound,
  Reconciler,
} from "../orchestrator/reconciler.js";
import type { Command } from "./args.js";
import {
  formatAdded,
  formatCheckError,
  formatCheckSummary,
  formatLibrary,
  formatNewArrivals,
  formatSearchResults,
  formatWatchlist,
} from "./format.js";

/** Line-oriented output streams. */
export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface Services {
  context: MonitorContext;
  libraryConfig: LibraryConfig;
  catalog: CatalogClient;
  store: WatchlistStore;
  reconciler: Reconciler;
}

export interface ServiceOverrides {
  catalog?: CatalogClient;
  repository?: WatchlistRepository;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

type DataCommand = Exclude<Command, { name: "help" } | { name: "version" }>;

/**
 * Resolve the data directory, make sure it and `config.yaml` exist, and
 * wire the catalog client, store and reconciler for one invocation.
 */
export async function createServices(
  command: DataCommand,
  config: AppConfig,
  logger: Logger,
  overrides: ServiceOverrides = {},
): Promise<Services> {
  const context: MonitorContext = {
    dataDir: command.dataDir ?? config.dataDir,
    profile: "profile" in command ? command.profile : DEFAULT_PROFILE,
  };

  const libraryConfig = await loadLibraryConfig(context.dataDir);
  const catalog = overrides.catalog ?? new ThunderCatalogClient(config.catalog, logger);
  const repository =
    overrides.repository ?? new JsonFileWatchlistRepository(context.dataDir, logger);
  const store = new WatchlistStore(repository, logger, { now: overrides.now });
  const reconciler = new Reconciler({
    catalog,
    store,
    config: config.check,
    logger,
    now: overrides.now,
    sleep: overrides.sleep,
  });

  return { context, libraryConfig, catalog, store, reconciler };
}

// ── Handlers ────────────────────────────────────────────────────────────────

export async function runDataCommand(
  command: DataCommand,
  services: Services,
  io: CliIO,
): Promise<number> {
  const { context, libraryConfig, catalog, store, reconciler } = services;
  const emit = (lines: string[]) => lines.forEach((line) => io.stdout(line));

  switch (command.name) {
    case "search": {
      const result = await catalog.search(command.libraryCode, command.query);
      emit(
        formatSearchResults(
          formatLibrary(libraryConfig, command.libraryCode),
          command.query,
          result,
        ),
      );
      return 0;
    }

    case "watch": {
      const book = await store.add(context.profile, {
        title: command.title,
        author: command.author,
        libraryCode: command.library ?? libraryConfig.defaultLibrary,
      });
      emit(formatAdded(libraryConfig, book));
      return 0;
    }

    case "unwatch": {
      const removed = await store.remove(context.profile, command.title);
      if (!removed) {
        throw new NotFoundError(`Not found in watchlist: ${command.title}`);
      }
      io.stdout(`Removed: ${command.title}`);
      return 0;
    }

    case "list": {
      const books = await store.list(context.profile);
      emit(formatWatchlist(libraryConfig, context.profile, books));
      return 0;
    }

    case "check": {
      let results: CheckResult[];
      let aborted: CheckAbortedError | null = null;
      try {
        results = await reconciler.check(context.profile, {
          notifyOnly: command.notify,
        });
      } catch (err) {
        if (!(err instanceof CheckAbortedError)) throw err;
        aborted = err;
        results = err.results;
      }

      // Books saved before an abort are reported before the command fails.
      reportCheck(libraryConfig, command.notify, results, aborted !== null, io);
      if (aborted) throw aborted;
      return 0;
    }
  }
}

function reportCheck(
  libraryConfig: LibraryConfig,
  notify: boolean,
  results: readonly CheckResult[],
  aborted: boolean,
  io: CliIO,
): void {
  const emit = (lines: string[]) => lines.forEach((line) => io.stdout(line));

  // Failures under --notify reach stderr through the reconciler's log.
  if (notify) {
    emit(formatNewArrivals(libraryConfig, results));
    return;
  }

  for (const r of results) {
    if (r.error) io.stderr(formatCheckError(r));
  }

  if (results.length > 0) {
    emit(formatCheckSummary(libraryConfig, results, results.filter(isNewlyFound)));
  } else if (!aborted) {
    io.stdout("Watchlist is empty.");
  }
}
