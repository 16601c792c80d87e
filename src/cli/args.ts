// ---------------------------------------------------------------------------
// Command-line parsing.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";

import type { ProfileName } from "../core/types.js";
import { BookMonitorError } from "../core/errors.js";
import { parseProfileName } from "../config/profile.js";

/** Bad command line; the CLI prints usage after the message. */
export class UsageError extends BookMonitorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UsageError";
  }
}

export type Command =
  | { name: "help" }
  | { name: "version" }
  | { name: "search"; libraryCode: string; query: string; dataDir?: string }
  | {
      name: "watch";
      title: string;
      author?: string;
      library?: string;
      profile: ProfileName;
      dataDir?: string;
    }
  | { name: "unwatch"; title: string; profile: ProfileName; dataDir?: string }
  | { name: "list"; profile: ProfileName; dataDir?: string }
  | { name: "check"; profile: ProfileName; notify: boolean; dataDir?: string };

type CommandName = Exclude<Command["name"], "help" | "version">;

const OPTIONS = {
  help: { type: "boolean", short: "h" },
  version: { type: "boolean" },
  "data-dir": { type: "string" },
  profile: { type: "string" },
  author: { type: "string" },
  library: { type: "string" },
  notify: { type: "boolean" },
} as const;

type OptionName = keyof typeof OPTIONS;

/** Flags each command accepts besides `--help`. */
const COMMAND_FLAGS: Record<CommandName, readonly OptionName[]> = {
  search: ["data-dir"],
  watch: ["author", "library", "profile", "data-dir"],
  unwatch: ["profile", "data-dir"],
  list: ["profile", "data-dir"],
  check: ["profile", "notify", "data-dir"],
};

function isCommandName(value: string): value is CommandName {
  return Object.hasOwn(COMMAND_FLAGS, value);
}

export const USAGE = `Usage: libby-book-monitor <command> [options]

Commands:
  search <library_code> <query>   Search a library catalogue
  watch <title>                   Add a book to the watchlist
  unwatch <title>                 Remove a book from the watchlist
  list                            Show the watchlist
  check                           Check all watched books against the catalogue

Options:
  --author <name>      Book author (watch)
  --library <code>     Library code, default from config.yaml (watch)
  --profile <name>     Separate watchlist for another user (watch, unwatch, list, check)
  --notify             Only print newly found books, for cron (check)
  --data-dir <path>    Data directory (default ~/.libby-book-monitor, or $LIBBY_BOOK_MONITOR_DATA)
  -h, --help           Show this help
  --version            Show the version`;

function expectPositionals(
  command: CommandName,
  args: string[],
  names: string[],
): string[] {
  if (args.length !== names.length) {
    const expected = names.map((n) => `<${n}>`).join(" ") || "no arguments";
    throw new UsageError(`"${command}" expects ${expected}, got ${args.length} argument(s)`);
  }
  return args;
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new UsageError(msg, { cause: err });
  }
}

/**
 * Parse `argv` (without the node and script paths) into a {@link Command}.
 *
 * @throws UsageError for unknown commands or options, a flag the command
 *   does not accept, or the wrong number of arguments.
 */
export function parseCommandLine(argv: string[]): Command {
  const { values, positionals } = parseRaw(argv);

  if (values.help) return { name: "help" };
  if (values.version) return { name: "version" };

  const [name, ...args] = positionals;
  if (name === undefined) {
    throw new UsageError("No command given");
  }
  if (!isCommandName(name)) {
    throw new UsageError(`Unknown command "${name}"`);
  }

  const allowed = COMMAND_FLAGS[name];
  for (const [flag, value] of Object.entries(values)) {
    if (value === undefined || flag === "help" || flag === "version") continue;
    if (!allowed.some((a) => a === flag)) {
      throw new UsageError(`Option --${flag} is not valid for "${name}"`);
    }
  }

  const dataDir = values["data-dir"];

  switch (name) {
    case "search": {
      const [libraryCode, query] = expectPositionals(name, args, ["library_code", "query"]);
      return { name, libraryCode, query, dataDir };
    }
    case "watch": {
      const [title] = expectPositionals(name, args, ["title"]);
      return {
        name,
        title,
        author: values.author,
        library: values.library,
        profile: parseProfileName(values.profile),
        dataDir,
      };
    }
    case "unwatch": {
      const [title] = expectPositionals(name, args, ["title"]);
      return { name, title, profile: parseProfileName(values.profile), dataDir };
    }
    case "list":
      expectPositionals(name, args, []);
      return { name, profile: parseProfileName(values.profile), dataDir };
    case "check":
      expectPositionals(name, args, []);
      return {
        name,
        profile: parseProfileName(values.profile),
        notify: values.notify ?? false,
        dataDir,
      };
  }
}
