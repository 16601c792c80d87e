// ---------------------------------------------------------------------------
// CLI entry logic: parse, configure, dispatch, map errors to exit codes.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import { BookMonitorError } from "../core/errors.js";
import { loadConfig, VERSION } from "../config/config.js";
import { createLogger } from "../logging/logger.js";
import { parseCommandLine, USAGE, UsageError, type Command } from "./args.js";
import {
  createServices,
  runDataCommand,
  type CliIO,
  type ServiceOverrides,
} from "./commands.js";

export interface RunOptions extends ServiceOverrides {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  logger?: Logger;
}

const processIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Run one command and resolve to the process exit code.
 *
 * 0 on success, including a check that found nothing or had per-book
 * failures. 1 for a bad command line or any command-level failure.
 */
export async function runCli(argv: string[], options: RunOptions = {}): Promise<number> {
  const io = options.io ?? processIO;

  let command: Command;
  try {
    command = parseCommandLine(argv);
  } catch (err) {
    if (err instanceof BookMonitorError) {
      io.stderr(`Error: ${err.message}`);
      if (err instanceof UsageError) io.stderr(USAGE);
      return 1;
    }
    throw err;
  }

  if (command.name === "help") {
    io.stdout(USAGE);
    return 0;
  }
  if (command.name === "version") {
    io.stdout(`libby-book-monitor ${VERSION}`);
    return 0;
  }

  let logger = options.logger;
  try {
    const config = loadConfig(options.env);
    logger ??= createLogger(config.logging);

    const services = await createServices(command, config, logger, options);
    return await runDataCommand(command, services, io);
  } catch (err) {
    if (err instanceof BookMonitorError) {
      logger?.debug({ err }, "Command failed");
      io.stderr(`Error: ${err.message}`);
      return 1;
    }

    const msg = err instanceof Error ? err.message : String(err);
    logger?.error({ err }, "Unexpected failure");
    io.stderr(`Unexpected error: ${msg}`);
    return 1;
  }
}
