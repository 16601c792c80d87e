#!/usr/bin/env node
// ---------------------------------------------------------------------------
// Command-line entrypoint.
// ---------------------------------------------------------------------------

import { runCli } from "./cli/run.js";

process.exitCode = await runCli(process.argv.slice(2));
