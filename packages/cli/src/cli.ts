#!/usr/bin/env -S node --import tsx

/**
 * seqindex CLI entry point
 */

import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv.slice(2));
