/**
 * Test helpers shared by the seqindex packages
 */

export { createTempStoreRoot, removeDir, withTempDir, withTempStore } from "./fs.js";
export { CLI_ENTRY, WORKSPACE_ROOT, runCli, parseJsonOutput } from "./cli.js";
export type { CliExecOptions, CliResult } from "./cli.js";
