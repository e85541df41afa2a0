/**
 * @asmprobe/cli - Public API
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli.js";
export type { ParsedArgs } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
